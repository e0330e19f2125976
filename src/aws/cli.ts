import type { AwsCliOptions, CommandLine } from '../types';

/**
 * Build an AWS CLI invocation, appending the configured global options
 *
 * awsCommand({ executable: 'aws', region: 'eu-west-1' }, ['ec2', 'start-instances'])
 *   -> aws ec2 start-instances --region eu-west-1
 */
export function awsCommand(cli: AwsCliOptions, args: string[]): CommandLine {
    return {
        file: cli.executable,
        args: [
            ...args,
            ...(cli.region ? ['--region', cli.region] : []),
            ...(cli.profile ? ['--profile', cli.profile] : [])
        ]
    };
}

/**
 * `describe-instances` filtered on a single key/value, e.g. tag:Name or instance-id
 */
export function describeInstancesCommand(cli: AwsCliOptions, key: string, value: string): CommandLine {
    return awsCommand(cli, ['ec2', 'describe-instances', '--filters', `Name=${key},Values=${value}`]);
}
