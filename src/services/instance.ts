/**
 * ================================================================================
 * EC2 INSTANCE - Read-only View over a Description
 * ================================================================================
 *
 * Wraps one describe-instances entry. The state is read from the description on
 * every call; refreshing means asking the locator for a new Ec2Instance.
 *
 * //! stop() always asks for confirmation, start() never does
 */

import { InstanceStateName } from '@aws-sdk/client-ec2';
import { awsCommand } from '../aws/cli';
import type { AwsCliOptions, InstanceDescription, LifecycleState } from '../types';
import type { CommandRunner } from './commandRunner';

export interface StopOptions {
    force?: boolean;    // Adds --force, skipping the graceful shutdown negotiation
}

export class Ec2Instance {
    constructor(
        readonly description: InstanceDescription,
        private readonly runner: CommandRunner,
        private readonly cli: AwsCliOptions
    ) {}

    id(): string {
        return this.description.InstanceId;
    }

    /**
     * Raw provider state name, e.g. 'shutting-down'
     */
    state(): string {
        return this.description.State.Name;
    }

    /**
     * Exact, case-sensitive comparison against the provider spelling
     */
    is(state: LifecycleState): boolean {
        return this.state() === state;
    }

    isPending(): boolean {
        return this.is(InstanceStateName.pending);
    }

    isRunning(): boolean {
        return this.is(InstanceStateName.running);
    }

    isStopping(): boolean {
        return this.is(InstanceStateName.stopping);
    }

    isStopped(): boolean {
        return this.is(InstanceStateName.stopped);
    }

    isShuttingDown(): boolean {
        return this.is(InstanceStateName.shutting_down);
    }

    isTerminated(): boolean {
        return this.is(InstanceStateName.terminated);
    }

    /**
     * Send stop-instances; the raw CLI output is returned uninspected
     */
    async stop(options: StopOptions = {}): Promise<string> {
        const args = [
            'ec2', 'stop-instances',
            ...(options.force ? ['--force'] : []),
            '--instance-ids', this.id()
        ];
        return this.runner.run(awsCommand(this.cli, args), { confirm: true, logOutput: true });
    }

    async start(): Promise<string> {
        const args = ['ec2', 'start-instances', '--instance-ids', this.id()];
        return this.runner.run(awsCommand(this.cli, args), { logOutput: true });
    }
}
