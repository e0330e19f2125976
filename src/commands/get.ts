import { Command } from 'commander';
import { ContextFactory, createContext } from '../context';
import { runWithContext } from './shared';

/**
 * `ec2ctl get <instance-id>` prints the full describe-instances entry as JSON.
 */
export function createGetCommand(buildContext: ContextFactory = createContext): Command {
    return new Command('get')
        .description('Describe the instance with the given ID')
        .argument('<instance-id>', 'EC2 instance ID')
        .action(async (instanceId: string, _options: unknown, command: Command) => {
            await runWithContext(command, buildContext, 'Failed to describe instance', async (context) => {
                const instance = await context.locator.byId(instanceId);
                context.output(instance.description);
            });
        });
}
