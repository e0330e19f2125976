/**
 * ================================================================================
 * NAME-TO-ID COMMAND - Resolve an Instance ID from its Name Tag
 * ================================================================================
 *
 * Prints the instance ID as a JSON string on stdout, so the result can be piped
 * straight into `ec2ctl get` or `ec2ctl force-restart`.
 *
 * USAGE:
 * ec2ctl name-to-id web-1
 */

import { Command } from 'commander';
import { ContextFactory, createContext } from '../context';
import { runWithContext } from './shared';

export function createNameToIdCommand(buildContext: ContextFactory = createContext): Command {
    return new Command('name-to-id')
        .description('Get the ID of the instance with the given Name tag')
        .argument('<name>', 'Value of the Name tag')
        .action(async (name: string, _options: unknown, command: Command) => {
            await runWithContext(command, buildContext, 'Failed to resolve instance name', async (context) => {
                context.logger.debug('Looking up instance by name', { name });
                const instance = await context.locator.byName(name);
                context.output(instance.id());
            });
        });
}
