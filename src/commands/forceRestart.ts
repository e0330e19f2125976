/**
 * ================================================================================
 * FORCE-RESTART COMMAND - Stop/Start Cycle with Polling
 * ================================================================================
 *
 * Force-stops the instance (after confirmation), waits for 'stopped', starts it
 * and waits for 'running'. Progress lines go to stderr.
 *
 * IMPORTANT NOTES:
 * • The stop is confirmed interactively; anything but "y" aborts before stopping
 * • There is no overall timeout; interrupt the process to give up
 * • A failure after the stop leaves the instance stopped
 *
 * USAGE:
 * ec2ctl force-restart i-1234567890abcdef0
 */

import { Command } from 'commander';
import { ContextFactory, createContext } from '../context';
import { runWithContext } from './shared';

export function createForceRestartCommand(buildContext: ContextFactory = createContext): Command {
    return new Command('force-restart')
        .description('Force-stop the instance with the given ID, then start it again')
        .argument('<instance-id>', 'EC2 instance ID to restart')
        .action(async (instanceId: string, _options: unknown, command: Command) => {
            await runWithContext(command, buildContext, 'Failed to force-restart instance', async (context) => {
                context.logger.info(`Force-restarting instance ${instanceId}...`);
                const summary = await context.orchestrator.forceRestart(instanceId);
                context.logger.success(
                    `Instance ${summary.instanceId} is running again after ${summary.polls} observations`,
                    summary
                );
            });
        });
}
