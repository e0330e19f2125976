import { Command } from 'commander';
import type { ConfigOverrides } from '../config/types';
import type { CliContext, ContextFactory } from '../context';
import { reportFailure } from '../utils/failure';
import { Logger } from '../utils/logger';

/**
 * Build the invocation context, run the action, and exit 1 on any failure
 *
 * //? Context creation can fail on bad configuration, before any logger exists
 */
export async function runWithContext(
    command: Command,
    buildContext: ContextFactory,
    failureMessage: string,
    action: (context: CliContext) => Promise<void>
): Promise<void> {
    let context: CliContext;
    try {
        context = buildContext(command.name(), command.optsWithGlobals<ConfigOverrides>());
    } catch (error) {
        reportFailure(new Logger(), failureMessage, error);
        process.exit(1);
    }

    try {
        await action(context);
    } catch (error) {
        reportFailure(context.logger, failureMessage, error);
        process.exit(1);
    }
}
