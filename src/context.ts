/**
 * ================================================================================
 * INVOCATION CONTEXT - Per-command Wiring
 * ================================================================================
 *
 * Builds everything a command needs for one invocation: config, logger, command
 * runner, locator and orchestrator. Commands receive a ContextFactory so tests
 * can swap in fakes without touching the AWS CLI.
 */

import { resolveConfig } from './config/environment';
import type { ConfigOverrides, Ec2CtlConfig } from './config/types';
import { CommandRunner } from './services/commandRunner';
import { InstanceLocator } from './services/locator';
import { RestartOrchestrator } from './services/restart';
import type { AwsCliOptions, DiagnosticLogger } from './types';
import { PromptConfirmer } from './utils/confirm';
import { Logger } from './utils/logger';
import { output } from './utils/output';

export interface CliContext {
    config: Ec2CtlConfig;
    logger: DiagnosticLogger;
    locator: InstanceLocator;
    orchestrator: RestartOrchestrator;
    output(data: unknown): void;
}

export type ContextFactory = (commandName: string, overrides: ConfigOverrides) => CliContext;

export const createContext: ContextFactory = (commandName, overrides) => {
    const config = resolveConfig(process.env, overrides);
    const logger = new Logger({ verbose: config.verbose, logFile: config.logFile });
    logger.startExecution(commandName);
    logger.debug('Configuration resolved', config);

    const cli: AwsCliOptions = {
        executable: config.awsCli,
        region: config.region,
        profile: config.profile
    };
    const runner = new CommandRunner({ logger, confirmer: new PromptConfirmer(logger) });
    const locator = new InstanceLocator(runner, cli, logger);

    return {
        config,
        logger,
        locator,
        orchestrator: new RestartOrchestrator(locator, logger, {
            pollIntervalSeconds: config.pollIntervalSeconds
        }),
        output
    };
};
