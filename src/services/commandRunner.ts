/**
 * ================================================================================
 * COMMAND RUNNER - External Command Execution
 * ================================================================================
 *
 * Runs the AWS CLI (or any executable) as an argument list through execa. No
 * shell is involved, so instance IDs and tag values never need quoting.
 *
 * BEHAVIOUR:
 * • Confirmation Gating - Optional operator confirmation before execution
 * • Output Capture - stdout is returned as text, stderr is passed through
 * • Exit Status - Not treated as failure; callers judge the output itself
 * • No Timeout - A hanging command hangs the invocation
 *
 * //? A non-zero exit usually shows up later as a malformed or empty lookup
 */

import execa from 'execa';
import type { CommandLine, DiagnosticLogger, ProcessOutput, RunOptions } from '../types';
import type { Confirmer } from '../utils/confirm';
import { ConfirmationDeclinedError } from '../utils/errors';

export type ProcessExecutor = (command: CommandLine) => Promise<ProcessOutput>;

/**
 * Default executor backed by execa
 */
export const execaExecutor: ProcessExecutor = async ({ file, args }) => {
    const result = await execa(file, args, {
        reject: false,
        stdin: 'ignore',
        stderr: 'inherit'
    });
    return { stdout: result.stdout, exitCode: result.exitCode };
};

/**
 * Render a command line for prompts and logs, quoting arguments with spaces
 */
export function formatCommandLine({ file, args }: CommandLine): string {
    return [file, ...args]
        .map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part))
        .join(' ');
}

export interface CommandRunnerOptions {
    logger: DiagnosticLogger;
    confirmer: Confirmer;
    executor?: ProcessExecutor;
}

export class CommandRunner {
    private readonly logger: DiagnosticLogger;
    private readonly confirmer: Confirmer;
    private readonly executor: ProcessExecutor;

    constructor(options: CommandRunnerOptions) {
        this.logger = options.logger;
        this.confirmer = options.confirmer;
        this.executor = options.executor ?? execaExecutor;
    }

    /**
     * Execute a command and return its stdout
     *
     * @throws ConfirmationDeclinedError when confirmation was requested and refused;
     *         the command is not executed in that case
     */
    async run(command: CommandLine, options: RunOptions = {}): Promise<string> {
        const rendered = formatCommandLine(command);

        if (options.confirm) {
            const accepted = await this.confirmer.confirm(rendered);
            if (!accepted) {
                throw new ConfirmationDeclinedError(rendered);
            }
        }

        this.logger.debug('Executing command', { command: rendered });
        const { stdout, exitCode } = await this.executor(command);

        if (exitCode !== 0) {
            this.logger.warn(`Command exited with status ${exitCode}: ${rendered}`);
        }
        if (options.logOutput) {
            this.logger.info(stdout);
        }

        return stdout;
    }
}
