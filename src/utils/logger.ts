/**
 * ================================================================================
 * LOGGER UTILITY - Diagnostic Output and Execution Tracking
 * ================================================================================
 *
 * Console feedback for the operator plus optional JSON file logging. Everything
 * the logger prints goes to the diagnostic stream (stderr by default) so that
 * stdout stays reserved for the JSON that `name-to-id` and `get` emit.
 *
 * KEY FEATURES:
 * • Multi-level Logging - info, warn, error, debug, success, step
 * • Execution Tracking - UUID-based execution correlation
 * • File Persistence - JSON-structured records when a log file is configured
 * • Progress Indicators - ora spinners while the restart loop waits
 *
 * LOG LEVELS:
 * • ERROR - Failures that end the invocation
 * • WARN  - Non-critical issues (e.g. non-zero exit of the AWS CLI)
 * • INFO  - State observations and raw command output
 * • DEBUG - Commands issued and internal decisions (verbose mode only)
 *
 * //! One Logger per invocation, created in context.ts and injected downwards
 */

import winston from 'winston';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { randomUUID } from 'crypto';
import path from 'path';
import type { DiagnosticLogger, Timer } from '../types';

export interface LoggerOptions {
    stream?: NodeJS.WritableStream;   // Diagnostic stream, defaults to stderr
    verbose?: boolean;
    logFile?: string;                 // JSON log destination; no file logging when unset
}

/**
 * ================================================================================
 * LOGGER CLASS
 * ================================================================================
 */
export class Logger implements DiagnosticLogger {
    private winston: winston.Logger;
    private stream: NodeJS.WritableStream;
    private readonly verbose: boolean;
    private executionId: string = '';
    private logFilePath?: string;

    constructor(options: LoggerOptions = {}) {
        this.stream = options.stream ?? process.stderr;
        this.verbose = options.verbose ?? false;
        this.logFilePath = options.logFile ? path.resolve(process.cwd(), options.logFile) : undefined;

        this.winston = winston.createLogger({
            level: this.verbose ? 'debug' : 'info',
            silent: !this.logFilePath,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: this.logFilePath
                ? [new winston.transports.File({ filename: this.logFilePath })]
                : []
        });
    }

    /**
     * Start a new execution session with a unique tracking ID
     *
     * Console lines are prefixed with the first 8 characters from here on.
     */
    startExecution(command: string): string {
        this.executionId = randomUUID();

        this.winston.info(`Starting execution: ${command}`, {
            executionId: this.executionId,
            command
        });

        this.debug(`Execution started with ID: ${this.executionId}`, { command });
        if (this.logFilePath) {
            this.debug(`Log file: ${this.logFilePath}`);
        }
        return this.executionId;
    }

    private formatMessage(message: string): string {
        return this.executionId ? `[${this.executionId.slice(0, 8)}] ${message}` : message;
    }

    private print(...parts: string[]): void {
        this.stream.write(`${parts.join(' ')}\n`);
    }

    private printData(data: unknown): void {
        if (data !== undefined) {
            this.print(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
        }
    }

    /**
     * ================================================================================
     * LOGGING METHODS - Different Log Levels
     * ================================================================================
     */

    info(message: string, data?: unknown): void {
        this.print(chalk.blue('ℹ'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data });
    }

    success(message: string, data?: unknown): void {
        this.print(chalk.green('✓'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data, outcome: 'success' });
    }

    warn(message: string, data?: unknown): void {
        this.print(chalk.yellow('⚠'), this.formatMessage(message));
        this.winston.warn(message, { executionId: this.executionId, data });
    }

    /**
     * Log an error; the stack is printed when an Error is given
     */
    error(message: string, error?: Error, data?: unknown): void {
        this.print(chalk.red('✗'), this.formatMessage(message));

        if (error) {
            this.print(chalk.red(error.stack ?? error.message));
            this.winston.error(message, {
                executionId: this.executionId,
                error: error.stack,
                data
            });
        } else {
            this.winston.error(message, { executionId: this.executionId, data });
        }
    }

    /**
     * Only shown on the console in verbose mode; always sent to the file log
     */
    debug(message: string, data?: unknown): void {
        if (this.verbose) {
            this.print(chalk.gray('🔍'), chalk.gray(this.formatMessage(message)));
            this.printData(data);
        }

        this.winston.debug(message, { executionId: this.executionId, data });
    }

    /**
     * Track a workflow phase, e.g. step('RESTART_STOP', ...)
     */
    step(step: string, message: string, data?: unknown): void {
        if (this.verbose) {
            this.print(chalk.magenta('📋'), chalk.magenta(this.formatMessage(`${step}: ${message}`)));
            this.printData(data);
        }

        this.winston.info(`${step}: ${message}`, {
            executionId: this.executionId,
            step,
            data,
            type: 'step'
        });
    }

    /**
     * ================================================================================
     * UTILITY METHODS - Timing and Progress
     * ================================================================================
     */

    timer(label: string): Timer {
        const startTime = Date.now();
        this.debug(`Timer started: ${label}`);

        return {
            end: () => {
                const duration = Date.now() - startTime;
                this.debug(`Timer ended: ${label} (${duration}ms)`, { duration, label });
                return duration;
            }
        };
    }

    /**
     * Remember to call .stop() when done
     */
    spinner(message: string): Ora {
        return ora({ text: this.formatMessage(message), stream: this.stream }).start();
    }

    getExecutionId(): string {
        return this.executionId;
    }
}
