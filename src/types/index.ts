/**
 * ================================================================================
 * TYPE DEFINITIONS - Core Data Structures
 * ================================================================================
 *
 * Shared shapes for the ec2ctl CLI: the instance description as the AWS CLI
 * prints it, the closed set of lifecycle states, subprocess command lines and
 * the diagnostic logger contract every service depends on.
 *
 * KEY TYPES:
 * • InstanceDescription - One entry of describe-instances output
 * • LifecycleState - pending | running | stopping | stopped | shutting-down | terminated
 * • CommandLine - Executable plus argument list (never a shell string)
 * • DiagnosticLogger - What services need from the logger
 */

import { InstanceStateName } from '@aws-sdk/client-ec2';

/**
 * ================================================================================
 * INSTANCE REPRESENTATION
 * ================================================================================
 */

/**
 * Lifecycle state of an EC2 instance, spelled exactly as the provider reports it.
 */
export type LifecycleState = InstanceStateName;

export const LIFECYCLE_STATES: readonly LifecycleState[] = Object.values(InstanceStateName);

/**
 * A single instance as printed by `aws ec2 describe-instances`
 *
 * Only the identifier and the nested state name are required; everything else
 * the provider sends is carried through untouched for `ec2ctl get`.
 *
 * //! IMPORTANT: InstanceId is the key for every stop/start/reload
 */
export interface InstanceDescription {
    InstanceId: string;
    State: {
        Name: string;
        Code?: number;
    };
    [field: string]: unknown;
}

/**
 * ================================================================================
 * SUBPROCESS EXECUTION
 * ================================================================================
 */

export interface CommandLine {
    file: string;       // Executable, e.g. 'aws'
    args: string[];     // Passed verbatim, no shell quoting involved
}

export interface RunOptions {
    confirm?: boolean;      // Ask the operator before executing
    logOutput?: boolean;    // Write raw stdout to the diagnostic stream afterwards
}

export interface ProcessOutput {
    stdout: string;
    exitCode: number;
}

/**
 * Global AWS CLI settings appended to every invocation
 */
export interface AwsCliOptions {
    executable: string;
    region?: string;
    profile?: string;
}

/**
 * ================================================================================
 * DIAGNOSTICS
 * ================================================================================
 */

export interface Spinner {
    stop(): unknown;
}

export interface Timer {
    end(): number;
}

/**
 * Logger capability injected into the runner, confirmer and orchestrator.
 * The concrete implementation is `Logger` in utils/logger.
 */
export interface DiagnosticLogger {
    info(message: string, data?: unknown): void;
    success(message: string, data?: unknown): void;
    warn(message: string, data?: unknown): void;
    error(message: string, error?: Error, data?: unknown): void;
    debug(message: string, data?: unknown): void;
    step(step: string, message: string, data?: unknown): void;
    timer(label: string): Timer;
    spinner(message: string): Spinner;
}
