/**
 * ================================================================================
 * ERRORS - Classified Failures
 * ================================================================================
 *
 * Every failure ec2ctl raises on purpose is one of these classes. Each carries a
 * `code` so the command layer can pick an operator hint without string matching.
 * None of them is retried; they propagate to the command boundary.
 */

import { inspect } from 'util';

export type Ec2CtlErrorCode =
    | 'ARGUMENT'
    | 'EMPTY_RESULT'
    | 'AMBIGUOUS_RESULT'
    | 'UNEXPECTED_RESULT'
    | 'MALFORMED_RESULT'
    | 'CONFIRMATION_DECLINED'
    | 'CONFIGURATION';

export abstract class Ec2CtlError extends Error {
    abstract readonly code: Ec2CtlErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Blank instance name or identifier
 */
export class ArgumentError extends Ec2CtlError {
    readonly code = 'ARGUMENT';
}

export class EmptyResultError extends Ec2CtlError {
    readonly code = 'EMPTY_RESULT';

    constructor() {
        super('Empty result');
    }
}

/**
 * More than one instance matched; all matches are kept for diagnosis
 */
export class AmbiguousResultError extends Ec2CtlError {
    readonly code = 'AMBIGUOUS_RESULT';

    constructor(readonly matches: readonly unknown[]) {
        super(`Ambiguous result:\n${JSON.stringify(matches, null, 2)}`);
    }
}

export class UnexpectedResultError extends Ec2CtlError {
    readonly code = 'UNEXPECTED_RESULT';

    constructor(readonly result: unknown) {
        super(`Unexpected result:\n${inspect(result, { depth: 4 })}`);
    }
}

/**
 * Lookup output that is not JSON or lacks Reservations/Instances/InstanceId/State.Name
 */
export class MalformedResultError extends Ec2CtlError {
    readonly code = 'MALFORMED_RESULT';

    constructor(message: string, readonly output: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ConfirmationDeclinedError extends Ec2CtlError {
    readonly code = 'CONFIRMATION_DECLINED';

    constructor(readonly action: string) {
        super(`Confirmation declined for: ${action}`);
    }
}

export class ConfigurationError extends Ec2CtlError {
    readonly code = 'CONFIGURATION';
}

export function isEc2CtlError(value: unknown): value is Ec2CtlError {
    return value instanceof Ec2CtlError;
}
