import type { DiagnosticLogger } from '../types';
import { Ec2CtlErrorCode, isEc2CtlError } from './errors';

const HINTS: Record<Ec2CtlErrorCode, string> = {
    ARGUMENT: 'Hint: Pass a non-blank instance name or ID',
    EMPTY_RESULT: 'Hint: Check the name/ID, the region and the profile; no instance matched',
    AMBIGUOUS_RESULT: 'Hint: Several instances share this Name tag; use the instance ID instead',
    UNEXPECTED_RESULT: 'Hint: The AWS CLI returned something other than a list of instances',
    MALFORMED_RESULT: 'Hint: Run the AWS CLI by hand; it may have failed or printed non-JSON output',
    CONFIRMATION_DECLINED: 'Hint: Type exactly "y" to confirm',
    CONFIGURATION: 'Hint: Check the EC2CTL_* environment variables and command-line options'
};

/**
 * Log a failed operation with its stack and an operator hint for known errors
 */
export function reportFailure(logger: DiagnosticLogger, message: string, error: unknown): void {
    logger.error(message, error instanceof Error ? error : new Error(String(error)));

    if (isEc2CtlError(error)) {
        logger.info(HINTS[error.code]);
    }
}
