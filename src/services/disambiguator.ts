import { AmbiguousResultError, EmptyResultError, UnexpectedResultError } from '../utils/errors';

/**
 * Return the only element of a lookup result.
 *
 * Never picks a best match: zero matches, several matches and anything that is
 * not an array each fail with their own error.
 */
export function singular<T>(result: readonly T[]): T;
export function singular(result: unknown): unknown;
export function singular(result: unknown): unknown {
    if (!Array.isArray(result)) {
        throw new UnexpectedResultError(result);
    }
    if (result.length > 1) {
        throw new AmbiguousResultError(result);
    }
    if (result.length === 0) {
        throw new EmptyResultError();
    }
    return result[0];
}
