import { PrecisError, toPrecisError } from '../errors';

/**
 * Outcome of one pipeline stage. Stages return this instead of throwing across
 * their own boundary, so the caller decides where a failure turns into an
 * exception.
 */
export type StageResult<T, E extends PrecisError = PrecisError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): StageResult<T, never> => ({ ok: true, value });

export const fail = <E extends PrecisError>(error: E): StageResult<never, E> => ({ ok: false, error });

/**
 * Run `fn` and capture its outcome. Errors outside the taxonomy are passed
 * through `wrap` (or normalized) so the result always carries a PrecisError.
 */
export const attempt = async <T>(
    fn: () => Promise<T>,
    wrap?: (error: unknown) => PrecisError,
): Promise<StageResult<T>> => {
    try {
        return ok(await fn());
    } catch (error) {
        if (error instanceof PrecisError) return fail(error);
        return fail(wrap ? wrap(error) : toPrecisError(error));
    }
};

export const unwrap = <T>(result: StageResult<T>): T => {
    if (result.ok) return result.value;
    throw result.error;
};
