/**
 * @fileoverview Result helpers used at the engine's API boundaries.
 * The core throws typed errors; the query façade and the configuration
 * loader convert them into Result values with these helpers.
 *
 * @module utils/result
 */

import type { AsyncResult, Result } from '../types/base.js';

/**
 * Wraps a success value.
 *
 * @example
 * const result = ok(42);
 * // result: { ok: true, value: 42 }
 */
export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Wraps an error value.
 */
export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Transforms the success value, passing errors through untouched.
 *
 * @example
 * const ids = mapResult(ok(['0', '1']), list => list.length);
 * // ids: { ok: true, value: 2 }
 */
export function mapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U
): Result<U, E> {
    if (result.ok) {
        return { ok: true, value: fn(result.value) };
    }
    return result;
}

/**
 * Runs an async operation and captures a thrown error as a Result.
 * `mapError` decides how the thrown value is represented.
 *
 * @example
 * const saved = await attempt(() => index.save(), e => ({ type: 'internal', message: String(e) }));
 */
export async function attempt<T, E>(
    fn: () => Promise<T>,
    mapError: (thrown: unknown) => E
): AsyncResult<T, E> {
    try {
        return ok(await fn());
    } catch (e) {
        return err(mapError(e));
    }
}

/**
 * Renders any thrown value as a message string.
 */
export function errorMessage(thrown: unknown): string {
    return thrown instanceof Error ? thrown.message : String(thrown);
}
