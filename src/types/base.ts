/**
 * @fileoverview Foundational types for the retrieval engine.
 * JSON value shapes used for document metadata, and result types.
 * Zero imports - this is the base layer of the type system.
 *
 * @module types/base
 */

// ============================================================
// JSON Values
// ============================================================

/**
 * A JSON scalar value.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Any value that survives a JSON round trip.
 * Metadata attached to stored documents is restricted to this shape
 * so the side-table artifact can be persisted as plain JSON.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * A JSON object with string keys.
 *
 * @example
 * const meta: JsonObject = { source: 'notes/a.txt', tags: ['intro'] };
 */
export type JsonObject = { [key: string]: JsonValue };

// ============================================================
// Result Types
// ============================================================

/**
 * Result type for operations that can fail.
 * Provides type-safe error handling without exceptions.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 *
 * @example
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) {
 *     return { ok: false, error: 'Division by zero' };
 *   }
 *   return { ok: true, value: a / b };
 * }
 */
export type Result<T, E = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Async result type for asynchronous operations that can fail.
 * Wraps Result in a Promise for async/await compatibility.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;
