/**
 * curryer/result
 *
 * Result primitives used by the non-throwing call path (`node.attempt`).
 * Kept separate so it can be imported on its own.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> =>
  options?.cause !== undefined
    ? { ok: false, error, cause: options.cause }
    : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;
