/**
 * keyflight/core
 *
 * Result primitives shared by every keyflight module.
 * Computations report failure by returning `err(...)` instead of throwing,
 * so the outcome of a flight can be handed to every waiter as a plain value.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 *
 * @example
 * ```typescript
 * const success = ok(42);
 * // Type shown: Ok<number>
 * ```
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 *
 * @template E - The type of the error value
 * @template C - The type of the cause (defaults to unknown)
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * The outcome of an operation that might fail.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown, C = unknown> = Promise<Result<T, E, C>>;

export type MaybeAsyncResult<T, E, C = unknown> = Result<T, E, C> | Promise<Result<T, E, C>>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 *
 * @example
 * ```typescript
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) return err("Division by zero");
 *   return ok(a / b);
 * }
 * ```
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @example
 * ```typescript
 * const r1 = err("NOT_FOUND");
 * // Type: Err<"NOT_FOUND">
 *
 * const r2 = err("UPSTREAM_DOWN", { cause: response.status });
 * ```
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
