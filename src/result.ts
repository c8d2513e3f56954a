/**
 * timeshift/result
 *
 * Result primitives for the non-throwing API (`tryAdjust`, the `check*`
 * validators). A Result is a plain object, so it can be inspected with
 * `result.ok` and narrowed without any helper.
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
export type Err<E> = { ok: false; error: E };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

// =============================================================================
// Result Constructors
// =============================================================================

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Returns the value of an Ok result, or throws its error.
 *
 * Errors that are already `Error` instances are rethrown as they are, so a
 * failed validation surfaces as the tagged error it carries.
 */
export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  if (r.error instanceof Error) throw r.error;
  throw new UnwrapError(r.error);
};

export class UnwrapError<E = unknown> extends Error {
  constructor(public readonly error: E) {
    super(`Unwrap called on an error result: ${String(error)}`);
    this.name = "UnwrapError";
  }
}

export const unwrapOr = <T, E>(r: Result<T, E>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

// =============================================================================
// Transformers
// =============================================================================

/**
 * Transforms the value of an Ok result.
 *
 * @example
 * ```typescript
 * const year = map(tryAdjust(years(1), { direction: 'future', reference }), (dt) => dt.date.year);
 * ```
 */
export function map<T, U, E>(r: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return r.ok ? ok(fn(r.value)) : r;
}

export function mapError<T, E, F>(r: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return r.ok ? r : err(fn(r.error));
}

/**
 * Chains a Result-returning step onto an Ok result. An Err short-circuits.
 *
 * @example
 * ```typescript
 * const shifted = andThen(checkReference(input), (reference) =>
 *   tryAdjust(months(6), { direction: 'past', reference })
 * );
 * ```
 */
export function andThen<T, U, E, F>(
  r: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return r.ok ? fn(r.value) : r;
}

export function match<T, E, R>(
  r: Result<T, E>,
  handlers: { ok: (value: T) => R; err: (error: E) => R }
): R {
  return r.ok ? handlers.ok(r.value) : handlers.err(r.error);
}
