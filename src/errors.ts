/**
 * timeshift/errors
 *
 * Errors raised for out-of-contract input. Durations and references that
 * the arithmetic cannot honour fail fast with one of these instead of
 * producing a wrong date.
 *
 * @example
 * ```typescript
 * import { InvalidDateTimeError, isTimeshiftError } from 'timeshift/errors';
 *
 * try {
 *   before(days(1), { year: 2013, month: 4, day: 31 });
 * } catch (error) {
 *   if (isTimeshiftError(error)) {
 *     switch (error._tag) {
 *       case 'InvalidDurationError': return `bad duration: ${error.reason}`;
 *       case 'InvalidDateTimeError': return `bad ${error.field}: ${error.reason}`;
 *     }
 *   }
 *   throw error;
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";
import type { DurationUnit } from "./types";

// =============================================================================
// Error Types
// =============================================================================

/**
 * Raised when a duration amount is not a non-negative safe integer, a
 * duration value has an unknown kind, or a months amount shifts a date
 * past the safe month index.
 *
 * @example
 * ```typescript
 * const error = new InvalidDurationError({ unit: 'days', amount: -1, reason: 'must not be negative' });
 * console.log(error.message); // "InvalidDurationError: days(-1) must not be negative"
 * ```
 */
export class InvalidDurationError extends TaggedError<"InvalidDurationError"> {
  readonly _tag = "InvalidDurationError";
  /** Builder unit the amount was given in */
  readonly unit?: DurationUnit;
  readonly amount: unknown;
  readonly reason: string;

  constructor(props: { unit?: DurationUnit; amount: unknown; reason: string }) {
    super(
      props.unit
        ? `InvalidDurationError: ${props.unit}(${String(props.amount)}) ${props.reason}`
        : `InvalidDurationError: ${props.reason}`
    );
    this.unit = props.unit;
    this.amount = props.amount;
    this.reason = props.reason;
  }
}

/**
 * Raised for a malformed reference or direction, an out-of-range field, a
 * day past the end of its month, or a result the clock cannot represent.
 *
 * @example
 * ```typescript
 * const error = new InvalidDateTimeError({ field: 'date.day', value: 31, reason: 'exceeds 30 days in 2013-04' });
 * console.log(error.message); // "InvalidDateTimeError: date.day 31 exceeds 30 days in 2013-04"
 * ```
 */
export class InvalidDateTimeError extends TaggedError<"InvalidDateTimeError"> {
  readonly _tag = "InvalidDateTimeError";
  /** Path of the offending field, e.g. `"time.hour"` */
  readonly field?: string;
  readonly value?: unknown;
  readonly reason: string;

  constructor(props: { field?: string; value?: unknown; reason: string }) {
    super(
      props.field
        ? `InvalidDateTimeError: ${props.field} ${String(props.value)} ${props.reason}`
        : `InvalidDateTimeError: ${props.reason}`
    );
    this.field = props.field;
    this.value = props.value;
    this.reason = props.reason;
  }
}

/**
 * Union of every error this package raises.
 */
export type TimeshiftError = InvalidDurationError | InvalidDateTimeError;

// =============================================================================
// Type Guards
// =============================================================================

export function isInvalidDurationError(error: unknown): error is InvalidDurationError {
  return error instanceof InvalidDurationError;
}

export function isInvalidDateTimeError(error: unknown): error is InvalidDateTimeError {
  return error instanceof InvalidDateTimeError;
}

/**
 * Check if an error is any TimeshiftError.
 */
export function isTimeshiftError(error: unknown): error is TimeshiftError {
  return isInvalidDurationError(error) || isInvalidDateTimeError(error);
}
