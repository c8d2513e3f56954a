/**
 * timeshift/duration
 *
 * Duration builders. Sub-month units normalize to seconds, months and
 * years normalize to months; the kind decides how the adjuster applies
 * the amount.
 */

import { InvalidDurationError } from "./errors";
import type {
  Duration as DurationType,
  DurationKind,
  DurationUnit,
  MonthsDuration,
  SecondsDuration,
} from "./types";

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 3_600;
const SECONDS_PER_DAY = 86_400;
const SECONDS_PER_WEEK = 604_800;
const MONTHS_PER_YEAR = 12;

function normalize(unit: DurationUnit, n: number, factor: number): number {
  if (!Number.isSafeInteger(n)) {
    throw new InvalidDurationError({ unit, amount: n, reason: "must be a safe integer" });
  }
  if (n < 0) {
    throw new InvalidDurationError({ unit, amount: n, reason: "must not be negative" });
  }
  const amount = n * factor;
  if (!Number.isSafeInteger(amount)) {
    throw new InvalidDurationError({ unit, amount: n, reason: "overflows when normalized" });
  }
  return amount;
}

function secondsOf(unit: DurationUnit, n: number, factor: number): SecondsDuration {
  const duration: SecondsDuration = { kind: "seconds", amount: normalize(unit, n, factor) };
  return Object.freeze(duration);
}

function monthsOf(unit: DurationUnit, n: number, factor: number): MonthsDuration {
  const duration: MonthsDuration = { kind: "months", amount: normalize(unit, n, factor) };
  return Object.freeze(duration);
}

// =============================================================================
// Builders
// =============================================================================

/**
 * @example
 * ```typescript
 * pipe(15, seconds, ago);
 * ```
 */
export const seconds = (n: number): SecondsDuration => secondsOf("seconds", n, 1);

export const minutes = (n: number): SecondsDuration =>
  secondsOf("minutes", n, SECONDS_PER_MINUTE);

export const hours = (n: number): SecondsDuration => secondsOf("hours", n, SECONDS_PER_HOUR);

/**
 * Days are a fixed 86400 seconds, so they follow the seconds path and
 * carry the time-of-day across month ends.
 */
export const days = (n: number): SecondsDuration => secondsOf("days", n, SECONDS_PER_DAY);

export const weeks = (n: number): SecondsDuration => secondsOf("weeks", n, SECONDS_PER_WEEK);

export const months = (n: number): MonthsDuration => monthsOf("months", n, 1);

export const years = (n: number): MonthsDuration => monthsOf("years", n, MONTHS_PER_YEAR);

// =============================================================================
// Guards
// =============================================================================

function isKind(value: unknown): value is DurationKind {
  return value === "seconds" || value === "months";
}

/**
 * Check if a value is a well-formed duration: a known kind and a
 * non-negative safe integer amount.
 */
export function isDuration(value: unknown): value is DurationType {
  if (typeof value !== "object" || value === null) return false;
  if (!("kind" in value) || !("amount" in value)) return false;
  const { kind, amount } = value;
  return (
    isKind(kind) &&
    typeof amount === "number" &&
    Number.isSafeInteger(amount) &&
    amount >= 0
  );
}

// =============================================================================
// Namespace
// =============================================================================

/**
 * Builders grouped under one name.
 *
 * @example
 * ```typescript
 * import { Duration } from 'timeshift/duration';
 *
 * before(Duration.years(1), reference);
 * ```
 */
export const Duration = {
  seconds,
  minutes,
  hours,
  days,
  weeks,
  months,
  years,
  isDuration,
} as const;
