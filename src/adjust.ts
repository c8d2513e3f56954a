/**
 * timeshift/adjust
 *
 * The adjuster: applies a duration to a reference in a direction.
 *
 * Seconds durations go through epoch arithmetic, so every boundary from
 * minutes to years rolls over on its own. Months durations go through
 * calendar arithmetic on the date alone; the time-of-day is carried over
 * and the day is clamped to the target month.
 *
 * @example
 * ```typescript
 * const reference = { date: { year: 2016, month: 8, day: 31 }, time: { hour: 9, minute: 0, second: 0 } };
 *
 * adjust(months(6), { direction: 'past', reference });
 * // { date: { year: 2016, month: 2, day: 29 }, time: { hour: 9, minute: 0, second: 0 } }
 * ```
 */

import { dateTime, isDateTime, shiftMonths } from "./calendar";
import { systemClock, type Clock } from "./clock";
import { InvalidDateTimeError, InvalidDurationError, isTimeshiftError, type TimeshiftError } from "./errors";
import { err, ok, unwrap, type Result } from "./result";
import type { AdjustParams, CalendarDate, DateTime, Direction, Duration, Reference } from "./types";
import { checkDirection, checkDuration, checkReference } from "./validation";

/**
 * Resolve the reference to a full date-time. The clock is read only when
 * the reference lacks a time, and then once.
 */
function resolveReference(reference: Reference | undefined, clock: Clock): DateTime {
  if (reference === undefined) return clock.now();
  if (isDateTime(reference)) return dateTime(reference.date, reference.time);
  return dateTime(reference, clock.now().time);
}

const sign = (direction: Direction): number => (direction === "future" ? 1 : -1);

/**
 * Month arithmetic runs on the index `year * 12 + month`, which must stay a
 * safe integer before and after the shift.
 */
function assertMonthIndexInRange(date: CalendarDate, amount: number, delta: number): void {
  const index = date.year * 12 + date.month;
  if (!Number.isSafeInteger(index)) {
    throw new InvalidDateTimeError({
      field: "date.year",
      value: date.year,
      reason: "is too large for month arithmetic",
    });
  }
  if (!Number.isSafeInteger(index + delta)) {
    throw new InvalidDurationError({
      unit: "months",
      amount,
      reason: "moves the month index past the safe integer range",
    });
  }
}

function applyDuration(
  duration: Duration,
  direction: Direction,
  start: DateTime,
  clock: Clock
): DateTime {
  switch (duration.kind) {
    case "seconds": {
      const epochSeconds = clock.toEpochSeconds(start);
      return clock.fromEpochSeconds(epochSeconds + sign(direction) * duration.amount);
    }
    case "months": {
      const delta = sign(direction) * duration.amount;
      assertMonthIndexInRange(start.date, duration.amount, delta);
      return dateTime(shiftMonths(start.date, delta), start.time);
    }
  }
}

/**
 * Apply a duration to a reference.
 *
 * @throws InvalidDurationError when the duration is malformed, or a months
 *   amount would shift the date out of the safe integer range
 * @throws InvalidDateTimeError when the direction or reference is malformed,
 *   or the result is outside what the clock or month arithmetic can represent
 */
export function adjust(duration: Duration, params: AdjustParams, clock: Clock = systemClock): DateTime {
  const valid = unwrap(checkDuration(duration));
  const direction = unwrap(checkDirection(params.direction));
  const reference = params.reference === undefined ? undefined : unwrap(checkReference(params.reference));
  return applyDuration(valid, direction, resolveReference(reference, clock), clock);
}

/**
 * Like `adjust`, but out-of-contract input comes back as an Err carrying
 * the tagged error instead of being thrown.
 */
export function tryAdjust(
  duration: Duration,
  params: AdjustParams,
  clock: Clock = systemClock
): Result<DateTime, TimeshiftError> {
  try {
    return ok(adjust(duration, params, clock));
  } catch (error) {
    if (isTimeshiftError(error)) return err(error);
    throw error;
  }
}
