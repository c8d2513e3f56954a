/**
 * timeshift/validation
 *
 * Checks that a duration or a reference is inside the contract of the
 * adjuster. Each check returns a Result; the throwing API unwraps it.
 *
 * @example
 * ```typescript
 * const checked = checkReference({ year: 2013, month: 2, day: 29 });
 * if (!checked.ok) {
 *   console.log(checked.error.message);
 *   // "InvalidDateTimeError: date.day 29 exceeds 28 days in 2013-02"
 * }
 * ```
 */

import { daysInMonth, isDateTime, padYear } from "./calendar";
import { isDuration } from "./duration";
import { InvalidDateTimeError, InvalidDurationError } from "./errors";
import { err, ok, type Result } from "./result";
import type { CalendarDate, DateTime, Direction, Duration, Reference, TimeOfDay } from "./types";

function outOfRange(
  field: string,
  value: number,
  min: number,
  max: number
): InvalidDateTimeError | undefined {
  if (!Number.isInteger(value)) {
    return new InvalidDateTimeError({ field, value, reason: "must be an integer" });
  }
  if (value < min || value > max) {
    return new InvalidDateTimeError({ field, value, reason: `must be between ${min} and ${max}` });
  }
  return undefined;
}

/**
 * Check an arbitrary value is a duration produced by (or shaped like the
 * output of) the builders.
 */
export function checkDuration(value: unknown): Result<Duration, InvalidDurationError> {
  if (isDuration(value)) return ok(value);
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return err(new InvalidDurationError({ amount: value, reason: "must be a duration value" }));
  }
  const amount = "amount" in value ? value.amount : undefined;
  if (value.kind !== "seconds" && value.kind !== "months") {
    return err(new InvalidDurationError({ amount, reason: `unknown duration kind "${String(value.kind)}"` }));
  }
  return err(
    new InvalidDurationError({ amount, reason: `${value.kind} amount must be a non-negative safe integer` })
  );
}

export function checkDirection(value: unknown): Result<Direction, InvalidDateTimeError> {
  if (value === "past" || value === "future") return ok(value);
  return err(new InvalidDateTimeError({ field: "direction", value, reason: 'must be "past" or "future"' }));
}

export function checkDate(date: CalendarDate, path = "date"): Result<CalendarDate, InvalidDateTimeError> {
  if (typeof date !== "object" || date === null) {
    return err(new InvalidDateTimeError({ field: path, value: date, reason: "must be a calendar date" }));
  }
  if (!Number.isSafeInteger(date.year)) {
    return err(
      new InvalidDateTimeError({ field: `${path}.year`, value: date.year, reason: "must be a safe integer" })
    );
  }
  const month = outOfRange(`${path}.month`, date.month, 1, 12);
  if (month) return err(month);

  const length = daysInMonth(date.year, date.month);
  if (!Number.isInteger(date.day) || date.day < 1) {
    return err(
      new InvalidDateTimeError({ field: `${path}.day`, value: date.day, reason: "must be a positive integer" })
    );
  }
  if (date.day > length) {
    const monthKey = `${padYear(date.year)}-${String(date.month).padStart(2, "0")}`;
    return err(
      new InvalidDateTimeError({
        field: `${path}.day`,
        value: date.day,
        reason: `exceeds ${length} days in ${monthKey}`,
      })
    );
  }
  return ok(date);
}

export function checkTime(time: TimeOfDay, path = "time"): Result<TimeOfDay, InvalidDateTimeError> {
  if (typeof time !== "object" || time === null) {
    return err(new InvalidDateTimeError({ field: path, value: time, reason: "must be a time of day" }));
  }
  const failure =
    outOfRange(`${path}.hour`, time.hour, 0, 23) ??
    outOfRange(`${path}.minute`, time.minute, 0, 59) ??
    outOfRange(`${path}.second`, time.second, 0, 59);
  return failure ? err(failure) : ok(time);
}

export function checkDateTime(dateTime: DateTime): Result<DateTime, InvalidDateTimeError> {
  const date = checkDate(dateTime.date);
  if (!date.ok) return date;
  const time = checkTime(dateTime.time);
  if (!time.ok) return time;
  return ok(dateTime);
}

/**
 * Check a date-time or date-only reference.
 */
export function checkReference(reference: Reference): Result<Reference, InvalidDateTimeError> {
  if (typeof reference !== "object" || reference === null) {
    return err(
      new InvalidDateTimeError({ field: "reference", value: reference, reason: "must be a date or date-time" })
    );
  }
  return isDateTime(reference) ? checkDateTime(reference) : checkDate(reference);
}
