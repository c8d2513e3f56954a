/**
 * timeshift/calendar (internal)
 *
 * Gregorian calendar rules used by the months path of the adjuster.
 */

import type { CalendarDate, DateTime, Reference, TimeOfDay } from "./types";

/** Months with 30 days. */
const THIRTY_DAY_MONTHS: ReadonlySet<number> = new Set([4, 6, 9, 11]);

const FEBRUARY = 2;
const DECEMBER = 12;

/**
 * Gregorian leap-year test: divisible by 400, or by 4 but not by 100.
 *
 * @example
 * ```typescript
 * isLeapYear(2000); // true
 * isLeapYear(1900); // false
 * ```
 */
export function isLeapYear(year: number): boolean {
  if (year % 400 === 0) return true;
  if (year % 100 === 0) return false;
  return year % 4 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === FEBRUARY) return isLeapYear(year) ? 29 : 28;
  return THIRTY_DAY_MONTHS.has(month) ? 30 : 31;
}

/**
 * Map a day-of-month onto the target month.
 *
 * Days up to 28 always fit. Days 29-31 are pulled down to February's last
 * day, and 31 becomes 30 in the thirty-day months. The mapping loses
 * information: shifting a month-end date there and back may not return it.
 */
export function clampDay(day: number, targetYear: number, targetMonth: number): number {
  if (day <= 28) return day;
  if (targetMonth === FEBRUARY) return isLeapYear(targetYear) ? 29 : 28;
  if (day <= 30) return day;
  return THIRTY_DAY_MONTHS.has(targetMonth) ? 30 : 31;
}

/**
 * Shift a date by whole months, clamping the day to the target month.
 * Month numbering stays 1-12: a zero remainder is December of the
 * previous year.
 */
export function shiftMonths(date: CalendarDate, delta: number): CalendarDate {
  const target = date.year * 12 + date.month + delta;
  let year = Math.floor(target / 12);
  let month = target - year * 12;
  if (month === 0) {
    year -= 1;
    month = DECEMBER;
  }
  return { year, month, day: clampDay(date.day, year, month) };
}

// =============================================================================
// Value helpers
// =============================================================================

export function isDateTime(reference: Reference): reference is DateTime {
  return "date" in reference && "time" in reference;
}

export function dateTime(date: CalendarDate, time: TimeOfDay): DateTime {
  return {
    date: { year: date.year, month: date.month, day: date.day },
    time: { hour: time.hour, minute: time.minute, second: time.second },
  };
}

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/** Four-digit year with a leading sign for years before 1, e.g. `-0001`. */
export const padYear = (year: number): string => (year < 0 ? `-${pad(-year, 4)}` : pad(year, 4));

/**
 * ISO-8601 style rendering, used in log lines.
 */
export function toIsoString(value: DateTime): string {
  const { date, time } = value;
  return `${padYear(date.year)}-${pad(date.month)}-${pad(date.day)}T${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
}
