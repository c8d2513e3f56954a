/**
 * timeshift
 *
 * Relative dates and times as a pipeline of small functions: build a
 * duration, then apply it with an end-point.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { pipe, minutes, hours, months, days, ago, fromNow, before, from } from 'timeshift';
 *
 * pipe(10, minutes, ago);                 // ten minutes ago
 * pipe(15, hours, fromNow);               // fifteen hours from now
 * from(months(2), pipe(3, days, ago));    // two months after three days ago
 * ```
 *
 * ## Entry Points
 *
 * - `timeshift` - builders, end-points, accessors, clocks, Timeshift namespace
 * - `timeshift/duration` - duration builders only
 * - `timeshift/errors` - tagged error types and guards
 * - `timeshift/result` - Result primitives used by the non-throwing API
 * - `timeshift/testing` - controllable test clock and Result assertions
 */

import { seconds, minutes, hours, days, weeks, months, years, isDuration } from "./duration";
import {
  createRelativeTime,
  ago,
  fromNow,
  before,
  from,
  now,
  today,
  yesterday,
  tomorrow,
  lastWeek,
  nextWeek,
  lastMonth,
  nextMonth,
  lastYear,
  nextYear,
} from "./relative";
import { adjust, tryAdjust } from "./adjust";
import { isLeapYear, daysInMonth } from "./calendar";
import { pipe, flow } from "./functional";

// =============================================================================
// Timeshift namespace (single export)
// =============================================================================

const Timeshift = {
  // Builders
  seconds,
  minutes,
  hours,
  days,
  weeks,
  months,
  years,
  isDuration,
  // End-points
  ago,
  fromNow,
  before,
  from,
  // Accessors
  now,
  today,
  yesterday,
  tomorrow,
  lastWeek,
  nextWeek,
  lastMonth,
  nextMonth,
  lastYear,
  nextYear,
  // Adjuster
  adjust,
  tryAdjust,
  createRelativeTime,
  // Calendar
  isLeapYear,
  daysInMonth,
  // Composition
  pipe,
  flow,
} as const;

export { Timeshift };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { seconds, minutes, hours, days, weeks, months, years, isDuration, Duration } from "./duration";

export {
  createRelativeTime,
  ago,
  fromNow,
  before,
  from,
  now,
  today,
  yesterday,
  tomorrow,
  lastWeek,
  nextWeek,
  lastMonth,
  nextMonth,
  lastYear,
  nextYear,
} from "./relative";

export { adjust, tryAdjust } from "./adjust";
export { isLeapYear, daysInMonth, clampDay } from "./calendar";
export { systemClock, createSystemClock, createFixedOffsetClock } from "./clock";
export { checkDuration, checkDirection, checkDate, checkTime, checkDateTime, checkReference } from "./validation";
export { ok, err, isOk, isErr, unwrap, unwrapOr, UnwrapError, map, mapError, andThen, match } from "./result";
export { TaggedError } from "./tagged-error";
export {
  InvalidDurationError,
  InvalidDateTimeError,
  isInvalidDurationError,
  isInvalidDateTimeError,
  isTimeshiftError,
} from "./errors";
export { pipe, flow } from "./functional";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type {
  Duration as DurationType,
  DurationKind,
  DurationUnit,
  SecondsDuration,
  MonthsDuration,
  CalendarDate,
  TimeOfDay,
  DateTime,
  Reference,
  Direction,
  AdjustParams,
} from "./types";

export type { Clock, SystemClockOptions, FixedOffsetClockOptions } from "./clock";
export type { RelativeTime, RelativeTimeOptions } from "./relative";
export type { Ok, Err, Result } from "./result";
export type { TimeshiftError } from "./errors";
export type { TagOf, ErrorByTag } from "./tagged-error";
