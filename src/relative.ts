/**
 * timeshift/relative
 *
 * End-point operations and convenience accessors. A builder produces a
 * duration, an end-point applies it:
 *
 * ```typescript
 * pipe(10, minutes, ago);
 * pipe(15, hours, fromNow);
 * before(months(4), pipe(2, weeks, fromNow));
 * ```
 *
 * Month arithmetic clamps the day-of-month, so month steps do not commute
 * with other steps around February. Apply month shifts last when the day
 * matters.
 */

import { adjust } from "./adjust";
import { toIsoString } from "./calendar";
import { systemClock, type Clock } from "./clock";
import { days, months, weeks, years } from "./duration";
import type { CalendarDate, DateTime, Direction, Duration, Reference } from "./types";

export type RelativeTimeOptions = {
  /** Clock supplying the current time and zone rules. Default: `systemClock` */
  clock?: Clock;
  /** Called with one line per end-point call. Default: no-op */
  logger?: (message: string) => void;
};

export interface RelativeTime {
  readonly clock: Clock;

  /** Apply a duration to the current date-time, backwards. */
  ago(duration: Duration): DateTime;
  /** Apply a duration to the current date-time, forwards. */
  fromNow(duration: Duration): DateTime;
  /** Apply a duration to a reference, backwards. */
  before(duration: Duration, reference: Reference): DateTime;
  /** Apply a duration to a reference, forwards. */
  from(duration: Duration, reference: Reference): DateTime;

  now(): DateTime;
  today(): CalendarDate;
  yesterday(): DateTime;
  tomorrow(): DateTime;
  lastWeek(): DateTime;
  nextWeek(): DateTime;
  lastMonth(): DateTime;
  nextMonth(): DateTime;
  lastYear(): DateTime;
  nextYear(): DateTime;
}

/**
 * Create end-points and accessors bound to one clock.
 *
 * @example
 * ```typescript
 * const rt = createRelativeTime({
 *   clock: createFixedOffsetClock({ offsetMinutes: 0 }),
 *   logger: (message) => console.debug(message),
 * });
 *
 * rt.before(days(3), { year: 2013, month: 9, day: 3 });
 * ```
 */
export function createRelativeTime(options: RelativeTimeOptions = {}): RelativeTime {
  const { clock = systemClock, logger = () => {} } = options;

  const run = (
    operation: string,
    duration: Duration,
    direction: Direction,
    reference?: Reference
  ): DateTime => {
    const result = adjust(duration, { direction, reference }, clock);
    logger(`${operation}: ${duration.amount} ${duration.kind} -> ${toIsoString(result)}`);
    return result;
  };

  const ago = (duration: Duration): DateTime => run("ago", duration, "past");
  const fromNow = (duration: Duration): DateTime => run("fromNow", duration, "future");

  return {
    clock,
    ago,
    fromNow,
    before: (duration, reference) => run("before", duration, "past", reference),
    from: (duration, reference) => run("from", duration, "future", reference),

    now: () => clock.now(),
    today: () => clock.now().date,
    yesterday: () => ago(days(1)),
    tomorrow: () => fromNow(days(1)),
    lastWeek: () => ago(weeks(1)),
    nextWeek: () => fromNow(weeks(1)),
    lastMonth: () => ago(months(1)),
    nextMonth: () => fromNow(months(1)),
    lastYear: () => ago(years(1)),
    nextYear: () => fromNow(years(1)),
  };
}

// =============================================================================
// Default instance (system clock)
// =============================================================================

const defaultRelativeTime = createRelativeTime();

export const {
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
} = defaultRelativeTime;
