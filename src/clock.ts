/**
 * timeshift/clock
 *
 * The wall-clock collaborator. The adjuster never reads global time
 * itself: it asks a Clock for the current date-time and for conversions
 * between local date-times and epoch seconds.
 *
 * @example
 * ```typescript
 * import { createRelativeTime, createFixedOffsetClock } from 'timeshift';
 *
 * // Everything in UTC+02:00, whatever the process zone is
 * const rt = createRelativeTime({ clock: createFixedOffsetClock({ offsetMinutes: 120 }) });
 * rt.yesterday();
 * ```
 */

import { InvalidDateTimeError } from "./errors";
import type { DateTime } from "./types";

export interface Clock {
  /** Current local date-time. */
  now(): DateTime;
  /** Absolute time of a local date-time, under the zone rules of that instant. */
  toEpochSeconds(dateTime: DateTime): number;
  /** Local date-time of an absolute time, under the zone rules of that instant. */
  fromEpochSeconds(epochSeconds: number): DateTime;
}

export type SystemClockOptions = {
  /** Source of the current time in epoch milliseconds. Default: `Date.now` */
  now?: () => number;
};

export type FixedOffsetClockOptions = SystemClockOptions & {
  /** Offset of local time from UTC in minutes, e.g. `-300` for UTC-05:00. Default: 0 */
  offsetMinutes?: number;
};

const MS_PER_SECOND = 1000;

function toDate(epochSeconds: number): Date {
  const date = new Date(epochSeconds * MS_PER_SECOND);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateTimeError({ reason: `epoch ${epochSeconds}s is outside the representable range` });
  }
  return date;
}

function toEpoch(date: Date, dateTime: DateTime): number {
  const ms = date.getTime();
  if (Number.isNaN(ms)) {
    throw new InvalidDateTimeError({
      field: "date.year",
      value: dateTime.date.year,
      reason: "is outside the representable range",
    });
  }
  return ms / MS_PER_SECOND;
}

/**
 * Clock in the local zone of the process. Offset changes (daylight saving)
 * are applied as the platform reports them for each instant.
 */
export function createSystemClock(options: SystemClockOptions = {}): Clock {
  const currentMs = options.now ?? Date.now;

  const fromEpochSeconds = (epochSeconds: number): DateTime => {
    const d = toDate(epochSeconds);
    return {
      date: { year: d.getFullYear(), month: d.getMonth() + 1, day: d.getDate() },
      time: { hour: d.getHours(), minute: d.getMinutes(), second: d.getSeconds() },
    };
  };

  return {
    now: () => fromEpochSeconds(Math.floor(currentMs() / MS_PER_SECOND)),
    toEpochSeconds: (dateTime) => {
      const { date, time } = dateTime;
      const d = new Date(0);
      // setFullYear keeps years 0-99 literal, unlike the Date constructor
      d.setFullYear(date.year, date.month - 1, date.day);
      d.setHours(time.hour, time.minute, time.second, 0);
      return toEpoch(d, dateTime);
    },
    fromEpochSeconds,
  };
}

/**
 * Clock with a constant UTC offset. Deterministic across machines.
 */
export function createFixedOffsetClock(options: FixedOffsetClockOptions = {}): Clock {
  const currentMs = options.now ?? Date.now;
  const offsetSeconds = (options.offsetMinutes ?? 0) * 60;

  const fromEpochSeconds = (epochSeconds: number): DateTime => {
    const d = toDate(epochSeconds + offsetSeconds);
    return {
      date: { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() },
      time: { hour: d.getUTCHours(), minute: d.getUTCMinutes(), second: d.getUTCSeconds() },
    };
  };

  return {
    now: () => fromEpochSeconds(Math.floor(currentMs() / MS_PER_SECOND)),
    toEpochSeconds: (dateTime) => {
      const { date, time } = dateTime;
      const d = new Date(0);
      d.setUTCFullYear(date.year, date.month - 1, date.day);
      d.setUTCHours(time.hour, time.minute, time.second, 0);
      return toEpoch(d, dateTime) - offsetSeconds;
    },
    fromEpochSeconds,
  };
}

/** Default clock: the process's local zone and `Date.now`. */
export const systemClock: Clock = createSystemClock();
