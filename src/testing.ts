/**
 * timeshift/testing
 *
 * Deterministic clocks and Result assertions for tests.
 *
 * @example
 * ```typescript
 * import { createTestClock } from 'timeshift/testing';
 *
 * const clock = createTestClock({ date: { year: 2013, month: 9, day: 3 }, time: { hour: 17, minute: 31, second: 19 } });
 * const rt = createRelativeTime({ clock });
 *
 * rt.tomorrow(); // 2013-09-04 17:31:19
 * clock.advance(60);
 * rt.now(); // 2013-09-03 17:32:19
 * ```
 */

import { createFixedOffsetClock, type Clock } from "./clock";
import type { Err, Ok, Result } from "./result";
import { unwrap } from "./result";
import type { DateTime } from "./types";
import { checkDateTime } from "./validation";

export type TestClockOptions = {
  /** Offset of local time from UTC in minutes. Default: 0 */
  offsetMinutes?: number;
};

export interface TestClock extends Clock {
  /** Move the current time forwards (or backwards, if negative) by whole seconds. */
  advance(seconds: number): void;
  /** Jump to a local date-time. */
  set(dateTime: DateTime): void;
  /** Return to the start date-time and clear the read count. */
  reset(): void;
  /** Number of `now()` calls since creation or the last reset. */
  reads(): number;
}

/**
 * Create a fixed-offset clock whose current time only moves when told to.
 */
export function createTestClock(start: DateTime, options: TestClockOptions = {}): TestClock {
  let currentMs = 0;
  let readCount = 0;
  const zone = createFixedOffsetClock({
    offsetMinutes: options.offsetMinutes,
    now: () => currentMs,
  });

  const epochMsOf = (dateTime: DateTime): number =>
    zone.toEpochSeconds(unwrap(checkDateTime(dateTime))) * 1000;

  const startMs = epochMsOf(start);
  currentMs = startMs;

  return {
    now: () => {
      readCount += 1;
      return zone.now();
    },
    toEpochSeconds: zone.toEpochSeconds,
    fromEpochSeconds: zone.fromEpochSeconds,
    advance: (seconds) => {
      currentMs += seconds * 1000;
    },
    set: (dateTime) => {
      currentMs = epochMsOf(dateTime);
    },
    reset: () => {
      currentMs = startMs;
      readCount = 0;
    },
    reads: () => readCount,
  };
}

// =============================================================================
// Result Assertions
// =============================================================================

/**
 * Asserts that a Result is Ok and narrows the type.
 *
 * @example
 * ```typescript
 * const result = tryAdjust(days(1), { direction: 'past', reference });
 * expectOk(result);
 * result.value.date.day;
 * ```
 */
export function expectOk<T, E>(result: Result<T, E>): asserts result is Ok<T> {
  if (!result.ok) {
    const detail = result.error instanceof Error ? result.error.message : JSON.stringify(result.error);
    throw new Error(`Expected Ok result, got Err: ${detail}`);
  }
}

/**
 * Asserts that a Result is Err and narrows the type.
 */
export function expectErr<T, E>(result: Result<T, E>): asserts result is Err<E> {
  if (result.ok) {
    throw new Error(`Expected Err result, got Ok: ${JSON.stringify(result.value)}`);
  }
}
