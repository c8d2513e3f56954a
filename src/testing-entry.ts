/**
 * timeshift/testing
 *
 * Deterministic clocks and Result assertions for tests.
 *
 * @example
 * ```typescript
 * import { createTestClock, expectOk } from 'timeshift/testing';
 *
 * const clock = createTestClock({ date: { year: 2013, month: 9, day: 4 }, time: { hour: 10, minute: 37, second: 45 } });
 * const rt = createRelativeTime({ clock });
 * expect(rt.yesterday().date).toEqual({ year: 2013, month: 9, day: 3 });
 * ```
 */

export {
  // Types
  type TestClock,
  type TestClockOptions,

  // Clock
  createTestClock,

  // Result Assertions (throw on failure, provide type narrowing)
  expectOk,
  expectErr,
} from "./testing";
