/**
 * timeshift/duration
 *
 * Duration builders on their own, for callers that bring their own
 * end-points.
 *
 * @example
 * ```typescript
 * import { Duration, days, years } from 'timeshift/duration';
 *
 * days(2);            // { kind: 'seconds', amount: 172800 }
 * Duration.years(1);  // { kind: 'months', amount: 12 }
 * ```
 */

export {
  // Types
  type Duration as DurationType,
  type DurationKind,
  type DurationUnit,
  type SecondsDuration,
  type MonthsDuration,
} from "./types";

export {
  // Namespace
  Duration,

  // Individual exports (for tree-shaking)
  seconds,
  minutes,
  hours,
  days,
  weeks,
  months,
  years,
  isDuration,
} from "./duration";
