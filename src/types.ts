/**
 * timeshift/types (internal)
 *
 * Value shapes shared by every module. All of them are plain readonly
 * objects: operations return new values and never mutate their inputs.
 */

// =============================================================================
// Durations
// =============================================================================

/**
 * Arithmetic path a duration takes through the adjuster.
 *
 * - `"seconds"` - linear time arithmetic (date and time-of-day both move)
 * - `"months"` - calendar-month arithmetic (date only, day clamped)
 */
export type DurationKind = "seconds" | "months";

/** Unit accepted by the duration builders. */
export type DurationUnit =
  | "seconds"
  | "minutes"
  | "hours"
  | "days"
  | "weeks"
  | "months"
  | "years";

export type SecondsDuration = { readonly kind: "seconds"; readonly amount: number };
export type MonthsDuration = { readonly kind: "months"; readonly amount: number };

/**
 * A normalized magnitude tagged by kind.
 * Create with the builders (`seconds`, `minutes`, ..., `years`).
 */
export type Duration = SecondsDuration | MonthsDuration;

// =============================================================================
// Dates and times
// =============================================================================

/** A calendar date. `month` is 1-12, `day` is 1-31. */
export type CalendarDate = {
  readonly year: number;
  readonly month: number;
  readonly day: number;
};

export type TimeOfDay = {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
};

export type DateTime = {
  readonly date: CalendarDate;
  readonly time: TimeOfDay;
};

/**
 * Point an adjustment starts from. A date-only reference gets the current
 * time-of-day attached.
 */
export type Reference = DateTime | CalendarDate;

/** `"past"` subtracts the duration, `"future"` adds it. */
export type Direction = "past" | "future";

/**
 * Parameters of a single adjustment. Without a reference the clock's
 * current date-time is used.
 */
export type AdjustParams = {
  readonly direction: Direction;
  readonly reference?: Reference;
};
