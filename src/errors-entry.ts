/**
 * timeshift/errors entry point
 *
 * Errors raised for out-of-contract durations and references.
 */
export {
  // Base
  TaggedError,
  type TagOf,
  type ErrorByTag,
} from "./tagged-error";

export {
  // Errors
  InvalidDurationError,
  InvalidDateTimeError,
  // Union type
  type TimeshiftError,
  // Type guards
  isInvalidDurationError,
  isInvalidDateTimeError,
  isTimeshiftError,
} from "./errors";
