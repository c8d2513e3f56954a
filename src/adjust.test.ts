/**
 * Tests for adjust.ts - The duration adjuster
 */
import { describe, it, expect } from "vitest";
import { adjust, tryAdjust } from "./adjust";
import { createFixedOffsetClock } from "./clock";
import { days, hours, minutes, months, seconds, weeks, years } from "./duration";
import { InvalidDateTimeError, InvalidDurationError } from "./errors";
import { expectErr, expectOk } from "./testing";
import type { AdjustParams, DateTime, Direction, Duration } from "./types";

const at = (year: number, month: number, day: number, hour = 0, minute = 0, second = 0): DateTime => ({
  date: { year, month, day },
  time: { hour, minute, second },
});

const utc = createFixedOffsetClock({ now: () => Date.UTC(2013, 8, 3, 17, 31, 19) });

const past = (duration: Duration, reference: DateTime): DateTime =>
  adjust(duration, { direction: "past", reference }, utc);
const future = (duration: Duration, reference: DateTime): DateTime =>
  adjust(duration, { direction: "future", reference }, utc);

describe("adjust() seconds path", () => {
  const reference = at(2013, 9, 4, 10, 37, 45);

  it("subtracts and adds seconds", () => {
    expect(past(seconds(15), reference)).toEqual(at(2013, 9, 4, 10, 37, 30));
    expect(future(seconds(15), reference)).toEqual(at(2013, 9, 4, 10, 38, 0));
  });

  it("subtracts and adds minutes across an hour", () => {
    expect(past(minutes(25), reference)).toEqual(at(2013, 9, 4, 10, 12, 45));
    expect(future(minutes(25), reference)).toEqual(at(2013, 9, 4, 11, 2, 45));
  });

  it("subtracts and adds hours across a day", () => {
    expect(past(hours(11), reference)).toEqual(at(2013, 9, 3, 23, 37, 45));
    expect(future(hours(14), reference)).toEqual(at(2013, 9, 5, 0, 37, 45));
  });

  it("rolls over month and year boundaries", () => {
    expect(future(days(1), at(2013, 9, 3, 8))).toEqual(at(2013, 9, 4, 8));
    expect(past(seconds(1), at(2013, 3, 1))).toEqual(at(2013, 2, 28, 23, 59, 59));
    expect(past(seconds(1), at(2012, 3, 1))).toEqual(at(2012, 2, 29, 23, 59, 59));
    expect(future(seconds(1), at(2013, 12, 31, 23, 59, 59))).toEqual(at(2014, 1, 1));
    expect(past(weeks(1), at(2013, 1, 3, 12))).toEqual(at(2012, 12, 27, 12));
  });

  it("equals linear subtraction of the normalized amount", () => {
    for (const n of [0, 1, 59, 61, 3601, 86399]) {
      expect(clockSeconds(past(seconds(n), reference))).toBe(clockSeconds(reference) - n);
    }
  });

  it("gives the same answer for every unit that normalizes to the same seconds", () => {
    for (const n of [0, 1, 7, 45]) {
      expect(past(minutes(n), reference)).toEqual(past(seconds(n * 60), reference));
      expect(past(hours(n), reference)).toEqual(past(seconds(n * 3600), reference));
      expect(future(days(n), reference)).toEqual(future(seconds(n * 86400), reference));
      expect(future(weeks(n), reference)).toEqual(future(seconds(n * 604800), reference));
    }
  });

  it("computes local results under a fixed offset", () => {
    const plusTwo = createFixedOffsetClock({ offsetMinutes: 120 });
    expect(adjust(hours(14), { direction: "future", reference }, plusTwo)).toEqual(at(2013, 9, 5, 0, 37, 45));
  });
});

function clockSeconds(dateTime: DateTime): number {
  return utc.toEpochSeconds(dateTime);
}

describe("adjust() months path", () => {
  it("moves whole months and keeps the time of day", () => {
    expect(past(months(9), at(2013, 9, 4, 10, 37, 45))).toEqual(at(2012, 12, 4, 10, 37, 45));
    expect(future(months(11), at(2013, 1, 15, 6, 5, 4))).toEqual(at(2013, 12, 15, 6, 5, 4));
    expect(future(months(1), at(2013, 12, 15, 6, 5, 4))).toEqual(at(2014, 1, 15, 6, 5, 4));
  });

  it("clamps to a leap February", () => {
    expect(past(months(6), at(2016, 8, 31))).toEqual(at(2016, 2, 29));
  });

  it("clamps February 29 to 28 a year earlier", () => {
    expect(past(years(1), at(2012, 2, 29, 10, 37, 45))).toEqual(at(2011, 2, 28, 10, 37, 45));
  });

  it("clamps 31 in thirty-day months and keeps it elsewhere", () => {
    expect(future(months(1), at(2013, 3, 31))).toEqual(at(2013, 4, 30));
    expect(future(months(2), at(2013, 5, 31))).toEqual(at(2013, 7, 31));
    expect(future(months(1), at(2013, 1, 30))).toEqual(at(2013, 2, 28));
    expect(future(months(2), at(2013, 1, 30))).toEqual(at(2013, 3, 30));
  });

  it("treats years as twelve months", () => {
    const reference = at(2012, 2, 29, 1, 2, 3);
    for (const n of [0, 1, 3, 4]) {
      expect(past(years(n), reference)).toEqual(past(months(n * 12), reference));
      expect(future(years(n), reference)).toEqual(future(months(n * 12), reference));
    }
  });

  it("does not round-trip a clamped day", () => {
    const start = at(2013, 3, 31, 12);
    const back = past(months(1), start);
    expect(back).toEqual(at(2013, 2, 28, 12));
    expect(future(months(1), back)).toEqual(at(2013, 3, 28, 12));
  });

  it("works beyond the Date range since it never converts to an instant", () => {
    expect(past(months(1), at(300000, 5, 10))).toEqual(at(300000, 4, 10));
  });

  it("handles years whose month index is still a safe integer", () => {
    expect(past(months(1_000_000_000_000_000), at(700_000_000_000_000, 1, 1))).toEqual(
      at(616_666_666_666_666, 9, 1)
    );
  });

  it("throws InvalidDateTimeError when the year has no safe month index", () => {
    expect(() => future(months(0), at(Number.MAX_SAFE_INTEGER, 5, 10))).toThrow(
      "InvalidDateTimeError: date.year 9007199254740991 is too large for month arithmetic"
    );
    expect(() => past(years(1), at(-Number.MAX_SAFE_INTEGER, 5, 10))).toThrow(InvalidDateTimeError);
  });

  it("throws InvalidDurationError when the amount pushes the month index out of range", () => {
    expect(() => future(months(1_000_000_000_000_000), at(700_000_000_000_000, 1, 1))).toThrow(
      "InvalidDurationError: months(1000000000000000) moves the month index past the safe integer range"
    );
    expect(() => future(months(Number.MAX_SAFE_INTEGER), at(2013, 1, 1))).toThrow(InvalidDurationError);
  });
});

describe("adjust() references", () => {
  it("uses the clock when no reference is given", () => {
    expect(adjust(days(1), { direction: "past" }, utc)).toEqual(at(2013, 9, 2, 17, 31, 19));
    expect(adjust(months(1), { direction: "future" }, utc)).toEqual(at(2013, 10, 3, 17, 31, 19));
  });

  it("attaches the current time to a date-only reference", () => {
    const reference = { year: 2013, month: 3, day: 1 };
    expect(adjust(days(1), { direction: "past", reference }, utc)).toEqual(at(2013, 2, 28, 17, 31, 19));
    expect(adjust(months(1), { direction: "past", reference }, utc)).toEqual(at(2013, 2, 1, 17, 31, 19));
  });

  it("never mutates or returns the reference", () => {
    const reference = Object.freeze({
      date: Object.freeze({ year: 2013, month: 9, day: 4 }),
      time: Object.freeze({ hour: 10, minute: 37, second: 45 }),
    });
    const shifted = future(months(0), reference);
    expect(shifted).toEqual(reference);
    expect(shifted).not.toBe(reference);
    expect(shifted.date).not.toBe(reference.date);
  });
});

describe("adjust() out-of-contract input", () => {
  const reference = at(2013, 9, 4, 10, 37, 45);

  it("throws InvalidDurationError for a malformed duration", () => {
    const direction: Direction = "past";
    expect(() => adjust({ kind: "seconds", amount: -5 }, { direction, reference }, utc)).toThrow(
      InvalidDurationError
    );
    expect(() => adjust({ kind: "months", amount: 0.5 }, { direction, reference }, utc)).toThrow(
      "InvalidDurationError: months amount must be a non-negative safe integer"
    );
  });

  it("throws InvalidDateTimeError for an impossible reference", () => {
    expect(() => past(days(1), at(2013, 4, 31))).toThrow(InvalidDateTimeError);
    expect(() => past(days(1), at(2013, 4, 31))).toThrow(
      "InvalidDateTimeError: date.day 31 exceeds 30 days in 2013-04"
    );
    expect(() => future(months(1), at(2013, 4, 1, 24))).toThrow(
      "InvalidDateTimeError: time.hour 24 must be between 0 and 23"
    );
  });

  it("throws InvalidDateTimeError for an unknown direction", () => {
    const params: AdjustParams = JSON.parse('{"direction":"Future"}');
    expect(() => adjust(days(1), { ...params, reference }, utc)).toThrow(
      'InvalidDateTimeError: direction Future must be "past" or "future"'
    );
  });

  it("throws InvalidDateTimeError when the seconds path leaves the Date range", () => {
    expect(() => past(seconds(1), at(300000, 1, 1))).toThrow(
      "InvalidDateTimeError: date.year 300000 is outside the representable range"
    );
  });
});

describe("tryAdjust()", () => {
  it("returns Ok with the adjusted date-time", () => {
    const result = tryAdjust(minutes(25), { direction: "future", reference: at(2013, 9, 4, 10, 37, 45) }, utc);
    expectOk(result);
    expect(result.value).toEqual(at(2013, 9, 4, 11, 2, 45));
  });

  it("returns Err with the tagged error instead of throwing", () => {
    const result = tryAdjust(days(1), { direction: "past", reference: { year: 2013, month: 2, day: 30 } }, utc);
    expectErr(result);
    expect(result.error._tag).toBe("InvalidDateTimeError");
    expect(result.error.message).toBe("InvalidDateTimeError: date.day 30 exceeds 28 days in 2013-02");
  });

  it("returns Err instead of a wrapped-around date for a huge year", () => {
    const reference = at(Number.MAX_SAFE_INTEGER, 5, 10, 12);
    const result = tryAdjust(months(0), { direction: "future", reference }, utc);
    expectErr(result);
    expect(result.error).toBeInstanceOf(InvalidDateTimeError);
    expect(result.error._tag === "InvalidDateTimeError" && result.error.field).toBe("date.year");
  });
});
