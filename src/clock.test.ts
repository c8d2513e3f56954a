/**
 * Tests for clock.ts - Clock collaborators
 */
import { describe, it, expect } from "vitest";
import { createFixedOffsetClock, createSystemClock, systemClock } from "./clock";
import { InvalidDateTimeError } from "./errors";
import type { DateTime } from "./types";

const at = (year: number, month: number, day: number, hour = 0, minute = 0, second = 0): DateTime => ({
  date: { year, month, day },
  time: { hour, minute, second },
});

describe("createFixedOffsetClock()", () => {
  it("defaults to UTC", () => {
    const clock = createFixedOffsetClock();
    expect(clock.toEpochSeconds(at(1970, 1, 1))).toBe(0);
    expect(clock.fromEpochSeconds(0)).toEqual(at(1970, 1, 1));
    expect(clock.toEpochSeconds(at(2013, 9, 4, 10, 37, 45))).toBe(1378291065);
  });

  it("applies a positive offset", () => {
    const clock = createFixedOffsetClock({ offsetMinutes: 120 });
    expect(clock.toEpochSeconds(at(1970, 1, 1, 2))).toBe(0);
    expect(clock.fromEpochSeconds(0)).toEqual(at(1970, 1, 1, 2));
  });

  it("applies a negative offset across midnight", () => {
    const clock = createFixedOffsetClock({ offsetMinutes: -300 });
    expect(clock.fromEpochSeconds(0)).toEqual(at(1969, 12, 31, 19));
    expect(clock.toEpochSeconds(at(1969, 12, 31, 19))).toBe(0);
  });

  it("reads the current time from the injected source, truncated to seconds", () => {
    const clock = createFixedOffsetClock({ now: () => Date.UTC(2013, 8, 3, 17, 31, 19, 999) });
    expect(clock.now()).toEqual(at(2013, 9, 3, 17, 31, 19));
  });

  it("keeps two-digit years literal", () => {
    const clock = createFixedOffsetClock();
    const epoch = clock.toEpochSeconds(at(50, 6, 15, 12));
    expect(clock.fromEpochSeconds(epoch)).toEqual(at(50, 6, 15, 12));
  });

  it("rejects instants outside the Date range", () => {
    const clock = createFixedOffsetClock();
    expect(() => clock.fromEpochSeconds(1e13)).toThrow(InvalidDateTimeError);
    expect(() => clock.fromEpochSeconds(1e13)).toThrow(
      "InvalidDateTimeError: epoch 10000000000000s is outside the representable range"
    );
    expect(() => clock.toEpochSeconds(at(300000, 1, 1))).toThrow(
      "InvalidDateTimeError: date.year 300000 is outside the representable range"
    );
  });
});

describe("createSystemClock()", () => {
  const instant = Date.UTC(2013, 0, 15, 12, 0, 0);

  it("reports the local fields of the current instant", () => {
    const clock = createSystemClock({ now: () => instant });
    const local = new Date(instant);
    expect(clock.now()).toEqual(
      at(
        local.getFullYear(),
        local.getMonth() + 1,
        local.getDate(),
        local.getHours(),
        local.getMinutes(),
        local.getSeconds()
      )
    );
  });

  it("converts local date-times to epoch seconds and back", () => {
    const clock = createSystemClock({ now: () => instant });
    expect(clock.toEpochSeconds(clock.now())).toBe(instant / 1000);
    expect(clock.fromEpochSeconds(instant / 1000)).toEqual(clock.now());
  });

  it("provides a default instance", () => {
    const current = systemClock.now();
    expect(current.date.month).toBeGreaterThanOrEqual(1);
    expect(current.date.month).toBeLessThanOrEqual(12);
    expect(current.time.hour).toBeLessThanOrEqual(23);
  });
});
