import { describe, expect, it } from "vitest";
import { DateTime } from "luxon";
import { calendarDate, jdToUnix, julianDay, toInstant } from "../src/core/julian.ts";
import { InvalidComputationError, InvalidDateError, InvalidZoneError } from "../src/core/errors.ts";

describe("julianDay", () => {
  it("lands on the J2000 epoch for 2000-01-01", () => {
    expect(julianDay({ year: 2000, month: 1, day: 1 })).toBe(2451545.0);
    expect(julianDay({ year: 1999, month: 12, day: 31 })).toBe(2451544.0);
  });

  it("advances one day across month, year and leap-day boundaries", () => {
    expect(julianDay({ year: 2025, month: 2, day: 28 })).toBe(2460735.0);
    expect(julianDay({ year: 2024, month: 2, day: 28 })).toBe(2460369.0);
    expect(julianDay({ year: 2024, month: 12, day: 31 })).toBe(2460676.0);
  });

  it("increases by exactly one per calendar day", () => {
    let prev = julianDay({ year: 2023, month: 12, day: 31 });
    for (let day: DateTime = DateTime.utc(2024, 1, 1); day.year === 2024; day = day.plus({ days: 1 })) {
      const jd = julianDay({ year: day.year, month: day.month, day: day.day });
      expect(jd - prev).toBe(1);
      prev = jd;
    }
  });

  it("rejects dates that do not exist", () => {
    expect(() => julianDay({ year: 2025, month: 2, day: 30 })).toThrow(InvalidDateError);
    expect(() => julianDay({ year: 2025, month: 2, day: 30 })).toThrow("Invalid date 2025-2-30");
    expect(() => julianDay({ year: 2025, month: 13, day: 1 })).toThrow(InvalidDateError);
    expect(() => julianDay({ year: 2025, month: 6, day: 1.5 })).toThrow(InvalidDateError);
    expect(julianDay({ year: 2024, month: 2, day: 29 })).toBe(2460370.0);
  });
});

describe("calendarDate", () => {
  it("reads the date in the DateTime's own zone and drops the time of day", () => {
    const lateTokyo = DateTime.fromISO("2025-11-02T01:30:00", { zone: "Asia/Tokyo" });
    expect(calendarDate(lateTokyo)).toEqual({ year: 2025, month: 11, day: 2 });
    expect(calendarDate({ year: 2025, month: 6, day: 21 })).toEqual({ year: 2025, month: 6, day: 21 });
  });
});

describe("toInstant", () => {
  it("converts Julian days to UTC by default", () => {
    expect(toInstant(2440587.5).toISO()).toBe("1970-01-01T00:00:00.000Z");
    expect(toInstant(2451545.0).toISO()).toBe("2000-01-01T12:00:00.000Z");
  });

  it("projects the instant into the requested zone", () => {
    const instant = toInstant(2451545.25, "UTC+1");
    expect(instant.toISO()).toBe("2000-01-01T19:00:00.000+01:00");
    expect(instant.toMillis()).toBe(toInstant(2451545.25).toMillis());
  });

  it("truncates to whole milliseconds", () => {
    expect(jdToUnix(2451545.0)).toBe(946728000000);
    expect(Number.isInteger(jdToUnix(2460982.123456789))).toBe(true);
  });

  it("rejects non-finite Julian days", () => {
    expect(() => toInstant(Number.NaN)).toThrow(InvalidComputationError);
    expect(() => toInstant(Number.NaN)).toThrow("Invalid Julian Day: NaN");
    expect(() => toInstant(Number.POSITIVE_INFINITY)).toThrow("Invalid Julian Day: infinite");
  });

  it("rejects zones Luxon cannot resolve", () => {
    expect(() => toInstant(2451545.0, "Mars/Olympus_Mons")).toThrow(InvalidZoneError);
  });
});
