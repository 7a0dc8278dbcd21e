import { describe, expect, it } from "vitest";
import { HORIZON, NoEventError, SunCalculator, julianDay, toInstant } from "../src/index.ts";

describe("package entry", () => {
  it("exposes the calculator and its helpers", () => {
    const sun = new SunCalculator({ latitude: 51.5, longitude: -0.13 });
    const date = { year: 2025, month: 11, day: 5 };
    const outcome = sun.solveEvent(date, HORIZON, true, "Europe/London");

    expect(outcome.occurs).toBe(true);
    if (outcome.occurs) {
      expect(outcome.time.toFormat("HH:mm")).toBe("07:01");
    }
    expect(toInstant(julianDay({ year: 2000, month: 1, day: 1 })).toISO()).toBe("2000-01-01T12:00:00.000Z");
    expect(new NoEventError("sunrise", "sunrise").name).toBe("NoEventError");
  });
});
