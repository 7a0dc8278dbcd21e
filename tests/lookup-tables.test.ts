import { describe, expect, it } from "vitest";
import { DateTime } from "luxon";
import { EVENT_ORDER, SUN_EVENTS, eventLabel, sunEventString } from "../src/core/lookup-tables.ts";
import { ASTRO_TWILIGHT, CIVIL_TWILIGHT, HORIZON, NAUTICAL_TWILIGHT } from "../src/core/constants.ts";

describe("event catalogue", () => {
  it("pairs each dawn with the dusk at the same altitude", () => {
    expect(SUN_EVENTS.sunrise).toEqual({ label: "Sunrise", altitude: HORIZON, rising: true });
    expect(SUN_EVENTS.sunset).toEqual({ label: "Sunset", altitude: HORIZON, rising: false });
    expect(SUN_EVENTS.civilDawn.altitude).toBe(CIVIL_TWILIGHT);
    expect(SUN_EVENTS.nauticalDusk.altitude).toBe(NAUTICAL_TWILIGHT);
    expect(SUN_EVENTS.astroDawn.altitude).toBe(ASTRO_TWILIGHT);
    expect(SUN_EVENTS.astroDusk.rising).toBe(false);
  });

  it("lists the nine bulk keys from astronomical dawn to astronomical dusk", () => {
    expect(EVENT_ORDER).toHaveLength(9);
    expect(EVENT_ORDER[0]).toBe("astroDawn");
    expect(EVENT_ORDER[4]).toBe("solarNoon");
    expect(EVENT_ORDER[8]).toBe("astroDusk");
  });

  it("labels events", () => {
    expect(eventLabel("solarNoon")).toBe("Solar Noon");
    expect(eventLabel("nauticalDusk")).toBe("Nautical Dusk");
  });
});

describe("sunEventString", () => {
  it("prints sunrise in bold yellow with a 12-hour time", () => {
    const t = DateTime.fromISO("2025-11-02T07:38:19", { zone: "utc" });
    expect(sunEventString("sunrise", t)).toBe("\x1b[38;2;255;255;0m\x1b[1m       Sunrise |  7:38:19 am\x1b[0m");
  });

  it("prints solar noon in bold white with a 24-hour time", () => {
    const t = DateTime.fromISO("2025-11-02T12:32:46", { zone: "utc" });
    expect(sunEventString("solarNoon", t, true)).toBe("\x1b[38;2;255;255;255m\x1b[1m    Solar Noon |    12:32:46\x1b[0m");
  });

  it("prints twilight in grey and marks events that do not occur", () => {
    expect(sunEventString("astroDawn", null)).toBe("\x1b[38;2;128;128;128m    Astro Dawn |          --\x1b[0m");
  });

  it("uses the wall clock of the DateTime's zone", () => {
    const t = DateTime.fromISO("2025-11-02T17:27:12", { zone: "utc" }).setZone("Asia/Tokyo");
    expect(sunEventString("civilDusk", t, true)).toBe("\x1b[38;2;128;128;128m    Civil Dusk |    02:27:12\x1b[0m");
  });
});
