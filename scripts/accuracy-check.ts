import {DateTime} from "luxon";
import fs from "fs";
import path from "path";
import {SunCalculator} from "../src/core/suncalc.ts";

/* Compares calculated sunrise, sunset and solar noon against reference times from NOAA's solar calculator
(https://gml.noaa.gov/grad/solcalc/). Run from the repository root: "npx tsx scripts/accuracy-check.ts" */

type ReferenceRecord = {
    name: string; latitude: number; longitude: number; zone: string; date: string;
    sunrise: string; sunset: string; solarNoon: string;
};
function referenceTimes(): ReferenceRecord[] {
    const jsonPath = path.join("data", "reference-times.json");
    const raw = fs.readFileSync(jsonPath, "utf8");
    return JSON.parse(raw) as ReferenceRecord[];
}

/** Difference in whole seconds between the calculated time and the reference time of day on the same date. */
function secondsOff(calculated: DateTime, date: string, reference: string, zone: string): number {
    const expected = DateTime.fromISO(`${date}T${reference}`, {zone: zone});
    return Math.round(Math.abs(calculated.diff(expected).as("seconds")));
}

let worst = 0;
for (const ref of referenceTimes()) {
    const sun = new SunCalculator(ref.latitude, ref.longitude);
    const date = DateTime.fromISO(ref.date, {zone: ref.zone});
    const rows: [string, DateTime, string][] = [
        ["sunrise", sun.sunrise(date, ref.zone), ref.sunrise],
        ["sunset", sun.sunset(date, ref.zone), ref.sunset],
        ["solar noon", sun.solarNoon(date, ref.zone), ref.solarNoon],
    ];

    console.log(`Location: ${ref.name}`);
    console.log(`Date: ${ref.date}`);
    console.log(`Timezone: ${ref.zone}`);
    console.log();
    for (const [label, calculated, reference] of rows) {
        const diff = secondsOff(calculated, ref.date, reference, ref.zone);
        worst = Math.max(worst, diff);
        console.log(`Calculated ${label}:`.padEnd(23) + calculated.toFormat("HH:mm:ss"));
        console.log(`Reference ${label}:`.padEnd(23) + reference);
        console.log("Difference:".padEnd(23) + `${diff} seconds`);
        console.log();
    }
    console.log("=".repeat(80));
    console.log();
}
console.log(`Largest difference: ${worst} seconds`);
