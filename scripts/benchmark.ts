import {DateTime} from "luxon";
import {SunCalculator} from "../src/core/suncalc.ts";
import type {CalendarDate} from "../src/core/julian.ts";

/* Times each operation over random locations (latitude -90..90, longitude -180..180) and dates (2020-2030).
Example: "npx tsx scripts/benchmark.ts 100000" */

const iterations = (process.argv.length >= 3) ? Number(process.argv[2]) : 100000;
if (!Number.isInteger(iterations) || iterations <= 0) {
    console.log("Iterations must be a positive integer");
    process.exit(1);
}

/** Linear congruential generator, so runs are repeatable. */
function createRng(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (1664525 * state + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}

const rand = createRng(0x5eed);
const cases: [SunCalculator, CalendarDate][] = [];
for (let i=0; i<iterations; i++) {
    const sun = new SunCalculator(rand()*180 - 90, rand()*360 - 180);
    // days capped at 28 so every month is valid
    const date = {year: 2020 + Math.floor(rand()*11), month: 1 + Math.floor(rand()*12), day: 1 + Math.floor(rand()*28)};
    cases.push([sun, date]);
}

function benchmark(name: string, op: (sun: SunCalculator, date: CalendarDate) => unknown) {
    const start = performance.now();
    for (const [sun, date] of cases) {op(sun, date);}
    const elapsed = performance.now() - start;
    const msPerOp = elapsed / iterations;
    const opsPerSec = Math.round(iterations / (elapsed / 1000));
    console.log(`${name.padEnd(25)} ${msPerOp.toFixed(4).padStart(8)} ms/op  ${String(opsPerSec).padStart(10)} ops/s`);
}

console.log("Sun events benchmark");
console.log("=".repeat(50));
console.log(`Iterations: ${iterations}`);
console.log(`Started: ${DateTime.now().toISO()}`);
console.log("=".repeat(50));
console.log();

benchmark("sunriseOrNull", (sun, date) => sun.sunriseOrNull(date));
benchmark("sunsetOrNull", (sun, date) => sun.sunsetOrNull(date));
benchmark("solarNoon", (sun, date) => sun.solarNoon(date));
benchmark("dayLength", (sun, date) => sun.dayLength(date));
benchmark("civilDawnOrNull", (sun, date) => sun.civilDawnOrNull(date));
benchmark("sunEvents", (sun, date) => sun.sunEvents(date));
benchmark("sunEvents (Europe/Paris)", (sun, date) => sun.sunEvents(date, "Europe/Paris"));
