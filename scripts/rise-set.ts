import {DateTime} from "luxon";
import {find} from "geo-tz";
import {SunCalculator} from "../src/core/suncalc.ts";
import {EVENT_ORDER, sunEventString} from "../src/core/lookup-tables.ts";
import * as mf from "../src/core/mathfuncs.ts";

const args = process.argv;
if (args.length < 4 || args.length > 6) {
    /* Accepts coordinates, then optionally a date and a time zone. Example: "npx tsx scripts/rise-set.ts 40.75 -73.99" gives
    today's times for Manhattan, New York City in Eastern Time. "npx tsx scripts/rise-set.ts 40.75 -73.99 2025-06-20" gives
    times for June 20, 2025. A fourth argument overrides the time zone, ex: "UTC" or "Europe/Paris". */
    console.log("Syntax: npx tsx scripts/rise-set.ts <lat> <long> [date] [zone]");
    process.exit(1);
}

const [lat, long] = [Number(args[2]), Number(args[3])];
if (!(Math.abs(lat) <= 90)) {
    console.log("Latitude must be between -90 and 90");
    process.exit(1);
}
else if (!(Math.abs(long) <= 180)) {
    console.log("Longitude must be between -180 and 180");
    process.exit(1);
}

const zone = (args.length === 6) ? args[5] : find(lat, long)[0];
const date = (args.length >= 5) ? DateTime.fromISO(args[4], {zone: zone}) : DateTime.now().setZone(zone);
if (!date.isValid) {
    console.log(`Invalid date or time zone: ${date.invalidExplanation}`);
    process.exit(1);
}

const sun = new SunCalculator(lat, long);
const events = sun.sunEvents(date, zone);
const dayLength = mf.roundToSeconds(sun.dayLength(date));

console.log(`${mf.toFixedS(lat, 4)}, ${mf.toFixedS(long, 4)} (${zone})`);
console.log(date.toLocaleString(DateTime.DATE_FULL));
console.log(`Day length: ${dayLength.toFormat("h:mm:ss")}`);
console.log();

console.log("         Event |        Time"); // header
for (const key of EVENT_ORDER) {console.log(sunEventString(key, events[key]));}
