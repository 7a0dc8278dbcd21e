import {DateTime} from "luxon";
import {find} from "geo-tz";
import {SunCalculator} from "../src/core/suncalc.ts";

/* Prints the day's events as JSON. Events that do not occur are written as null.
Example: "npx tsx scripts/events-json.ts 78.22 15.65 2025-12-15" for Longyearbyen during polar night. */
const args = process.argv;
if (args.length < 4 || args.length > 6) {
    console.log("Syntax: npx tsx scripts/events-json.ts <lat> <long> [date] [zone]");
    process.exit(1);
}

const [lat, long] = [Number(args[2]), Number(args[3])];
if (!(Math.abs(lat) <= 90) || !(Math.abs(long) <= 180)) {
    console.log("Latitude must be between -90 and 90 and longitude between -180 and 180");
    process.exit(1);
}

const zone = (args.length === 6) ? args[5] : find(lat, long)[0];
const date = (args.length >= 5) ? DateTime.fromISO(args[4], {zone: zone}) : DateTime.now().setZone(zone);
if (!date.isValid) {
    console.log(`Invalid date or time zone: ${date.invalidExplanation}`);
    process.exit(1);
}

const sun = new SunCalculator([lat, long]);
const output = {
    latitude: lat,
    longitude: long,
    zone: zone,
    date: date.toISODate(),
    dayLengthSeconds: sun.dayLength(date).as("seconds"),
    events: sun.sunEvents(date, zone),
};
console.log(JSON.stringify(output, null, 2));
