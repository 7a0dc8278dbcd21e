import {Duration, type DateTime} from "luxon";
import {degToRad} from "./constants.ts";

/** Calculates x modulo y, where the output is in the range [0, y). */
export function mod(x: number, y: number) {return ((x % y) + y) % y;}

/** Sine of an angle given in degrees. */
export function sinD(angle: number) {return Math.sin(angle * degToRad);}

/** Cosine of an angle given in degrees. */
export function cosD(angle: number) {return Math.cos(angle * degToRad);}

/** Returns the time of day in the DateTime as a number of milliseconds, from 0 (00:00:00.000) to 86399999 (23:59:59.999). */
export function convertToMS(date: DateTime) {
    return 1000 * (date.hour * 3600 + date.minute * 60 + date.second) + date.millisecond;
}

/** Convert a time of day in milliseconds to hh:mm:ss in either 12 or 24-hour format. */
export function convertToHMS(timeOfDay: number, twentyFourHours: boolean) {
    const timeOfDayS = Math.floor(timeOfDay / 1000);
    const second = mod(timeOfDayS, 60);
    const minute = Math.floor(mod(timeOfDayS/60, 60));
    const hour24 = Math.floor(timeOfDayS/3600);
    const hour12 = mod(hour24 - 1, 12) + 1;
    const minString = String(minute).padStart(2, "0");
    const secString = String(second).padStart(2, "0");
    const hourString24 = String(hour24).padStart(2, "0");
    if (twentyFourHours) {return `${hourString24}:${minString}:${secString}`;} // ex: 09:47:29
    else if (hour24 <= 11) {return `${hour12}:${minString}:${secString} am`;} // ex: 9:47:29 am
    else {return `${hour12}:${minString}:${secString} pm`;} // ex: 9:47:29 pm
}

/** Like toFixed() function in JavaScript/TypeScript, but removes trailing zeroes. */
export function toFixedS(n: number, precision: number) {
    if (precision === 0) {return n.toFixed(0);}
    else {return n.toFixed(precision).replace(/\.?0+$/, "");}
}

/** Rounds a duration to the nearest whole second, so toFormat("h:mm:ss") does not truncate it. */
export function roundToSeconds(d: Duration) {return Duration.fromMillis(1000*Math.round(d.toMillis()/1000));}
