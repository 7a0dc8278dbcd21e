import {DateTime, type Zone} from "luxon";
import {
    DAY_SECONDS, JD_UNIX_EPOCH, JULIAN_BASE_OFFSET, JULIAN_MIDNIGHT_FIX, JULIAN_MONTH_FACTOR, JULIAN_YEAR, JULIAN_YEAR_OFFSET
} from "./constants.ts";
import {InvalidComputationError, InvalidDateError, InvalidZoneError} from "./errors.ts";

/** A civil date in the proleptic Gregorian calendar. Month and day are 1-based. */
export type CalendarDate = {year: number; month: number; day: number};

/** Dates are accepted either as plain calendar dates or as Luxon DateTimes (only the date part is read). */
export type DateInput = CalendarDate | DateTime;

/** Output time zone: an IANA identifier ("Europe/Paris"), a fixed offset ("UTC+1"), or a Luxon Zone. */
export type ZoneInput = string | Zone;

/** Extracts the calendar date from the input. For a DateTime the date is read in the DateTime's own zone and the time of day
 * is discarded.
 */
export function calendarDate(date: DateInput): CalendarDate {
    return {year: date.year, month: date.month, day: date.day};
}

/**
 * Converts a calendar date to the Julian day used by the solar position model (Meeus, formula 7.1).
 *
 * The date is advanced by one day before conversion and the result is shifted back by half a day afterwards, so the
 * value lands on 12:00 UTC of the requested date (2000-01-01 gives 2451545.0). The transit corrections are calibrated
 * against this value.
 * Throws InvalidDateError if the date does not exist, ex: February 30.
 */
export function julianDay(date: CalendarDate): number {
    const start = DateTime.utc(date.year, date.month, date.day);
    if (!start.isValid) {throw new InvalidDateError(date.year, date.month, date.day, start.invalidExplanation);}
    const next = start.plus({days: 1});
    let y = next.year, m = next.month;
    const d = next.day;
    if (m <= 2) {
        y -= 1;
        m += 12;
    }
    const a = Math.floor(y / 100);
    const b = 2 - a + Math.floor(a / 4);
    const jd = Math.floor(JULIAN_YEAR * (y + JULIAN_YEAR_OFFSET)) + Math.floor(JULIAN_MONTH_FACTOR * (m + 1)) + d + b - JULIAN_BASE_OFFSET;
    return jd - JULIAN_MIDNIGHT_FIX;
}

/** Converts a Julian day to Unix milliseconds. Seconds are computed in double precision, then truncated to whole milliseconds. */
export function jdToUnix(jd: number): number {
    const seconds = (jd - JD_UNIX_EPOCH) * DAY_SECONDS;
    return Math.trunc(seconds * 1000);
}

/**
 * Converts a Julian day to a Luxon DateTime.
 * @param jd Julian day. Must be finite.
 * @param zone Zone the result is expressed in. Defaults to UTC.
 */
export function toInstant(jd: number, zone: ZoneInput = "utc"): DateTime {
    if (!Number.isFinite(jd)) {throw new InvalidComputationError(jd);}
    const instant = DateTime.fromMillis(jdToUnix(jd), {zone: zone});
    if (!instant.isValid) {
        throw new InvalidZoneError(typeof zone === "string" ? zone : zone.name, instant.invalidExplanation);
    }
    return instant;
}
