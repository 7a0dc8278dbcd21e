/*
The solar position model is the simplified NOAA sunrise equation, built on the mean anomaly, equation of center and ecliptic
longitude formulas from the book "Astronomical Algorithms" by Jean Meeus. Position is computed once per day at the Julian day
returned by julianDay(), so the times are typically within a minute of NOAA's solar calculator at low and mid latitudes.

Sunrise and sunset are defined as the moments the center of the sun is 50 arcminutes (5/6 of a degree) below the horizon,
which accounts for the sun's angular radius and average refraction. Twilight boundaries use the usual -6, -12 and -18 degree
thresholds. There is no refraction model beyond that constant and no correction for the observer's elevation.

Times are returned as Luxon DateTimes. Luxon handles projection into the requested time zone.
*/

import {Duration, type DateTime} from "luxon";
import * as mf from "./mathfuncs.ts";
import {
    CENTER_COEFFS, DAILY_MOTION, degToRad, J2000, MEAN_ANOMALY_J2000, OBLIQUITY, PERIHELION_LONG, TRANSIT_ECCENTRICITY,
    TRANSIT_OBLIQUITY
} from "./constants.ts";
import {calendarDate, julianDay, toInstant, type DateInput, type ZoneInput} from "./julian.ts";
import {SUN_EVENTS, type SunEventType} from "./lookup-tables.ts";
import {InvalidCoordinateError, NoEventError} from "./errors.ts";

/** Geographic coordinate in degrees. Latitude is positive north, longitude positive east. */
export type GeoCoordinate = {readonly latitude: number; readonly longitude: number};

/** Coordinate as a [latitude, longitude] pair. */
export type Point = [number, number];

/** Object representing the sun's position on a given Julian day.
 * @param meanAnomaly Mean anomaly in degrees, range [0, 360).
 * @param eclipticLongitude Ecliptic longitude in degrees, range [0, 360).
 * @param declination Declination in degrees, range [-90, 90].
 * @param transit Julian day of solar transit (solar noon) at the observer's longitude.
 */
export type SolarPosition = {meanAnomaly: number; eclipticLongitude: number; declination: number; transit: number};

/** Result of solving for a threshold crossing. occurs is false on days of polar day or polar night. */
export type EventOutcome = {occurs: true; time: DateTime} | {occurs: false};

/** All events for a day, in chronological key order. Events that do not occur are null. */
export type SunEvents = {
    astroDawn: DateTime | null;
    nauticalDawn: DateTime | null;
    civilDawn: DateTime | null;
    sunrise: DateTime | null;
    solarNoon: DateTime;
    sunset: DateTime | null;
    civilDusk: DateTime | null;
    nauticalDusk: DateTime | null;
    astroDusk: DateTime | null;
};

/** Sun's mean anomaly in degrees. */
export function meanAnomaly(jd: number): number {return mf.mod(MEAN_ANOMALY_J2000 + DAILY_MOTION*(jd - J2000), 360);}

/** Equation of center in degrees, given the mean anomaly M in degrees. */
export function equationOfCenter(M: number): number {
    const [c1, c2, c3] = CENTER_COEFFS;
    return c1*mf.sinD(M) + c2*mf.sinD(2*M) + c3*mf.sinD(3*M);
}

/** Sun's ecliptic longitude in degrees, given the mean anomaly M in degrees. */
export function eclipticLongitude(M: number): number {return mf.mod(M + equationOfCenter(M) + PERIHELION_LONG + 180, 360);}

/** Sun's declination in degrees, given its ecliptic longitude in degrees. */
export function declination(lambda: number): number {return Math.asin(mf.sinD(lambda) * mf.sinD(OBLIQUITY)) / degToRad;}

/**
 * Julian day of solar transit, the moment the sun crosses the observer's meridian.
 * @param jd Julian day returned by julianDay().
 * @param long Longitude in degrees, positive east.
 * @param M Mean anomaly in degrees.
 * @param lambda Ecliptic longitude in degrees.
 */
export function solarTransit(jd: number, long: number, M: number, lambda: number): number {
    const n = jd - J2000 - long/360;
    return J2000 + n + TRANSIT_ECCENTRICITY*mf.sinD(M) - TRANSIT_OBLIQUITY*mf.sinD(2*lambda);
}

export function solarPosition(jd: number, long: number): SolarPosition {
    const M = meanAnomaly(jd);
    const lambda = eclipticLongitude(M);
    return {meanAnomaly: M, eclipticLongitude: lambda, declination: declination(lambda), transit: solarTransit(jd, long, M, lambda)};
}

/**
 * Hour angle at which the sun reaches the given altitude.
 * @param lat Latitude in degrees.
 * @param dec Solar declination in degrees.
 * @param altitude Solar altitude in degrees (negative below the horizon).
 * @returns Hour angle in degrees, range [0, 180], or null if the sun never reaches the altitude that day (polar day or night).
 */
export function hourAngle(lat: number, dec: number, altitude: number): number | null {
    const cosH0 = (mf.sinD(altitude) - mf.sinD(lat)*mf.sinD(dec)) / (mf.cosD(lat)*mf.cosD(dec));
    if (Math.abs(cosH0) > 1) {return null;}
    return Math.acos(cosH0) / degToRad;
}

/** Julian day of the rising (before transit) or setting (after transit) crossing for hour angle h0. */
export function eventJulianDay(transit: number, h0: number, rising: boolean): number {
    return rising ? transit - h0/360 : transit + h0/360;
}

/**
 * Calculates sunrise, sunset, twilight and solar noon times for a fixed location. Instances hold only the coordinate, so one
 * calculator can be shared freely.
 *
 * Every threshold event has a throwing accessor (sunrise) and a null-returning one (sunriseOrNull). Both go through
 * solveEvent().
 *
 * Example:
 *     const paris = new SunCalculator(48.87, 2.67);
 *     paris.sunrise({year: 2025, month: 11, day: 2}, "Europe/Paris"); // 2025-11-02T07:38 +01:00
 */
export class SunCalculator {
    readonly latitude: number;
    readonly longitude: number;

    constructor(lat: number, long: number);
    constructor(coordinate: GeoCoordinate | Point);
    constructor(latOrCoordinate: number | GeoCoordinate | Point, long?: number) {
        let lat: number, lon: number;
        if (typeof latOrCoordinate === "number") {
            if (long === undefined) {throw new InvalidCoordinateError(latOrCoordinate, NaN, "longitude is missing");}
            [lat, lon] = [latOrCoordinate, long];
        }
        else if (Array.isArray(latOrCoordinate)) {[lat, lon] = latOrCoordinate;}
        else {[lat, lon] = [latOrCoordinate.latitude, latOrCoordinate.longitude];}

        if (!Number.isFinite(lat) || !Number.isFinite(lon)) {throw new InvalidCoordinateError(lat, lon, "must be finite");}
        if (Math.abs(lat) > 90) {throw new InvalidCoordinateError(lat, lon, "latitude must be between -90 and 90");}
        if (Math.abs(lon) > 180) {throw new InvalidCoordinateError(lat, lon, "longitude must be between -180 and 180");}
        this.latitude = lat;
        this.longitude = lon;
    }

    get coordinate(): GeoCoordinate {return {latitude: this.latitude, longitude: this.longitude};}

    private position(date: DateInput): SolarPosition {
        return solarPosition(julianDay(calendarDate(date)), this.longitude);
    }

    private outcome(pos: SolarPosition, altitude: number, rising: boolean, zone?: ZoneInput): EventOutcome {
        const h0 = hourAngle(this.latitude, pos.declination, altitude);
        if (h0 === null) {return {occurs: false};}
        return {occurs: true, time: toInstant(eventJulianDay(pos.transit, h0, rising), zone)};
    }

    /**
     * Finds the time on the given date at which the sun crosses the given altitude.
     * @param date Calendar date. For a DateTime only the date in its own zone is used.
     * @param altitude Solar altitude in degrees.
     * @param rising True for the morning crossing, false for the evening crossing.
     * @param zone Zone of the returned time. Defaults to UTC.
     */
    solveEvent(date: DateInput, altitude: number, rising: boolean, zone?: ZoneInput): EventOutcome {
        return this.outcome(this.position(date), altitude, rising, zone);
    }

    /** Time of the event. Throws NoEventError if the event does not occur on that date. */
    eventTime(date: DateInput, type: SunEventType, zone?: ZoneInput): DateTime {
        const event = SUN_EVENTS[type];
        const result = this.solveEvent(date, event.altitude, event.rising, zone);
        if (!result.occurs) {throw new NoEventError(type, event.label.toLowerCase());}
        return result.time;
    }

    /** Time of the event, or null if it does not occur on that date. */
    eventTimeOrNull(date: DateInput, type: SunEventType, zone?: ZoneInput): DateTime | null {
        const event = SUN_EVENTS[type];
        const result = this.solveEvent(date, event.altitude, event.rising, zone);
        return result.occurs ? result.time : null;
    }

    sunrise(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "sunrise", zone);}
    sunset(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "sunset", zone);}
    civilDawn(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "civilDawn", zone);}
    civilDusk(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "civilDusk", zone);}
    nauticalDawn(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "nauticalDawn", zone);}
    nauticalDusk(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "nauticalDusk", zone);}
    astroDawn(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "astroDawn", zone);}
    astroDusk(date: DateInput, zone?: ZoneInput) {return this.eventTime(date, "astroDusk", zone);}

    sunriseOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "sunrise", zone);}
    sunsetOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "sunset", zone);}
    civilDawnOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "civilDawn", zone);}
    civilDuskOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "civilDusk", zone);}
    nauticalDawnOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "nauticalDawn", zone);}
    nauticalDuskOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "nauticalDusk", zone);}
    astroDawnOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "astroDawn", zone);}
    astroDuskOrNull(date: DateInput, zone?: ZoneInput) {return this.eventTimeOrNull(date, "astroDusk", zone);}

    /** Time at which the sun crosses the meridian. Solar noon happens every day, even during polar night. */
    solarNoon(date: DateInput, zone?: ZoneInput): DateTime {return toInstant(this.position(date).transit, zone);}

    /** Time from sunrise to sunset. Zero if either does not occur (polar day or polar night). */
    dayLength(date: DateInput): Duration {
        const pos = this.position(date);
        const rise = this.outcome(pos, SUN_EVENTS.sunrise.altitude, true);
        const set = this.outcome(pos, SUN_EVENTS.sunset.altitude, false);
        if (!rise.occurs || !set.occurs) {return Duration.fromMillis(0);}
        return set.time.diff(rise.time);
    }

    /**
     * Returns every event of the day in chronological key order. Events that do not occur are null, so the object can be passed
     * to JSON.stringify as is.
     */
    sunEvents(date: DateInput, zone?: ZoneInput): SunEvents {
        const pos = this.position(date);
        const at = (type: SunEventType) => {
            const result = this.outcome(pos, SUN_EVENTS[type].altitude, SUN_EVENTS[type].rising, zone);
            return result.occurs ? result.time : null;
        };
        return {
            astroDawn: at("astroDawn"),
            nauticalDawn: at("nauticalDawn"),
            civilDawn: at("civilDawn"),
            sunrise: at("sunrise"),
            solarNoon: toInstant(pos.transit, zone),
            sunset: at("sunset"),
            civilDusk: at("civilDusk"),
            nauticalDusk: at("nauticalDusk"),
            astroDusk: at("astroDusk"),
        };
    }
}
