// This file contains constant values such as the conversion factor between degrees and radians, the solar altitude thresholds
// for each event, and the calibration of the simplified solar position model.

/** The number of radians in a degree, or the factor to multiply by when converting an angle from degrees to radians.
 * To convert from radians to degrees, divide by degToRad.
*/
export const degToRad = Math.PI/180;

/** Solar elevation thresholds in degrees for sunrise/sunset (HORIZON), civil, nautical and astronomical twilight. */
export const HORIZON = -5/6;
export const CIVIL_TWILIGHT = -6;
export const NAUTICAL_TWILIGHT = -12;
export const ASTRO_TWILIGHT = -18;

/** Julian day of the J2000.0 epoch (2000-01-01 12:00). */
export const J2000 = 2451545.0;

/** Julian day of the Unix epoch (1970-01-01 00:00 UTC). */
export const JD_UNIX_EPOCH = 2440587.5;

/** Number of seconds in 24 hours. */
export const DAY_SECONDS = 86400;

// Gregorian calendar to Julian day (Meeus, chapter 7)
export const JULIAN_YEAR = 365.25;
export const JULIAN_MONTH_FACTOR = 30.6001;
export const JULIAN_YEAR_OFFSET = 4716;
export const JULIAN_BASE_OFFSET = 1524.5;
export const JULIAN_MIDNIGHT_FIX = 0.5;

/** Mean anomaly of the sun at J2000.0, in degrees. */
export const MEAN_ANOMALY_J2000 = 357.5291;

/** Daily motion used for the mean anomaly, in degrees per day. */
export const DAILY_MOTION = 0.98564736;

/** Longitude of Earth's perihelion, in degrees. */
export const PERIHELION_LONG = 102.9373;

/** Mean obliquity of the ecliptic, in degrees. */
export const OBLIQUITY = 23.43929111;

/** Equation of center coefficients for sin(M), sin(2M) and sin(3M). */
export const CENTER_COEFFS = [1.9148, 0.0200, 0.0003] as const;

/** Transit corrections for orbital eccentricity (sin M) and obliquity (sin 2λ), in days. */
export const TRANSIT_ECCENTRICITY = 0.00534;
export const TRANSIT_OBLIQUITY = 0.00692;
