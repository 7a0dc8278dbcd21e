export {SunCalculator, solarPosition, hourAngle} from "./core/suncalc.ts";
export type {GeoCoordinate, Point, SolarPosition, EventOutcome, SunEvents} from "./core/suncalc.ts";
export {julianDay, toInstant} from "./core/julian.ts";
export type {CalendarDate, DateInput, ZoneInput} from "./core/julian.ts";
export {SUN_EVENTS, EVENT_ORDER, eventLabel, sunEventString} from "./core/lookup-tables.ts";
export type {SunEventType, SunEventKey, SunEventInfo} from "./core/lookup-tables.ts";
export {NoEventError, InvalidComputationError, InvalidDateError, InvalidCoordinateError, InvalidZoneError} from "./core/errors.ts";
export {HORIZON, CIVIL_TWILIGHT, NAUTICAL_TWILIGHT, ASTRO_TWILIGHT} from "./core/constants.ts";
