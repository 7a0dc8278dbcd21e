import type {DateTime} from "luxon";
import * as mf from "./mathfuncs.ts";
import {ASTRO_TWILIGHT, CIVIL_TWILIGHT, HORIZON, NAUTICAL_TWILIGHT} from "./constants.ts";

/** Events defined by the sun crossing an altitude threshold. */
export type SunEventType =
    "astroDawn" | "nauticalDawn" | "civilDawn" | "sunrise" | "sunset" | "civilDusk" | "nauticalDusk" | "astroDusk";

/** Every event reported by the bulk query. */
export type SunEventKey = SunEventType | "solarNoon";

/** Object describing a threshold event.
 * @param label Display name, ex: "Civil Dawn".
 * @param altitude Solar altitude in degrees at which the event happens.
 * @param rising True if the sun is rising (dawn, sunrise), false if it is setting (sunset, dusk).
*/
export type SunEventInfo = {label: string; altitude: number; rising: boolean};

export const SUN_EVENTS: Readonly<Record<SunEventType, SunEventInfo>> = {
    astroDawn: {label: "Astro Dawn", altitude: ASTRO_TWILIGHT, rising: true},
    nauticalDawn: {label: "Nautical Dawn", altitude: NAUTICAL_TWILIGHT, rising: true},
    civilDawn: {label: "Civil Dawn", altitude: CIVIL_TWILIGHT, rising: true},
    sunrise: {label: "Sunrise", altitude: HORIZON, rising: true},
    sunset: {label: "Sunset", altitude: HORIZON, rising: false},
    civilDusk: {label: "Civil Dusk", altitude: CIVIL_TWILIGHT, rising: false},
    nauticalDusk: {label: "Nautical Dusk", altitude: NAUTICAL_TWILIGHT, rising: false},
    astroDusk: {label: "Astro Dusk", altitude: ASTRO_TWILIGHT, rising: false},
};

/** Keys of the bulk query, in the order the events happen during the day. */
export const EVENT_ORDER: readonly SunEventKey[] = [
    "astroDawn", "nauticalDawn", "civilDawn", "sunrise", "solarNoon", "sunset", "civilDusk", "nauticalDusk", "astroDusk"
];

export function eventLabel(key: SunEventKey): string {
    return (key === "solarNoon") ? "Solar Noon" : SUN_EVENTS[key].label;
}

/**
 * Converts the sun event to a string (printable using console.log or process.stdout.write).
 * @param type The event key.
 * @param time Time of the event in the zone it should be printed in, or null if the event does not occur.
 * @param twentyFourHours Whether to print time in 12-hour or 24-hour format.
 * @returns A table row with the event name and local time, colored with ANSI escape codes.
 */
export function sunEventString(type: SunEventKey, time: DateTime | null, twentyFourHours = false): string {
    const eventType = eventLabel(type).padStart(14);
    const timeString = (time === null) ? "--" : mf.convertToHMS(mf.convertToMS(time), twentyFourHours);
    const eventStr = `${eventType} | ${timeString.padStart(11)}`;

    const bold = type === "sunrise" || type === "sunset" || type === "solarNoon";
    let [r, g, b] = [128, 128, 128];
    if (type === "sunrise" || type === "sunset") {[r, g, b] = [255, 255, 0];}
    else if (type === "solarNoon") {[r, g, b] = [255, 255, 255];}
    const colorStr = `\x1b[38;2;${r};${g};${b}m`;
    const boldStr = "\x1b[1m";
    const resetStr = "\x1b[0m";
    if (bold) {return colorStr + boldStr + eventStr + resetStr;}
    else {return colorStr + eventStr + resetStr;}
}
