/**
 * Errors raised by the solar calculator. NoEventError is the expected outcome for polar day and polar night;
 * InvalidComputationError means a non-finite value slipped past the hour angle check and should never reach users.
 */

export class NoEventError extends Error {
    constructor(public readonly event: string, label: string) {
        super(`No ${label} occurs on this date for this location (polar night/day)`);
        this.name = "NoEventError";
    }
}

export class InvalidComputationError extends Error {
    constructor(public readonly jd: number) {
        super(`Invalid Julian Day: ${Number.isNaN(jd) ? "NaN" : "infinite"}`);
        this.name = "InvalidComputationError";
    }
}

export class InvalidDateError extends Error {
    constructor(public readonly year: number, public readonly month: number, public readonly day: number, explanation: string | null) {
        const date = `${year}-${month}-${day}`;
        super(explanation ? `Invalid date ${date}: ${explanation}` : `Invalid date ${date}`);
        this.name = "InvalidDateError";
    }
}

export class InvalidCoordinateError extends Error {
    constructor(public readonly latitude: number, public readonly longitude: number, reason: string) {
        super(`Invalid coordinate (${latitude}, ${longitude}): ${reason}`);
        this.name = "InvalidCoordinateError";
    }
}

export class InvalidZoneError extends Error {
    constructor(public readonly zone: string, explanation: string | null) {
        super(explanation ? `Invalid time zone "${zone}": ${explanation}` : `Invalid time zone "${zone}"`);
        this.name = "InvalidZoneError";
    }
}
