/**
 * Toolgaps Core
 *
 * Shared time primitives for Toolgaps packages.
 * All times are naive local timestamps; no timezone conversion happens anywhere.
 */

/**
 * A point in time, read in the process's local zone.
 */
export type Timestamp = Date;

/**
 * One end of an interval. `null` means unbounded in that direction.
 */
export type Bound = Timestamp | null;

/**
 * A time range that may be open on either side and carries a payload.
 *
 * `start` and `end` are both inclusive when comparing an instant against the
 * interval, but two intervals that share an endpoint touch rather than overlap.
 */
export interface Interval<M = undefined> {
	start: Bound;
	end: Bound;
	meta: M;
}

/**
 * A date range for querying time-bounded data, such as a tool's bookings.
 * `end` may be omitted to ask for everything from `start` onwards.
 */
export interface DateRange {
	start: Date;
	end?: Date;
}

/**
 * Duration as milliseconds or a structured object.
 */
export type Duration =
	| number
	| {
			minutes?: number;
			hours?: number;
			days?: number;
			weeks?: number;
			months?: number;
	  };

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Convert a Duration to milliseconds.
 */
export function durationToMs(duration: Duration): DurationMs {
	if (typeof duration === 'number') {
		return duration;
	}

	let ms = 0;
	if (duration.minutes) ms += duration.minutes * MINUTE_MS;
	if (duration.hours) ms += duration.hours * HOUR_MS;
	if (duration.days) ms += duration.days * DAY_MS;
	if (duration.weeks) ms += duration.weeks * 7 * DAY_MS;
	// For months, approximate as 30 days
	if (duration.months) ms += duration.months * 30 * DAY_MS;

	return ms;
}
