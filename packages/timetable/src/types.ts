/**
 * Type definitions for the timetable engine.
 */

import type { Bound, DateRange, Duration, Interval, Timestamp } from '@toolgaps/core';

export type { Bound, DateRange, Duration, Interval, Timestamp };

/**
 * Where an instant falls relative to an interval.
 * Both bounds count as inside; a missing bound is infinitely far away.
 */
export type RelativePosition = 'before' | 'contains' | 'after';

/**
 * A free interval produced by inverting a timetable. Gaps carry no payload.
 */
export type Gap = Interval<undefined>;

/**
 * Working hours used when removing after-hours time.
 * Hours are whole hours of the local day, 0-23.
 */
export interface BusinessHours {
	/** Hour the working day opens */
	dayStart: number;
	/** Hour the working day closes; must be later than dayStart */
	dayEnd: number;
}

/**
 * Options for turning a timetable of bookings into openings.
 */
export interface OpeningsOptions {
	/** Reference "now" (defaults to the current time) */
	at?: Date;
	/** Working hours (defaults to 8am-5pm) */
	hours?: BusinessHours;
	/** Drop openings shorter than this */
	minDuration?: Duration;
}
