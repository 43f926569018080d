/**
 * Availability policies built from repeated subtraction.
 */

import { durationToMs } from '@toolgaps/core';
import { addDays, isSaturday, previousSaturday, set, startOfDay } from 'date-fns';
import { intervalDuration, shiftByDays } from './intervals.js';
import type { Timetable } from './timetable.js';
import type { BusinessHours, Duration, Gap, OpeningsOptions } from './types.js';

/** Default working day: 8am to 5pm */
export const DEFAULT_BUSINESS_HOURS: BusinessHours = { dayStart: 8, dayEnd: 17 };

/**
 * The latest timestamp in the timetable, used to stop generating windows.
 * Falls back to `at` when the last interval has no bounds at all.
 */
function horizonOf<M>(table: Timetable<M>, at: Date): Date | null {
	const last = table.last();
	if (!last) {
		return null;
	}
	return last.end ?? last.start ?? at;
}

/**
 * Subtracts a generated window repeatedly, stepping it forward by `stepDays`
 * until it starts after the horizon. The horizon is fixed before the first
 * subtraction so that shrinking the timetable cannot move it.
 */
function subtractRepeating<M>(table: Timetable<M>, seed: Gap, stepDays: number, at: Date): void {
	const horizon = horizonOf(table, at);
	if (horizon === null) {
		return;
	}

	let window = seed;
	while (window.start !== null && window.start <= horizon) {
		table.subtract(window);
		window = shiftByDays(window, stepDays);
	}
}

/**
 * Removes all time up to `at`.
 */
export function subtractBeforeNow<M>(table: Timetable<M>, at: Date = new Date()): Timetable<M> {
	return table.subtract({ start: null, end: at, meta: undefined });
}

/**
 * Removes every weekend, Saturday 00:00 to Monday 00:00, from the weekend
 * containing (or preceding) `at` onwards.
 */
export function subtractWeekends<M>(table: Timetable<M>, at: Date = new Date()): Timetable<M> {
	const today = startOfDay(at);
	const saturday = isSaturday(today) ? today : previousSaturday(today);

	const weekend: Gap = { start: saturday, end: addDays(saturday, 2), meta: undefined };

	subtractRepeating(table, weekend, 7, at);
	return table;
}

/**
 * Removes the overnight window, from closing time until opening time the
 * next morning, for every day from two days before `at` onwards.
 */
export function subtractAfterHours<M>(
	table: Timetable<M>,
	at: Date = new Date(),
	hours: BusinessHours = DEFAULT_BUSINESS_HOURS,
): Timetable<M> {
	const today = startOfDay(at);
	const closing = set(today, { hours: hours.dayEnd });
	const opening = set(today, { hours: hours.dayStart });

	const tonight: Gap = { start: closing, end: addDays(opening, 1), meta: undefined };

	subtractRepeating(table, shiftByDays(tonight, -2), 1, at);
	return table;
}

/**
 * Drops intervals shorter than `minDuration`. Unbounded intervals are never too short.
 */
export function subtractLessDuration<M>(table: Timetable<M>, minDuration: Duration): Timetable<M> {
	const minMs = durationToMs(minDuration);
	return table.retain((interval) => {
		const duration = intervalDuration(interval);
		return duration === null || duration >= minMs;
	});
}

/**
 * Turns a timetable of bookings into the openings a person could actually use:
 * the gaps between bookings, from `at` onwards, on weekdays, within working hours.
 *
 * @example
 * ```typescript
 * const openings = findOpenings(bookings, {
 *   at: new Date('2024-01-03T10:00:00'),
 *   minDuration: { hours: 1 },
 * });
 * console.log(openings.toString());
 * ```
 */
export function findOpenings<M>(busy: Timetable<M>, options: OpeningsOptions = {}): Timetable<undefined> {
	const { at = new Date(), hours = DEFAULT_BUSINESS_HOURS, minDuration } = options;

	const openings = busy.inverted();
	subtractBeforeNow(openings, at);
	subtractWeekends(openings, at);
	subtractAfterHours(openings, at, hours);
	if (minDuration !== undefined) {
		subtractLessDuration(openings, minDuration);
	}
	return openings;
}
