/**
 * Timetable Engine
 *
 * Interval algebra over sorted, disjoint sets of possibly unbounded time ranges.
 * Given the bookings for a piece of equipment, it answers the question:
 * "When is it free during working hours?"
 *
 * @packageDocumentation
 */

// Interval algebra
export {
	compareInstant,
	compareStarts,
	intervalDuration,
	invert,
	isWellFormed,
	isZeroWidth,
	sameBound,
	shiftByDays,
	subtractInterval,
} from './intervals.js';
// Timetable container
export { Timetable } from './timetable.js';
// Policies
export {
	DEFAULT_BUSINESS_HOURS,
	findOpenings,
	subtractAfterHours,
	subtractBeforeNow,
	subtractLessDuration,
	subtractWeekends,
} from './policy.js';
// Presentation
export { formatClock, formatDay, formatTimetable } from './format.js';

// All types
export type {
	Bound,
	BusinessHours,
	DateRange,
	Duration,
	Gap,
	Interval,
	OpeningsOptions,
	RelativePosition,
	Timestamp,
} from './types.js';
