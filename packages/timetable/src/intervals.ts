/**
 * Interval algebra over sorted, disjoint sequences of possibly unbounded intervals.
 * These functions never mutate their input; callers that want in-place
 * behaviour go through the Timetable class.
 */

import { addDays } from 'date-fns';
import type { Bound, Gap, Interval, RelativePosition, Timestamp } from './types.js';

function cloneBound(bound: Bound): Bound {
	return bound === null ? null : new Date(bound.getTime());
}

function withBounds<M>(start: Bound, end: Bound, meta: M): Interval<M> {
	return { start: cloneBound(start), end: cloneBound(end), meta };
}

/**
 * Checks whether two bounds denote the same point, treating two missing bounds as equal.
 */
export function sameBound(a: Bound, b: Bound): boolean {
	if (a === null || b === null) {
		return a === b;
	}
	return a.getTime() === b.getTime();
}

/**
 * A fragment whose start equals its end covers no time and is never stored.
 */
export function isZeroWidth(start: Bound, end: Bound): boolean {
	return sameBound(start, end);
}

/**
 * Sort comparator by start; a missing start sorts first.
 */
export function compareStarts<M>(a: Interval<M>, b: Interval<M>): number {
	if (a.start === null) return b.start === null ? 0 : -1;
	if (b.start === null) return 1;
	return a.start.getTime() - b.start.getTime();
}

/**
 * Classifies an instant against an interval.
 *
 * @example
 * ```typescript
 * const morning = { start: d('2024-01-01T09:00'), end: d('2024-01-01T12:00'), meta: undefined };
 * compareInstant(morning, d('2024-01-01T12:00')); // 'contains'
 * compareInstant(morning, d('2024-01-01T08:00')); // 'before'
 * ```
 */
export function compareInstant<M>(interval: Interval<M>, instant: Timestamp): RelativePosition {
	const { start, end } = interval;
	if (start !== null && instant < start) {
		return 'before';
	}
	if (end !== null && instant > end) {
		return 'after';
	}
	return 'contains';
}

/**
 * Length of an interval in milliseconds, or null when either end is unbounded.
 */
export function intervalDuration<M>(interval: Interval<M>): number | null {
	if (interval.start === null || interval.end === null) {
		return null;
	}
	return interval.end.getTime() - interval.start.getTime();
}

/**
 * Translates both bounds by whole local days. Missing bounds stay missing.
 */
export function shiftByDays<M>(interval: Interval<M>, days: number): Interval<M> {
	return {
		start: interval.start === null ? null : addDays(interval.start, days),
		end: interval.end === null ? null : addDays(interval.end, days),
		meta: interval.meta,
	};
}

/**
 * Checks the timetable invariant: sorted by start, no shared instants between
 * neighbours, only the first interval may lack a start, only the last may lack
 * an end, and nothing is zero-width.
 */
export function isWellFormed<M>(intervals: readonly Interval<M>[]): boolean {
	for (let i = 0; i < intervals.length; i++) {
		const { start, end } = intervals[i];

		if (start !== null && end !== null && start >= end) return false;
		if (start === null && i !== 0) return false;
		if (end === null && i !== intervals.length - 1) return false;

		if (i > 0) {
			const previousEnd = intervals[i - 1].end;
			// Neighbours may touch but not overlap
			if (previousEnd === null || start === null || start < previousEnd) return false;
		}
	}
	return true;
}

/**
 * Computes the free gaps around a sorted, disjoint set of intervals.
 * Metadata is dropped; touching neighbours produce no gap.
 *
 * @example
 * ```typescript
 * invert([
 *   { start: d('2024-01-01T09:00'), end: d('2024-01-01T11:00'), meta: 'a' },
 *   { start: d('2024-01-01T13:00'), end: d('2024-01-01T15:00'), meta: 'b' },
 * ]);
 * // [(null, 09:00), (11:00, 13:00), (15:00, null)]
 * ```
 */
export function invert<M>(intervals: readonly Interval<M>[]): Gap[] {
	if (intervals.length === 0) {
		return [{ start: null, end: null, meta: undefined }];
	}

	const first = intervals[0];
	const last = intervals[intervals.length - 1];

	if (intervals.length === 1 && first.start === null && first.end === null) {
		return [];
	}

	const gaps: Gap[] = [];

	if (first.start !== null) {
		gaps.push(withBounds(null, first.start, undefined));
	}

	for (let i = 1; i < intervals.length; i++) {
		const previous = intervals[i - 1];
		const current = intervals[i];
		if (!sameBound(previous.end, current.start)) {
			gaps.push(withBounds(previous.end, current.start, undefined));
		}
	}

	if (last.end !== null) {
		gaps.push(withBounds(last.end, null, undefined));
	}

	return gaps;
}

/**
 * Emits the parts of `interval` left after removing `other`: nothing, the
 * interval itself, a trimmed piece, or two pieces around a hole.
 */
function remainderOf<M, O>(interval: Interval<M>, other: Interval<O>): Interval<M>[] {
	const { start, end, meta } = interval;
	const pieces: Interval<M>[] = [];

	const keep = (pieceStart: Bound, pieceEnd: Bound) => {
		if (!isZeroWidth(pieceStart, pieceEnd)) {
			pieces.push(withBounds(pieceStart, pieceEnd, meta));
		}
	};

	const otherStart = other.start;
	const otherEnd = other.end;

	if (otherStart === null) {
		if (otherEnd === null) {
			return pieces;
		}
		switch (compareInstant(interval, otherEnd)) {
			case 'before':
				pieces.push(interval);
				break;
			case 'contains':
				keep(otherEnd, end);
				break;
			case 'after':
				break;
		}
		return pieces;
	}

	if (otherEnd === null) {
		switch (compareInstant(interval, otherStart)) {
			case 'before':
				break;
			case 'contains':
				keep(start, otherStart);
				break;
			case 'after':
				pieces.push(interval);
				break;
		}
		return pieces;
	}

	const startPosition = compareInstant(interval, otherStart);
	const endPosition = compareInstant(interval, otherEnd);

	if (startPosition === 'before' && endPosition === 'after') {
		// Swallowed whole
		return pieces;
	}
	if (startPosition === 'before' && endPosition === 'contains') {
		keep(otherEnd, end);
		return pieces;
	}
	if (startPosition === 'contains' && endPosition === 'after') {
		keep(start, otherStart);
		return pieces;
	}
	if (startPosition === 'contains' && endPosition === 'contains') {
		keep(start, otherStart);
		keep(otherEnd, end);
		return pieces;
	}

	// (before, before) and (after, after): no overlap
	pieces.push(interval);
	return pieces;
}

/**
 * Removes everything `other` covers from a sorted, disjoint set of intervals.
 * Intervals are trimmed, split around a hole, or dropped entirely; surviving
 * pieces keep the metadata of the interval they came from.
 *
 * A bounded `other` whose start is not before its end removes nothing.
 *
 * @example
 * ```typescript
 * subtractInterval(
 *   [{ start: d('2024-01-01T09:00'), end: d('2024-01-01T11:00'), meta: 'lab' }],
 *   { start: d('2024-01-01T10:00'), end: d('2024-01-01T10:30'), meta: undefined },
 * );
 * // [(09:00, 10:00, 'lab'), (10:30, 11:00, 'lab')]
 * ```
 */
export function subtractInterval<M, O>(
	intervals: readonly Interval<M>[],
	other: Interval<O>,
): Interval<M>[] {
	if (other.start !== null && other.end !== null && other.start >= other.end) {
		return [...intervals];
	}

	const result: Interval<M>[] = [];
	for (const interval of intervals) {
		result.push(...remainderOf(interval, other));
	}
	return result;
}
