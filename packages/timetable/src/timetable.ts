/**
 * An ordered, non-overlapping collection of intervals.
 */

import { formatTimetable } from './format.js';
import { compareStarts, intervalDuration, invert, subtractInterval } from './intervals.js';
import type { Interval } from './types.js';

/**
 * Owns a sorted, disjoint sequence of intervals and keeps it that way across
 * inversion and subtraction.
 *
 * The constructor trusts its input: intervals must already be sorted by start
 * and must not overlap (touching is fine). Use {@link Timetable.fromUnsorted}
 * for data that arrives in arbitrary order.
 */
export class Timetable<M> {
	private slots: Interval<M>[];

	constructor(intervals: Iterable<Interval<M>> = []) {
		this.slots = Array.from(intervals);
	}

	/**
	 * Builds a timetable from disjoint intervals in any order.
	 */
	static fromUnsorted<M>(intervals: Iterable<Interval<M>>): Timetable<M> {
		return new Timetable(Array.from(intervals).sort(compareStarts));
	}

	get intervals(): readonly Interval<M>[] {
		return this.slots;
	}

	get size(): number {
		return this.slots.length;
	}

	isEmpty(): boolean {
		return this.slots.length === 0;
	}

	first(): Interval<M> | undefined {
		return this.slots[0];
	}

	last(): Interval<M> | undefined {
		return this.slots[this.slots.length - 1];
	}

	/**
	 * The free gaps between this timetable's intervals.
	 */
	inverted(): Timetable<undefined> {
		return new Timetable<undefined>(invert(this.slots));
	}

	/**
	 * Removes everything `other` covers, in place.
	 */
	subtract<O>(other: Interval<O>): this {
		this.slots = subtractInterval(this.slots, other);
		return this;
	}

	/**
	 * Keeps only intervals matching the predicate, in place.
	 */
	retain(predicate: (interval: Interval<M>) => boolean): this {
		this.slots = this.slots.filter(predicate);
		return this;
	}

	/**
	 * Total bounded time in milliseconds, or null if any interval is unbounded.
	 */
	totalDuration(): number | null {
		let total = 0;
		for (const slot of this.slots) {
			const duration = intervalDuration(slot);
			if (duration === null) return null;
			total += duration;
		}
		return total;
	}

	toString(): string {
		return formatTimetable(this.slots);
	}
}
