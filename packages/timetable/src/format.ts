/**
 * Plain-text rendering of a timetable, grouped under one header per calendar day.
 */

import { format, isSameDay } from 'date-fns';
import type { Bound, Interval } from './types.js';

const HEADER_WIDTH = 23;
const SEPARATOR = ' - ';
const BLANK_TIME = '       ';

function center(text: string, width: number): string {
	const padding = Math.max(width - text.length, 0);
	const left = Math.floor(padding / 2);
	return ' '.repeat(left) + text + ' '.repeat(padding - left);
}

/**
 * Day label such as `Monday Jan  1 2024` (day of month padded to two columns).
 */
export function formatDay(date: Date): string {
	return `${format(date, 'EEEE MMM')} ${format(date, 'd').padStart(2, ' ')} ${format(date, 'yyyy')}`;
}

/**
 * Clock label such as ` 9:05am` or `12:30pm`, always seven columns wide.
 */
export function formatClock(date: Date): string {
	return format(date, 'h:mmaaa').padStart(BLANK_TIME.length, ' ');
}

function dayHeader(date: Date): string {
	return `[ ${center(formatDay(date), HEADER_WIDTH)} ]\n`;
}

/**
 * Renders intervals as `start - end` lines under day headers. A new header is
 * written whenever a boundary lands on a different day than the previous one,
 * so an interval that runs past midnight is split across two headers. Missing
 * bounds render as blank space.
 *
 * @example
 * ```text
 * [   Monday Jan  1 2024    ]
 *  9:00am - 11:00am
 *  1:00pm -  5:00pm
 * ```
 */
export function formatTimetable<M>(intervals: readonly Interval<M>[]): string {
	if (intervals.length === 0) {
		return 'Empty Timetable';
	}

	const first = intervals[0];
	const anchor = first.start ?? first.end;
	if (anchor === null) {
		throw new Error('Cannot render an interval that is unbounded on both ends');
	}

	let currentDay = anchor;
	let output = dayHeader(currentDay);

	const boundaries: Bound[] = intervals.flatMap((interval) => [interval.start, interval.end]);

	boundaries.forEach((bound, index) => {
		const isEnd = index % 2 === 1;

		if (bound !== null && !isSameDay(bound, currentDay)) {
			currentDay = bound;
			if (isEnd) output += SEPARATOR;
			output += '\n';
			output += dayHeader(currentDay);
			if (isEnd) output += BLANK_TIME;
		}

		if (isEnd) output += SEPARATOR;
		output += bound === null ? BLANK_TIME : formatClock(bound);
		if (isEnd) output += '\n';
	});

	return output;
}
