/**
 * Parsing of the portal's year-less date strings.
 */

import { format, isValid, parse } from 'date-fns';
import { PortalError } from './errors.js';

/** Booking row titles, e.g. `9:00am Mon Jan 5` (after the ordinal suffix is trimmed) */
export const BOOKING_TITLE_PATTERN = 'h:mmaaa EEE MMM d';

/** Entries of the user's booking list, e.g. `Jan 5 @ 9:00 am` */
export const USER_BOOKING_PATTERN = 'MMM d @ h:mm aaa';

/** Query dates sent to the portal */
export const QUERY_DATE_PATTERN = 'yyyy-MM-dd';

/** How many years on either side of the reference year are tried */
const YEAR_SEARCH_SPAN = 10;

/**
 * Years to try in order: the reference year, then alternately one later and
 * one earlier, widening each step.
 */
function candidateYears(referenceYear: number): number[] {
	const years = [referenceYear];
	for (let offset = 1; offset < YEAR_SEARCH_SPAN; offset++) {
		years.push(referenceYear + offset, referenceYear - offset);
	}
	return years;
}

/**
 * Removes trailing ordinal suffixes: `Jan 5th` becomes `Jan 5`.
 */
export function trimOrdinal(text: string): string {
	return text.trim().replace(/[stndrh]+$/, '');
}

/**
 * Parses a date string that lacks a year by trying the years closest to `at`.
 *
 * A candidate year is accepted only if formatting the parsed date gives back
 * the input, so a weekday that does not match the date rules that year out.
 *
 * @example
 * ```typescript
 * // Jan 5 2026 is a Monday, so with a 2026 reference the current year wins
 * parseWithInferredYear('9:00am Mon Jan 5', BOOKING_TITLE_PATTERN, new Date('2026-10-19T12:00:00'));
 * // 2026-01-05T09:00
 * ```
 */
export function parseWithInferredYear(text: string, pattern: string, at: Date = new Date()): Date {
	const input = text.trim().replace(/\s+/g, ' ');
	const patternWithYear = `${pattern} yyyy`;

	for (const year of candidateYears(at.getFullYear())) {
		const candidate = `${input} ${year}`;
		const parsed = parse(candidate, patternWithYear, at);
		if (!isValid(parsed)) continue;

		if (format(parsed, patternWithYear).toLowerCase() === candidate.toLowerCase()) {
			return parsed;
		}
	}

	throw new PortalError('parse', `Could not find year for \`${input}\``);
}

export function formatQueryDate(date: Date): string {
	return format(date, QUERY_DATE_PATTERN);
}
