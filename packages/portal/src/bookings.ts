import { Timetable } from '@toolgaps/timetable';
import { BOOKING_TITLE_PATTERN, parseWithInferredYear, trimOrdinal } from './dates.js';
import type { Booking, BookingRow } from './types.js';

/**
 * Converts one scraped booking row into an interval labelled with its owner.
 */
export function bookingFromRow(row: BookingRow, at: Date = new Date()): Booking {
	return {
		start: parseWithInferredYear(trimOrdinal(row.startTitle), BOOKING_TITLE_PATTERN, at),
		end: parseWithInferredYear(trimOrdinal(row.endTitle), BOOKING_TITLE_PATTERN, at),
		meta: row.owner.trim(),
	};
}

/**
 * Builds a timetable from booking rows in page order.
 */
export function bookingsTimetable(rows: BookingRow[], at: Date = new Date()): Timetable<string> {
	return Timetable.fromUnsorted(rows.map((row) => bookingFromRow(row, at)));
}
