import { describe, expect, test } from 'vitest';
import { bookingFromRow, bookingsTimetable } from '../src/bookings.js';

const d = (iso: string) => new Date(iso);
const reference = d('2026-01-05T08:00:00');

describe('bookingFromRow', () => {
	test('parses both titles and trims the owner', () => {
		const booking = bookingFromRow(
			{ startTitle: '9:00am Mon Jan 5th', endTitle: '11:30am Mon Jan 5th', owner: '  Ada  ' },
			reference,
		);

		expect(booking).toEqual({
			start: d('2026-01-05T09:00:00'),
			end: d('2026-01-05T11:30:00'),
			meta: 'Ada',
		});
	});
});

describe('bookingsTimetable', () => {
	test('sorts rows by start time', () => {
		const table = bookingsTimetable(
			[
				{ startTitle: '2:00pm Tue Jan 6th', endTitle: '3:00pm Tue Jan 6th', owner: 'Grace' },
				{ startTitle: '9:00am Mon Jan 5th', endTitle: '10:00am Mon Jan 5th', owner: 'Ada' },
			],
			reference,
		);

		expect(table.intervals.map((booking) => booking.meta)).toEqual(['Ada', 'Grace']);
		expect(table.first()?.start).toEqual(d('2026-01-05T09:00:00'));
	});

	test('is empty without rows', () => {
		expect(bookingsTimetable([], reference).isEmpty()).toBe(true);
	});
});
