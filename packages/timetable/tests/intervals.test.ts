import { describe, expect, test } from 'vitest';
import {
	compareInstant,
	compareStarts,
	intervalDuration,
	invert,
	isWellFormed,
	isZeroWidth,
	sameBound,
	shiftByDays,
	subtractInterval,
} from '../src/intervals.js';
import type { Bound, Interval } from '../src/types.js';

// Local wall-clock times; no timezone suffix on purpose
const d = (iso: string) => new Date(iso);
const at = (time: string) => d(`2024-01-01T${time}:00`);

function slot<M = undefined>(start: string | null, end: string | null, meta?: M): Interval<M | undefined> {
	return {
		start: start === null ? null : at(start),
		end: end === null ? null : at(end),
		meta,
	};
}

function gap(start: string | null, end: string | null): Interval<undefined> {
	return slot(start, end);
}

describe('sameBound', () => {
	test('treats two missing bounds as equal', () => {
		expect(sameBound(null, null)).toBe(true);
	});

	test('compares dates by value', () => {
		expect(sameBound(at('09:00'), at('09:00'))).toBe(true);
		expect(sameBound(at('09:00'), at('09:01'))).toBe(false);
	});

	test('a missing bound never equals a present one', () => {
		expect(sameBound(null, at('09:00'))).toBe(false);
		expect(sameBound(at('09:00'), null)).toBe(false);
	});
});

describe('isZeroWidth', () => {
	test('is true only when both ends coincide', () => {
		expect(isZeroWidth(at('10:00'), at('10:00'))).toBe(true);
		expect(isZeroWidth(at('10:00'), at('10:30'))).toBe(false);
		expect(isZeroWidth(at('10:00'), null)).toBe(false);
	});
});

describe('compareInstant', () => {
	test('an interval unbounded on both ends contains everything', () => {
		expect(compareInstant(gap(null, null), at('03:00'))).toBe('contains');
	});

	test('end-only interval', () => {
		const interval = gap(null, '12:00');
		expect(compareInstant(interval, at('06:00'))).toBe('contains');
		expect(compareInstant(interval, at('12:00'))).toBe('contains');
		expect(compareInstant(interval, at('12:01'))).toBe('after');
	});

	test('start-only interval', () => {
		const interval = gap('12:00', null);
		expect(compareInstant(interval, at('11:59'))).toBe('before');
		expect(compareInstant(interval, at('12:00'))).toBe('contains');
		expect(compareInstant(interval, at('23:00'))).toBe('contains');
	});

	test('bounded interval includes both ends', () => {
		const interval = gap('09:00', '17:00');
		expect(compareInstant(interval, at('08:59'))).toBe('before');
		expect(compareInstant(interval, at('09:00'))).toBe('contains');
		expect(compareInstant(interval, at('17:00'))).toBe('contains');
		expect(compareInstant(interval, at('17:01'))).toBe('after');
	});
});

describe('compareStarts', () => {
	test('orders by start with a missing start first', () => {
		const sorted = [slot('11:00', '12:00', 'late'), slot('09:00', '10:00', 'early'), slot(null, '08:00', 'open')].sort(
			compareStarts,
		);

		expect(sorted.map((interval) => interval.meta)).toEqual(['open', 'early', 'late']);
	});
});

describe('intervalDuration', () => {
	test('returns milliseconds for bounded intervals', () => {
		expect(intervalDuration(gap('09:00', '10:30'))).toBe(90 * 60 * 1000);
	});

	test('returns null when either end is open', () => {
		expect(intervalDuration(gap(null, '10:30'))).toBeNull();
		expect(intervalDuration(gap('09:00', null))).toBeNull();
	});
});

describe('shiftByDays', () => {
	test('moves both bounds and keeps metadata', () => {
		const shifted = shiftByDays(slot('17:00', '23:00', 'night'), 2);
		expect(shifted).toEqual({
			start: d('2024-01-03T17:00:00'),
			end: d('2024-01-03T23:00:00'),
			meta: 'night',
		});
	});

	test('leaves missing bounds missing and accepts negative offsets', () => {
		const shifted = shiftByDays(gap('08:00', null), -1);
		expect(shifted.start).toEqual(d('2023-12-31T08:00:00'));
		expect(shifted.end).toBeNull();
	});
});

describe('isWellFormed', () => {
	test('accepts sorted intervals that touch', () => {
		expect(isWellFormed([gap(null, '09:00'), gap('09:00', '10:00'), gap('11:00', null)])).toBe(true);
	});

	test('accepts an empty sequence', () => {
		expect(isWellFormed([])).toBe(true);
	});

	test('rejects overlap', () => {
		expect(isWellFormed([gap('09:00', '11:00'), gap('10:00', '12:00')])).toBe(false);
	});

	test('rejects unsorted input', () => {
		expect(isWellFormed([gap('13:00', '14:00'), gap('09:00', '10:00')])).toBe(false);
	});

	test('rejects zero-width intervals', () => {
		expect(isWellFormed([gap('09:00', '09:00')])).toBe(false);
	});

	test('rejects open ends anywhere but the edges', () => {
		expect(isWellFormed([gap('08:00', '09:00'), gap(null, '10:00')])).toBe(false);
		expect(isWellFormed([gap('08:00', null), gap('10:00', '11:00')])).toBe(false);
	});
});

describe('invert', () => {
	test('an empty timetable is free forever', () => {
		expect(invert([])).toEqual([gap(null, null)]);
	});

	test('a timetable busy forever has no gaps', () => {
		expect(invert([slot(null, null, 'maintenance')])).toEqual([]);
	});

	test('busy until a point leaves everything after it', () => {
		expect(invert([gap(null, '09:00')])).toEqual([gap('09:00', null)]);
	});

	test('returns leading, inner, and trailing gaps', () => {
		const bookings = [slot('09:00', '11:00', 'alice'), slot('13:00', '15:00', 'bob')];
		expect(invert(bookings)).toEqual([gap(null, '09:00'), gap('11:00', '13:00'), gap('15:00', null)]);
	});

	test('touching bookings produce no zero-width gap', () => {
		const bookings = [slot('09:00', '10:00', 'alice'), slot('10:00', '11:00', 'bob')];
		expect(invert(bookings)).toEqual([gap(null, '09:00'), gap('11:00', null)]);
	});

	test('drops metadata', () => {
		const gaps = invert([slot('09:00', '10:00', 'alice')]);
		expect(gaps.every((g) => g.meta === undefined)).toBe(true);
	});

	test('inverting twice restores a bounded timetable', () => {
		const bookings = [gap('09:00', '11:00'), gap('13:00', '15:00')];
		expect(invert(invert(bookings))).toEqual(bookings);
	});

	test('does not share Date instances with the input', () => {
		const bookings = [gap('09:00', '11:00')];
		const [leading] = invert(bookings);
		expect(leading.end).toEqual(bookings[0].start);
		expect(leading.end).not.toBe(bookings[0].start);
	});
});

describe('subtractInterval', () => {
	const lab = [slot('09:00', '11:00', 'lab')];

	test('punches a hole and copies metadata to both pieces', () => {
		expect(subtractInterval(lab, gap('10:00', '10:30'))).toEqual([
			slot('09:00', '10:00', 'lab'),
			slot('10:30', '11:00', 'lab'),
		]);
	});

	test('removes an interval the other one covers', () => {
		expect(subtractInterval([slot('09:00', '10:00', 'lab')], gap('09:00', '11:00'))).toEqual([]);
		expect(subtractInterval([slot('09:30', '10:00', 'lab')], gap('09:00', '11:00'))).toEqual([]);
	});

	test('trims the start', () => {
		expect(subtractInterval(lab, gap('08:00', '10:00'))).toEqual([slot('10:00', '11:00', 'lab')]);
	});

	test('trims the end', () => {
		expect(subtractInterval(lab, gap('10:00', '12:00'))).toEqual([slot('09:00', '10:00', 'lab')]);
	});

	test('removing from an exact boundary leaves no zero-width piece', () => {
		expect(subtractInterval(lab, gap('09:00', '10:00'))).toEqual([slot('10:00', '11:00', 'lab')]);
		expect(subtractInterval(lab, gap('10:00', '11:00'))).toEqual([slot('09:00', '10:00', 'lab')]);
	});

	test('leaves disjoint and touching intervals alone', () => {
		expect(subtractInterval(lab, gap('12:00', '13:00'))).toEqual(lab);
		expect(subtractInterval(lab, gap('11:00', '12:00'))).toEqual(lab);
		expect(subtractInterval(lab, gap('07:00', '09:00'))).toEqual(lab);
	});

	test('subtracting everything clears the timetable', () => {
		expect(subtractInterval([gap(null, '09:00'), gap('10:00', null)], gap(null, null))).toEqual([]);
	});

	test('subtracting up to a point', () => {
		const table = [slot('09:00', '11:00', 'a'), slot('12:00', '13:00', 'b')];
		expect(subtractInterval(table, gap(null, '10:00'))).toEqual([
			slot('10:00', '11:00', 'a'),
			slot('12:00', '13:00', 'b'),
		]);
		expect(subtractInterval(table, gap(null, '11:00'))).toEqual([slot('12:00', '13:00', 'b')]);
		expect(subtractInterval(table, gap(null, '08:00'))).toEqual(table);
	});

	test('subtracting from a point onwards', () => {
		const table = [slot('09:00', '11:00', 'a'), slot('12:00', '13:00', 'b')];
		expect(subtractInterval(table, gap('10:00', null))).toEqual([slot('09:00', '10:00', 'a')]);
		expect(subtractInterval(table, gap('09:00', null))).toEqual([]);
		expect(subtractInterval(table, gap('14:00', null))).toEqual(table);
	});

	test('trims open-ended intervals', () => {
		const free = [gap(null, '09:00'), gap('17:00', null)];
		expect(subtractInterval(free, gap('08:00', '18:00'))).toEqual([gap(null, '08:00'), gap('18:00', null)]);
		expect(subtractInterval([gap(null, null)], gap('08:00', '18:00'))).toEqual([
			gap(null, '08:00'),
			gap('18:00', null),
		]);
	});

	test('zero-width and reversed intervals remove nothing', () => {
		expect(subtractInterval(lab, gap('10:00', '10:00'))).toEqual(lab);
		expect(subtractInterval(lab, gap('10:30', '10:00'))).toEqual(lab);
	});

	test('subtracting twice is the same as subtracting once', () => {
		const table = [slot('09:00', '12:00', 'a'), slot('13:00', '17:00', 'b')];
		const cut = gap('11:00', '14:00');
		const once = subtractInterval(table, cut);
		expect(subtractInterval(once, cut)).toEqual(once);
	});

	test('keeps the timetable sorted and disjoint', () => {
		let table: Interval<string | undefined>[] = [
			slot(null, '08:00', 'early'),
			slot('09:00', '12:00', 'a'),
			slot('12:00', '15:00', 'b'),
			slot('16:00', null, 'late'),
		];
		const cuts: [Bound, Bound][] = [
			[at('10:00'), at('10:30')],
			[at('11:45'), at('12:15')],
			[at('07:00'), at('09:30')],
			[at('20:00'), null],
			[null, at('06:00')],
		];
		for (const [start, end] of cuts) {
			table = subtractInterval(table, { start, end, meta: undefined });
			expect(isWellFormed(table)).toBe(true);
		}
		expect(table).toEqual([
			slot('06:00', '07:00', 'early'),
			slot('09:30', '10:00', 'a'),
			slot('10:30', '11:45', 'a'),
			slot('12:15', '15:00', 'b'),
			slot('16:00', '20:00', 'late'),
		]);
	});

	test('does not mutate its input', () => {
		const table = [slot('09:00', '11:00', 'lab')];
		subtractInterval(table, gap('10:00', '10:30'));
		expect(table).toEqual([slot('09:00', '11:00', 'lab')]);
	});
});
