/**
 * Openings engine with adapter-based data loading.
 */

import { compareStarts, findOpenings, type DateRange, type Interval, type Timetable } from '@toolgaps/timetable';
import { startOfDay } from 'date-fns';
import { bookingsTimetable } from './bookings.js';
import { DEFAULT_CONFIG, type OpeningsConfig } from './config.js';
import { formatQueryDate, parseWithInferredYear, USER_BOOKING_PATTERN } from './dates.js';
import { PortalError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { retry } from './retry.js';
import { parseTools, unwrapPostResponse } from './schemas.js';
import type {
	Login,
	OpeningsEngine,
	PortalAdapter,
	Tool,
	UserBooking,
	UserBookingRow,
} from './types.js';

export interface CreateOpeningsOptions {
	adapter: PortalAdapter;
	config?: Partial<OpeningsConfig>;
	logger?: Logger;
}

function labelMatches(tool: Tool, term: string): boolean {
	return tool.label.toLowerCase().includes(term.toLowerCase());
}

/**
 * Create an openings engine with the given adapter.
 */
export function createOpenings(options: CreateOpeningsOptions): OpeningsEngine {
	const { adapter } = options;
	const config: OpeningsConfig = {
		logLevel: options.config?.logLevel ?? DEFAULT_CONFIG.logLevel,
		hours: options.config?.hours ?? DEFAULT_CONFIG.hours,
		minDuration: options.config?.minDuration ?? DEFAULT_CONFIG.minDuration,
		retries: options.config?.retries ?? DEFAULT_CONFIG.retries,
	};
	const logger = options.logger ?? createLogger({ level: config.logLevel });

	async function login(credentials: Login): Promise<void> {
		try {
			unwrapPostResponse(await adapter.authenticate(credentials));
		} catch (error) {
			throw new PortalError('auth', 'Failed to authenticate', { cause: error });
		}
		logger.info({ username: credentials.username }, 'authenticated');
	}

	async function searchTools(term: string): Promise<Tool[]> {
		const tools = parseTools(await adapter.getTools(''));
		return tools.filter((tool) => labelMatches(tool, term));
	}

	async function getToolByLabel(label: string): Promise<Tool> {
		const tools = parseTools(await adapter.getTools(label));
		const tool = tools.find((candidate) => candidate.label === label);
		if (!tool) {
			throw new PortalError('input', `No tools match label: ${label}`);
		}
		return tool;
	}

	async function getToolBookings(
		tool: Tool,
		range: DateRange,
		at: Date = new Date(),
	): Promise<Timetable<string>> {
		const rows = await retry(
			() =>
				adapter.getToolBookingRows({
					toolId: tool.id,
					startDate: formatQueryDate(range.start),
					endDate: range.end && formatQueryDate(range.end),
				}),
			{ retries: config.retries, logger, label: `bookings for ${tool.label}` },
		);
		const bookings = bookingsTimetable(rows, at);
		logger.debug({ tool: tool.label, bookings: bookings.size }, 'loaded bookings');
		return bookings;
	}

	async function getToolOpenings(tool: Tool, at: Date = new Date()): Promise<Timetable<undefined>> {
		const bookings = await getToolBookings(tool, { start: startOfDay(at) }, at);
		const openings = findOpenings(bookings, {
			at,
			hours: config.hours,
			minDuration: config.minDuration,
		});
		logger.info(
			{ tool: tool.label, bookings: bookings.size, openings: openings.size },
			'computed openings',
		);
		return openings;
	}

	async function resolveUserBooking(row: UserBookingRow, at: Date): Promise<Interval<UserBooking>> {
		const tool = await getToolByLabel(row.toolLabel);
		const start = parseWithInferredYear(row.startText, USER_BOOKING_PATTERN, at);
		const day = startOfDay(start);
		const bookings = await getToolBookings(tool, { start: day, end: day }, at);

		const booking = bookings.intervals.find(
			(interval) => interval.start !== null && interval.start.getTime() === start.getTime(),
		);
		if (!booking) {
			throw new PortalError('parse', `Booking not found: ${row.toolLabel} at ${row.startText}`);
		}
		return { start: booking.start, end: booking.end, meta: { tool, owner: booking.meta } };
	}

	async function getUserBookings(at: Date = new Date()): Promise<Interval<UserBooking>[]> {
		const rows = await adapter.getUserBookingRows();
		const bookings: Interval<UserBooking>[] = [];
		for (const row of rows) {
			bookings.push(await resolveUserBooking(row, at));
		}
		return bookings.sort(compareStarts);
	}

	async function renderToolOpenings(tool: Tool, at: Date = new Date()): Promise<string> {
		const openings = await getToolOpenings(tool, at);
		return `Openings for \`${tool.label}\`\n${openings.toString()}`;
	}

	return {
		login,
		searchTools,
		getToolByLabel,
		getToolBookings,
		getToolOpenings,
		getUserBookings,
		renderToolOpenings,
	};
}
