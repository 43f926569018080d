/**
 * Type definitions for the portal layer.
 */

import type { DateRange, Interval, Timetable } from '@toolgaps/timetable';
import type { Tool } from './schemas.js';

export type { Tool };

/**
 * Portal credentials.
 */
export interface Login {
	username: string;
	password: string;
}

/**
 * The title attributes scraped from one row of a tool's booking list.
 */
export interface BookingRow {
	/** e.g. `9:00am Mon Jan 5th` */
	startTitle: string;
	/** e.g. `11:00am Mon Jan 5th` */
	endTitle: string;
	/** Name of the person holding the booking */
	owner: string;
}

/**
 * One entry of the signed-in user's booking list.
 */
export interface UserBookingRow {
	toolLabel: string;
	/** e.g. `Jan 5 @ 9:00 am` */
	startText: string;
}

/**
 * Query for a tool's bookings. Dates are `yyyy-MM-dd`.
 */
export interface ToolBookingQuery {
	toolId: string;
	startDate?: string;
	endDate?: string;
}

/**
 * A booking held by the signed-in user.
 */
export interface UserBooking {
	tool: Tool;
	owner: string;
}

// ============================================================================
// Adapter Interface
// ============================================================================

/**
 * Transport to the booking portal, supplied by the caller.
 * JSON endpoints return their raw payload, which is validated here;
 * HTML endpoints return rows already pulled out of the markup.
 */
export interface PortalAdapter {
	/** POST the login form; resolves to the raw response envelope */
	authenticate(login: Login): Promise<unknown>;
	/** Search tools by label; resolves to the raw JSON list */
	getTools(term: string): Promise<unknown>;
	getToolBookingRows(query: ToolBookingQuery): Promise<BookingRow[]>;
	getUserBookingRows(): Promise<UserBookingRow[]>;
}

// ============================================================================
// Engine Interface
// ============================================================================

export interface OpeningsEngine {
	login(login: Login): Promise<void>;
	searchTools(term: string): Promise<Tool[]>;
	getToolByLabel(label: string): Promise<Tool>;
	getToolBookings(tool: Tool, range: DateRange, at?: Date): Promise<Timetable<string>>;
	getToolOpenings(tool: Tool, at?: Date): Promise<Timetable<undefined>>;
	/**
	 * The user's bookings across all tools, sorted by start. Bookings on
	 * different tools may overlap, so this is a list rather than a Timetable.
	 */
	getUserBookings(at?: Date): Promise<Interval<UserBooking>[]>;
	renderToolOpenings(tool: Tool, at?: Date): Promise<string>;
}

export type Booking = Interval<string>;
