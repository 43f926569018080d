/**
 * @toolgaps/portal
 *
 * Glue between an equipment-booking portal and the timetable engine:
 * validates portal payloads, parses its year-less dates, retries flaky
 * requests, and turns a tool's bookings into a listing of openings.
 */

// ============================================================================
// Types
// ============================================================================

export type {
	Booking,
	BookingRow,
	Login,
	OpeningsEngine,
	PortalAdapter,
	Tool,
	ToolBookingQuery,
	UserBooking,
	UserBookingRow,
} from './types.js';

// ============================================================================
// Engine
// ============================================================================

export { createOpenings, type CreateOpeningsOptions } from './engine.js';

// ============================================================================
// Parsing
// ============================================================================

export { bookingFromRow, bookingsTimetable } from './bookings.js';
export {
	BOOKING_TITLE_PATTERN,
	QUERY_DATE_PATTERN,
	USER_BOOKING_PATTERN,
	formatQueryDate,
	parseWithInferredYear,
	trimOrdinal,
} from './dates.js';
export {
	PostResponseSchema,
	ToolListSchema,
	ToolSchema,
	parseTools,
	unwrapPostResponse,
	type PostResponse,
} from './schemas.js';

// ============================================================================
// Ambient
// ============================================================================

export {
	DEFAULT_CONFIG,
	EnvSchema,
	loadConfig,
	parseConfig,
	type Env,
	type LogLevel,
	type OpeningsConfig,
} from './config.js';
export { PortalError, type PortalErrorKind } from './errors.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';
export { retry, type RetryOptions } from './retry.js';
