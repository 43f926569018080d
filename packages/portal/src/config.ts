import type { BusinessHours, Duration } from '@toolgaps/timetable';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// A variable set to an empty string counts as unset
function unsetWhenEmpty<T extends z.ZodTypeAny>(schema: T) {
	return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

export const EnvSchema = z
	.object({
		LOG_LEVEL: unsetWhenEmpty(z.enum(LOG_LEVELS).default('info')),
		OPENINGS_DAY_START: unsetWhenEmpty(z.coerce.number().int().min(0).max(23).default(8)),
		OPENINGS_DAY_END: unsetWhenEmpty(z.coerce.number().int().min(0).max(23).default(17)),
		OPENINGS_MIN_DURATION_MINUTES: unsetWhenEmpty(z.coerce.number().positive().optional()),
		PORTAL_RETRIES: unsetWhenEmpty(z.coerce.number().int().min(0).default(10)),
	})
	.refine((env) => env.OPENINGS_DAY_END > env.OPENINGS_DAY_START, {
		message: 'OPENINGS_DAY_END must be later than OPENINGS_DAY_START',
		path: ['OPENINGS_DAY_END'],
	});

export type Env = z.infer<typeof EnvSchema>;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface OpeningsConfig {
	logLevel: LogLevel;
	/** Working hours kept when listing openings */
	hours: BusinessHours;
	/** Openings shorter than this are hidden */
	minDuration?: Duration;
	/** Extra attempts for portal requests that fail transiently */
	retries: number;
}

/**
 * Reads the configuration from environment-style strings. Throws a ZodError on bad values.
 */
export function parseConfig(raw: Record<string, string | undefined>): OpeningsConfig {
	const env = EnvSchema.parse(raw);
	return {
		logLevel: env.LOG_LEVEL,
		hours: { dayStart: env.OPENINGS_DAY_START, dayEnd: env.OPENINGS_DAY_END },
		minDuration:
			env.OPENINGS_MIN_DURATION_MINUTES === undefined
				? undefined
				: { minutes: env.OPENINGS_MIN_DURATION_MINUTES },
		retries: env.PORTAL_RETRIES,
	};
}

/**
 * Reads the configuration from the process environment.
 */
export function loadConfig(): OpeningsConfig {
	return parseConfig(process.env);
}

export const DEFAULT_CONFIG: OpeningsConfig = parseConfig({});
