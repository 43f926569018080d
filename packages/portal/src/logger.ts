import { pino, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export interface LoggerOptions {
	level?: LogLevel;
	name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	return pino({
		name: options.name ?? 'toolgaps',
		level: options.level ?? 'info',
	});
}
