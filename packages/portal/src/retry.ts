import { PortalError } from './errors.js';
import type { Logger } from './logger.js';

export interface RetryOptions {
	/** Attempts after the first one */
	retries: number;
	logger?: Logger;
	/** Names the operation in log lines */
	label?: string;
}

/**
 * Runs `fn` until it succeeds or `retries` extra attempts have failed.
 * Portal errors that retrying cannot fix are rethrown straight away.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
	const { retries, logger, label = 'request' } = options;

	for (let attempt = 0; ; attempt++) {
		try {
			return await fn();
		} catch (error) {
			if (error instanceof PortalError && !error.retryable) {
				throw error;
			}
			if (attempt >= retries) {
				throw new PortalError('network', `Failed ${retries} times`, { cause: error });
			}
			logger?.warn({ err: error, attempt: attempt + 1, retries }, `${label} failed, retrying`);
		}
	}
}
