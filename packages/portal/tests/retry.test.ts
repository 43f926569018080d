import { describe, expect, test, vi } from 'vitest';
import { PortalError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { retry } from '../src/retry.js';

describe('retry', () => {
	test('returns the first successful result', async () => {
		const fn = vi.fn(async () => 'ok');
		fn.mockRejectedValueOnce(new Error('socket hang up'));
		fn.mockRejectedValueOnce(new Error('socket hang up'));

		await expect(retry(fn, { retries: 3 })).resolves.toBe('ok');
		expect(fn).toHaveBeenCalledTimes(3);
	});

	test('gives up after the configured number of retries', async () => {
		const lastError = new Error('timeout');
		const fn = vi.fn(async (): Promise<string> => {
			throw lastError;
		});

		const error = await retry(fn, { retries: 2 }).catch((reason: unknown) => reason);

		expect(fn).toHaveBeenCalledTimes(3);
		expect(error).toBeInstanceOf(PortalError);
		expect(error).toHaveProperty('message', 'Failed 2 times');
		expect(error).toHaveProperty('kind', 'network');
		expect(error).toHaveProperty('cause', lastError);
	});

	test('retries errors the portal flagged', async () => {
		const fn = vi.fn(async () => 'ok');
		fn.mockRejectedValueOnce(new PortalError('portal', 'Invalid nonce'));

		await expect(retry(fn, { retries: 1 })).resolves.toBe('ok');
	});

	test('does not retry errors that cannot succeed on a second try', async () => {
		const parseError = new PortalError('parse', 'Server response could not be parsed');
		const fn = vi.fn(async (): Promise<string> => {
			throw parseError;
		});

		await expect(retry(fn, { retries: 5 })).rejects.toBe(parseError);
		expect(fn).toHaveBeenCalledTimes(1);
	});

	test('logs each failed attempt', async () => {
		const logger = createLogger({ level: 'silent' });
		const warn = vi.spyOn(logger, 'warn');
		const fn = vi.fn(async () => 'ok');
		fn.mockRejectedValueOnce(new Error('reset'));
		fn.mockRejectedValueOnce(new Error('reset'));

		await retry(fn, { retries: 2, logger, label: 'bookings' });

		expect(warn).toHaveBeenCalledTimes(2);
		expect(warn).toHaveBeenLastCalledWith(
			expect.objectContaining({ attempt: 2, retries: 2 }),
			'bookings failed, retrying',
		);
	});
});
