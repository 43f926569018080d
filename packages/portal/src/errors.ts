/**
 * Errors raised while talking to the booking portal.
 */

/**
 * - `network`: the request did not complete; worth retrying
 * - `portal`: the portal answered with an error flag; worth retrying
 * - `parse`: the response did not have the expected shape
 * - `auth`: the portal rejected the login
 * - `input`: the user asked for something that does not exist
 */
export type PortalErrorKind = 'network' | 'portal' | 'parse' | 'auth' | 'input';

export class PortalError extends Error {
	readonly kind: PortalErrorKind;

	constructor(kind: PortalErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'PortalError';
		this.kind = kind;
	}

	get retryable(): boolean {
		return this.kind === 'network' || this.kind === 'portal';
	}
}
