import { z } from 'zod';
import { PortalError } from './errors.js';

/**
 * One entry of the portal's tool search endpoint.
 */
export const ToolSchema = z.object({
	/** Numeric on some portal versions, so normalised to a string */
	id: z.union([z.string(), z.number()]).transform(String),
	label: z.string(),
	value: z.string(),
	text: z.string(),
});

export const ToolListSchema = z.array(ToolSchema);

/**
 * Envelope of every form POST. Redirecting responses carry `location` instead of `msg`.
 */
export const PostResponseSchema = z.union([
	z.object({ error: z.boolean(), msg: z.string() }),
	z.object({ error: z.boolean(), location: z.string() }),
]);

export type Tool = z.infer<typeof ToolSchema>;
export type PostResponse = z.infer<typeof PostResponseSchema>;

/**
 * Validates the tool search payload.
 */
export function parseTools(json: unknown): Tool[] {
	const result = ToolListSchema.safeParse(json);
	if (!result.success) {
		throw new PortalError('parse', 'Server response could not be parsed', { cause: result.error });
	}
	return result.data;
}

/**
 * Validates a POST envelope and returns its message, throwing when the portal flagged an error.
 */
export function unwrapPostResponse(json: unknown): string {
	const result = PostResponseSchema.safeParse(json);
	if (!result.success) {
		throw new PortalError('parse', 'Response body was not a valid portal envelope', { cause: result.error });
	}

	const response = result.data;
	const message = 'msg' in response ? response.msg : response.location;
	if (response.error) {
		throw new PortalError('portal', message);
	}
	return message;
}
