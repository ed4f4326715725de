/**
 * Shared utilities for handlers
 */

import type { Context } from 'hono';
import type { z } from 'zod';

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; error: string };

/**
 * Parse the JSON body and validate it against a schema
 */
export async function parseJsonBody<T extends z.ZodTypeAny>(
	context: Context,
	schema: T
): Promise<ParsedBody<z.infer<T>>> {
	let body: unknown;
	try {
		body = await context.req.json();
	} catch {
		return { ok: false, error: 'Invalid JSON' };
	}

	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		if (!issue) {
			return { ok: false, error: 'Invalid request body' };
		}
		const field = issue.path.join('.') || 'body';
		return { ok: false, error: `${field}: ${issue.message}` };
	}

	return { ok: true, data: parsed.data };
}
