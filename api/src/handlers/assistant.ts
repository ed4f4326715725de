/**
 * Writing assistant handlers
 *
 * Endpoints:
 * - POST /api/assistant/improve: Improve a passage for clarity and conciseness
 * - POST /api/assistant/analyze: Structured feedback on a passage
 * - POST /api/assistant/chat: Chat with the conversation so far as context
 * - GET /api/assistant/history: Current conversation
 * - DELETE /api/assistant/history: Start a new conversation
 */

import type { Context } from 'hono';
import { z } from 'zod';
import type { AssistantResult, FailureKind, WritingAssistant } from '../services/assistant/index.ts';
import { parseJsonBody } from './utils.ts';

const MAX_CONTENT_LENGTH = 100000;
const MAX_MESSAGE_LENGTH = 100000;

const ContentSchema = z.object({
	content: z.string().max(MAX_CONTENT_LENGTH),
});

const MessageSchema = z.object({
	message: z.string().max(MAX_MESSAGE_LENGTH),
});

// Upstream failures are the gateway's problem, not the client's
const FAILURE_STATUS: Record<FailureKind, 400 | 429 | 500 | 502> = {
	authentication: 502,
	bad_request: 502,
	rate_limit: 429,
	api: 502,
	unexpected: 500,
	invalid_input: 400,
};

function resultResponse(context: Context, result: AssistantResult): Response {
	if (result.ok) {
		return context.json({ text: result.text });
	}
	return context.json({ error: result.message, kind: result.kind }, FAILURE_STATUS[result.kind]);
}

/**
 * POST /api/assistant/improve
 */
export async function handleImproveWriting(context: Context, assistant: WritingAssistant): Promise<Response> {
	const body = await parseJsonBody(context, ContentSchema);
	if (!body.ok) {
		return context.json({ error: body.error }, 400);
	}
	return resultResponse(context, await assistant.improveWriting(body.data.content));
}

/**
 * POST /api/assistant/analyze
 */
export async function handleAnalyzeContent(context: Context, assistant: WritingAssistant): Promise<Response> {
	const body = await parseJsonBody(context, ContentSchema);
	if (!body.ok) {
		return context.json({ error: body.error }, 400);
	}
	return resultResponse(context, await assistant.analyzeContent(body.data.content));
}

/**
 * POST /api/assistant/chat
 */
export async function handleChat(context: Context, assistant: WritingAssistant): Promise<Response> {
	const body = await parseJsonBody(context, MessageSchema);
	if (!body.ok) {
		return context.json({ error: body.error }, 400);
	}
	return resultResponse(context, await assistant.chatWithContext(body.data.message));
}

/**
 * GET /api/assistant/history
 */
export function handleGetHistory(context: Context, assistant: WritingAssistant): Response {
	return context.json({ history: assistant.getHistory() });
}

/**
 * DELETE /api/assistant/history
 */
export async function handleClearHistory(context: Context, assistant: WritingAssistant): Promise<Response> {
	await assistant.clearHistory();
	return context.body(null, 204);
}
