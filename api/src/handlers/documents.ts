/**
 * Document handlers
 *
 * Endpoints:
 * - GET /api/documents: List documents (plus files that failed to load)
 * - GET /api/documents/:filename: Get one document
 * - POST /api/documents: Create a document
 * - PUT /api/documents/:filename: Overwrite an existing document
 * - DELETE /api/documents/:filename: Delete a document
 */

import type { Context, Env } from 'hono';

type FilenameContext = Context<Env, '/api/documents/:filename'>;
import {
	DocumentInputSchema,
	isValidDocumentKey,
	parseKeywords,
	type DocumentInput,
	type DocumentInputBody,
} from '@quill/core';
import type { DocumentStore, SaveResult } from '../services/documents/index.ts';
import { parseJsonBody } from './utils.ts';

function toDocumentInput(body: DocumentInputBody, filename?: string): DocumentInput {
	return {
		filename,
		title: body.title,
		description: body.description,
		keywords: body.keywords === undefined ? undefined : parseKeywords(body.keywords),
		chapters: body.chapters,
	};
}

function saveResponse(context: Context, result: SaveResult, successStatus: 200 | 201): Response {
	if (result.ok) {
		return context.json({ document: result.document }, successStatus);
	}
	switch (result.reason) {
		case 'invalid':
			return context.json({ error: result.error }, 400);
		case 'not_found':
			return context.json({ error: 'Document not found' }, 404);
		case 'io':
			return context.json({ error: 'Failed to save document' }, 500);
	}
}

/**
 * GET /api/documents
 */
export async function handleListDocuments(context: Context, store: DocumentStore): Promise<Response> {
	const result = await store.loadAll();
	return context.json(result);
}

/**
 * GET /api/documents/:filename
 */
export async function handleGetDocument(context: FilenameContext, store: DocumentStore): Promise<Response> {
	const filename = context.req.param('filename');
	if (!isValidDocumentKey(filename)) {
		return context.json({ error: 'Invalid document filename' }, 400);
	}

	const document = await store.load(filename);
	if (!document) {
		return context.json({ error: 'Document not found' }, 404);
	}
	return context.json({ document });
}

/**
 * POST /api/documents
 */
export async function handleCreateDocument(context: Context, store: DocumentStore): Promise<Response> {
	const body = await parseJsonBody(context, DocumentInputSchema);
	if (!body.ok) {
		return context.json({ error: body.error }, 400);
	}

	const result = await store.save(toDocumentInput(body.data));
	return saveResponse(context, result, 201);
}

/**
 * PUT /api/documents/:filename
 * The filename never changes, even when the title does.
 */
export async function handleUpdateDocument(context: FilenameContext, store: DocumentStore): Promise<Response> {
	const filename = context.req.param('filename');
	if (!isValidDocumentKey(filename)) {
		return context.json({ error: 'Invalid document filename' }, 400);
	}

	const body = await parseJsonBody(context, DocumentInputSchema);
	if (!body.ok) {
		return context.json({ error: body.error }, 400);
	}

	const result = await store.save(toDocumentInput(body.data, filename));
	return saveResponse(context, result, 200);
}

/**
 * DELETE /api/documents/:filename
 */
export async function handleDeleteDocument(context: FilenameContext, store: DocumentStore): Promise<Response> {
	const filename = context.req.param('filename');
	if (!isValidDocumentKey(filename)) {
		return context.json({ error: 'Invalid document filename' }, 400);
	}

	const removed = await store.remove(filename);
	if (!removed) {
		return context.json({ error: 'Document not found' }, 404);
	}
	return context.body(null, 204);
}
