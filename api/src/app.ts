/**
 * Hono application: document and writing assistant routes
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Logger } from '@quill/core';
import type { DocumentStore } from './services/documents/index.ts';
import type { WritingAssistant } from './services/assistant/index.ts';
import {
	handleListDocuments,
	handleGetDocument,
	handleCreateDocument,
	handleUpdateDocument,
	handleDeleteDocument,
} from './handlers/documents.ts';
import {
	handleImproveWriting,
	handleAnalyzeContent,
	handleChat,
	handleGetHistory,
	handleClearHistory,
} from './handlers/assistant.ts';

export interface AppDependencies {
	store: DocumentStore;
	assistant: WritingAssistant;
	logger: Logger;
}

export function createApp({ store, assistant, logger }: AppDependencies): Hono {
	const app = new Hono();

	// Middleware
	app.use('*', cors());
	app.use('*', async (context, next) => {
		const start = Date.now();
		await next();
		logger.debug('Request handled', {
			method: context.req.method,
			path: context.req.path,
			status: context.res.status,
			durationMs: Date.now() - start,
		});
	});

	app.onError((error, context) => {
		logger.error('Unhandled error', { method: context.req.method, path: context.req.path, error });
		return context.json({ error: 'Internal server error' }, 500);
	});

	app.notFound((context) => context.json({ error: 'Not found' }, 404));

	// Health check
	app.get('/health', (context) => context.json({ status: 'ok' }));

	// Document routes
	app.get('/api/documents', (context) => handleListDocuments(context, store));
	app.get('/api/documents/:filename', (context) => handleGetDocument(context, store));
	app.post('/api/documents', (context) => handleCreateDocument(context, store));
	app.put('/api/documents/:filename', (context) => handleUpdateDocument(context, store));
	app.delete('/api/documents/:filename', (context) => handleDeleteDocument(context, store));

	// Writing assistant routes
	app.post('/api/assistant/improve', (context) => handleImproveWriting(context, assistant));
	app.post('/api/assistant/analyze', (context) => handleAnalyzeContent(context, assistant));
	app.post('/api/assistant/chat', (context) => handleChat(context, assistant));
	app.get('/api/assistant/history', (context) => handleGetHistory(context, assistant));
	app.delete('/api/assistant/history', (context) => handleClearHistory(context, assistant));

	return app;
}
