/**
 * @quill/api
 * Writing assistant API server using Hono.
 */

import { serve } from '@hono/node-server';
import { createLogger } from '@quill/core';
import { loadConfig, ensureDirectories, ConfigError, type AppConfig } from './config.ts';
import { AnthropicProvider } from './providers/anthropic.ts';
import { DocumentStore } from './services/documents/index.ts';
import { WritingAssistant } from './services/assistant/index.ts';
import { createApp } from './app.ts';

let config: AppConfig;
try {
	config = loadConfig();
} catch (error) {
	if (error instanceof ConfigError) {
		createLogger({ scope: 'api' }).error('Invalid configuration', { error });
		process.exit(1);
	}
	throw error;
}

await ensureDirectories(config);

const logger = createLogger({
	scope: 'api',
	level: config.logLevel,
	file: config.logFile,
	maxBytes: config.logMaxBytes,
});
logger.info('Ensured directories exist', { dataDir: config.dataDir, documentsDir: config.documentsDir });

const provider = new AnthropicProvider({
	apiKey: config.anthropicApiKey,
	model: config.model,
	timeoutMs: config.requestTimeoutMs,
});

const app = createApp({
	store: new DocumentStore({ rootDir: config.documentsDir, logger: logger.child('documents') }),
	assistant: new WritingAssistant(provider, {
		logger: logger.child('assistant'),
		maxHistoryEntries: config.chatHistoryLimit,
	}),
	logger,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
	logger.info('API server listening', { port: info.port });
});

function shutdown(signal: string): void {
	logger.info('Shutting down', { signal });
	server.close(() => {
		logger
			.flush()
			.then(() => process.exit(0))
			.catch(() => process.exit(1));
	});
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
