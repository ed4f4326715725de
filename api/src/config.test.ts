import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadConfig, ensureDirectories, ConfigError } from './config.ts';

describe('config', () => {
	describe('loadConfig', () => {
		it('should fail fast without an API key', () => {
			expect(() => loadConfig({}, '/srv/app')).toThrow(ConfigError);
			expect(() => loadConfig({ ANTHROPIC_API_KEY: '  ' }, '/srv/app')).toThrow(
				'ANTHROPIC_API_KEY is required'
			);
		});

		it('should apply defaults', () => {
			const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret' }, '/srv/app');

			expect(config).toEqual({
				anthropicApiKey: 'test-secret',
				model: 'claude-3-7-sonnet-20250219',
				dataDir: '/srv/app/data',
				documentsDir: '/srv/app/data/documents',
				port: 3000,
				requestTimeoutMs: 60000,
				chatHistoryLimit: undefined,
				logLevel: 'info',
				logFile: '/srv/app/data/app.log',
				logMaxBytes: 524288000,
			});
		});

		it('should read overrides and coerce numbers', () => {
			const config = loadConfig(
				{
					ANTHROPIC_API_KEY: 'test-secret',
					ANTHROPIC_MODEL: 'claude-3-5-haiku-20241022',
					DATA_DIR: '/var/lib/quill',
					DOCUMENTS_DIR: 'books',
					PORT: '8080',
					AI_REQUEST_TIMEOUT_MS: '15000',
					CHAT_HISTORY_LIMIT: '20',
					LOG_LEVEL: 'debug',
					LOG_FILE: '/var/log/quill.log',
					LOG_MAX_BYTES: '1024',
				},
				'/srv/app'
			);

			expect(config).toEqual({
				anthropicApiKey: 'test-secret',
				model: 'claude-3-5-haiku-20241022',
				dataDir: '/var/lib/quill',
				documentsDir: '/var/lib/quill/books',
				port: 8080,
				requestTimeoutMs: 15000,
				chatHistoryLimit: 20,
				logLevel: 'debug',
				logFile: '/var/log/quill.log',
				logMaxBytes: 1024,
			});
		});

		it('should treat blank values as unset', () => {
			const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret', PORT: '', LOG_LEVEL: ' ' }, '/srv/app');

			expect(config.port).toBe(3000);
			expect(config.logLevel).toBe('info');
		});

		it('should name the variable that is invalid', () => {
			expect(() => loadConfig({ ANTHROPIC_API_KEY: 'test-secret', PORT: 'eighty' }, '/srv/app')).toThrow(
				/^Invalid value for PORT: /
			);
			expect(() =>
				loadConfig({ ANTHROPIC_API_KEY: 'test-secret', LOG_LEVEL: 'verbose' }, '/srv/app')
			).toThrow(/^Invalid value for LOG_LEVEL: /);
			expect(() =>
				loadConfig({ ANTHROPIC_API_KEY: 'test-secret', CHAT_HISTORY_LIMIT: '1' }, '/srv/app')
			).toThrow(/^Invalid value for CHAT_HISTORY_LIMIT: /);
		});
	});

	describe('ensureDirectories', () => {
		let root: string;

		beforeEach(async () => {
			root = await fs.mkdtemp(path.join(os.tmpdir(), 'quill-config-'));
		});

		afterEach(async () => {
			await fs.rm(root, { recursive: true, force: true });
		});

		it('should create data and documents directories', async () => {
			const config = loadConfig({ ANTHROPIC_API_KEY: 'test-secret' }, root);

			await ensureDirectories(config);
			await ensureDirectories(config);

			const stats = await fs.stat(path.join(root, 'data', 'documents'));
			expect(stats.isDirectory()).toBe(true);
		});
	});
});
