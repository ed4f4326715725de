/**
 * Configuration from environment variables
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from '@quill/core';
import { DEFAULT_MODEL } from './providers/anthropic.ts';

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export interface AppConfig {
	anthropicApiKey: string;
	model: string;
	dataDir: string;
	documentsDir: string;
	port: number;
	requestTimeoutMs: number;
	/** Undefined keeps the whole conversation */
	chatHistoryLimit?: number;
	logLevel: LogLevel;
	logFile: string;
	logMaxBytes: number;
}

// Unset and blank variables both fall back to defaults
const optionalString = z
	.string()
	.optional()
	.transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
	ANTHROPIC_API_KEY: optionalString,
	ANTHROPIC_MODEL: optionalString,
	DATA_DIR: optionalString,
	DOCUMENTS_DIR: optionalString,
	PORT: optionalString.pipe(z.coerce.number().int().min(1).max(65535).optional()),
	AI_REQUEST_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().optional()),
	CHAT_HISTORY_LIMIT: optionalString.pipe(z.coerce.number().int().min(2).optional()),
	LOG_LEVEL: optionalString.pipe(z.enum(LOG_LEVELS).optional()),
	LOG_FILE: optionalString,
	LOG_MAX_BYTES: optionalString.pipe(z.coerce.number().int().positive().optional()),
});

/**
 * Read and validate configuration. Throws ConfigError when the API key
 * is missing or a value is malformed.
 */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
	cwd: string = process.cwd()
): AppConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const name = issue ? issue.path.join('.') : 'environment';
		throw new ConfigError(`Invalid value for ${name}: ${issue?.message ?? 'unknown error'}`);
	}

	const vars = parsed.data;
	if (!vars.ANTHROPIC_API_KEY) {
		throw new ConfigError('ANTHROPIC_API_KEY is required');
	}

	const dataDir = path.resolve(cwd, vars.DATA_DIR ?? 'data');

	return {
		anthropicApiKey: vars.ANTHROPIC_API_KEY,
		model: vars.ANTHROPIC_MODEL ?? DEFAULT_MODEL,
		dataDir,
		documentsDir: path.resolve(dataDir, vars.DOCUMENTS_DIR ?? 'documents'),
		port: vars.PORT ?? 3000,
		requestTimeoutMs: vars.AI_REQUEST_TIMEOUT_MS ?? 60000,
		chatHistoryLimit: vars.CHAT_HISTORY_LIMIT,
		logLevel: vars.LOG_LEVEL ?? 'info',
		logFile: path.resolve(dataDir, vars.LOG_FILE ?? 'app.log'),
		logMaxBytes: vars.LOG_MAX_BYTES ?? 500 * 1024 * 1024,
	};
}

/**
 * Create the data and documents directories if they don't exist
 */
export async function ensureDirectories(config: AppConfig): Promise<void> {
	await fs.mkdir(config.dataDir, { recursive: true });
	await fs.mkdir(config.documentsDir, { recursive: true });
}
