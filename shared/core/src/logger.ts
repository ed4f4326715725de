/**
 * Structured logger
 *
 * Writes one JSON object per line to the console and, optionally, to an
 * append-only log file that is rotated to `<file>.1` once it would grow
 * past `maxBytes`.
 */

import fs from 'fs/promises';
import { hasErrorCode } from './errors.ts';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, fields?: LogFields): void;
	error(message: string, fields?: LogFields): void;
	child(scope: string): Logger;
	/** Resolves once pending file writes have completed */
	flush(): Promise<void>;
}

export interface LoggerOptions {
	scope: string;
	level?: LogLevel;
	file?: string;
	maxBytes?: number;
	/** Mirror entries to the console (default: true) */
	console?: boolean;
}

const DEFAULT_MAX_BYTES = 500 * 1024 * 1024;

async function currentSize(file: string): Promise<number> {
	try {
		const stats = await fs.stat(file);
		return stats.size;
	} catch (error) {
		if (hasErrorCode(error, 'ENOENT')) return 0;
		throw error;
	}
}

class FileSink {
	private queue: Promise<void> = Promise.resolve();
	private size: number | null = null;
	private failed = false;

	constructor(
		private readonly file: string,
		private readonly maxBytes: number
	) {}

	write(line: string): void {
		this.queue = this.queue
			.then(() => this.append(line))
			.catch((error: unknown) => {
				// Re-stat on the next write; the file may have moved under us
				this.size = null;
				// Report the first failure only, then keep going
				if (!this.failed) {
					this.failed = true;
					console.error(`Failed to write log file ${this.file}:`, error);
				}
			});
	}

	flush(): Promise<void> {
		return this.queue;
	}

	private async append(line: string): Promise<void> {
		const bytes = Buffer.byteLength(line, 'utf-8');
		let size = this.size ?? (await currentSize(this.file));

		if (size > 0 && size + bytes > this.maxBytes) {
			await fs.rename(this.file, `${this.file}.1`);
			size = 0;
		}

		await fs.appendFile(this.file, line, 'utf-8');
		this.size = size + bytes;
	}
}

interface Sinks {
	console: boolean;
	file: FileSink | null;
}

function serializeFields(fields: LogFields): LogFields {
	const out: LogFields = {};
	for (const [key, value] of Object.entries(fields)) {
		out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
	}
	return out;
}

class JsonLogger implements Logger {
	constructor(
		private readonly scope: string,
		private readonly threshold: number,
		private readonly sinks: Sinks
	) {}

	debug(message: string, fields?: LogFields): void {
		this.write('debug', message, fields);
	}

	info(message: string, fields?: LogFields): void {
		this.write('info', message, fields);
	}

	warn(message: string, fields?: LogFields): void {
		this.write('warn', message, fields);
	}

	error(message: string, fields?: LogFields): void {
		this.write('error', message, fields);
	}

	child(scope: string): Logger {
		return new JsonLogger(`${this.scope}:${scope}`, this.threshold, this.sinks);
	}

	flush(): Promise<void> {
		return this.sinks.file?.flush() ?? Promise.resolve();
	}

	private write(level: LogLevel, message: string, fields?: LogFields): void {
		if (LOG_LEVELS.indexOf(level) < this.threshold) return;

		const line = JSON.stringify({
			timestamp: new Date().toISOString(),
			level,
			scope: this.scope,
			message,
			...(fields ? serializeFields(fields) : {}),
		});

		if (this.sinks.console) {
			if (level === 'warn' || level === 'error') {
				console.error(line);
			} else {
				console.log(line);
			}
		}
		this.sinks.file?.write(line + '\n');
	}
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions): Logger {
	const { scope, level = 'info', file, maxBytes = DEFAULT_MAX_BYTES } = options;
	return new JsonLogger(scope, LOG_LEVELS.indexOf(level), {
		console: options.console ?? true,
		file: file ? new FileSink(file, maxBytes) : null,
	});
}

/**
 * Logger that discards everything
 */
export function createNullLogger(): Logger {
	return new JsonLogger('null', LOG_LEVELS.length, { console: false, file: null });
}
