/**
 * DocumentStore - one JSON file per document under a root directory
 *
 * Files are named `<slug(title)>_<YYYYMMDD_HHMMSS>.json`. The name is the
 * document's key: it is derived once, on first save, and never recomputed.
 * Writes go to a temporary file that is then linked (new documents) or
 * renamed (existing ones) into place.
 */

import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import {
	StoredDocumentSchema,
	createNullLogger,
	documentKey,
	getErrorMessage,
	hasErrorCode,
	isValidDocumentKey,
	parseKeywords,
	type Chapter,
	type Document,
	type DocumentInput,
	type Logger,
} from '@quill/core';
import { documentToStored, storedToDocument } from './transform.ts';

// Highest `-N` suffix tried when keys collide within the same second
const MAX_KEY_SUFFIX = 1000;

export type SaveResult =
	| { ok: true; document: Document }
	| { ok: false; reason: 'invalid' | 'not_found' | 'io'; error: string };

export interface LoadFailure {
	/** File name (or directory) that could not be loaded */
	filename: string;
	error: string;
}

export interface LoadAllResult {
	documents: Document[];
	failures: LoadFailure[];
}

export interface DocumentStoreOptions {
	rootDir: string;
	logger?: Logger;
	now?: () => Date;
}

type DocumentFields = Pick<Document, 'title' | 'description' | 'keywords' | 'chapters'>;

function copyChapters(chapters: Chapter[]): Chapter[] {
	return chapters.map((chapter) => ({
		title: chapter.title,
		content: chapter.content,
		sections: chapter.sections.map((section) => ({ title: section.title, content: section.content })),
	}));
}

function describeLoadError(error: unknown): string {
	if (error instanceof ZodError) {
		return error.issues
			.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
	}
	if (error instanceof SyntaxError) {
		return `Invalid JSON: ${error.message}`;
	}
	return getErrorMessage(error);
}

export class DocumentStore {
	readonly rootDir: string;
	private readonly logger: Logger;
	private readonly now: () => Date;

	constructor(options: DocumentStoreOptions) {
		this.rootDir = options.rootDir;
		this.logger = options.logger ?? createNullLogger();
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Create a document, or overwrite an existing one when `input.filename`
	 * is set. Never throws.
	 */
	async save(input: DocumentInput): Promise<SaveResult> {
		const title = input.title.trim();
		if (!title) {
			return { ok: false, reason: 'invalid', error: 'Title is required' };
		}
		if (input.filename !== undefined && !isValidDocumentKey(input.filename)) {
			return { ok: false, reason: 'invalid', error: 'Invalid document filename' };
		}

		const fields: DocumentFields = {
			title,
			description: input.description ?? '',
			keywords: parseKeywords(input.keywords ?? []),
			chapters: copyChapters(input.chapters ?? []),
		};

		try {
			if (input.filename !== undefined) {
				return await this.update(input.filename, fields);
			}
			const document = await this.create(fields);
			this.logger.info('Saved document', { title, filename: document.filename });
			return { ok: true, document };
		} catch (error) {
			this.logger.error('Error saving document', { title, error });
			return { ok: false, reason: 'io', error: getErrorMessage(error) };
		}
	}

	/**
	 * Load every stored document. Files that cannot be read or parsed are
	 * reported in `failures` and do not prevent the others from loading.
	 * Sorted newest first.
	 */
	async loadAll(): Promise<LoadAllResult> {
		let entries: string[];
		try {
			entries = await fs.readdir(this.rootDir);
		} catch (error) {
			if (hasErrorCode(error, 'ENOENT')) {
				return { documents: [], failures: [] };
			}
			this.logger.error('Error listing documents', { rootDir: this.rootDir, error });
			return { documents: [], failures: [{ filename: this.rootDir, error: getErrorMessage(error) }] };
		}

		const files = entries.filter((name) => name.endsWith('.json') && !name.startsWith('.'));
		const documents: Document[] = [];
		const failures: LoadFailure[] = [];

		await Promise.all(
			files.map(async (name) => {
				const key = name.slice(0, -'.json'.length);
				if (!isValidDocumentKey(key)) {
					failures.push({ filename: name, error: 'Invalid document filename' });
					return;
				}
				try {
					documents.push(await this.read(key));
				} catch (error) {
					failures.push({ filename: name, error: describeLoadError(error) });
				}
			})
		);

		for (const failure of failures) {
			this.logger.warn('Skipped unreadable document', { ...failure });
		}
		this.logger.info('Loaded documents', { count: documents.length, failed: failures.length });

		documents.sort(
			(a, b) =>
				Date.parse(b.createdAt) - Date.parse(a.createdAt) || a.filename.localeCompare(b.filename)
		);
		failures.sort((a, b) => a.filename.localeCompare(b.filename));

		return { documents, failures };
	}

	/**
	 * Load one document by key; null when absent or unreadable
	 */
	async load(filename: string): Promise<Document | null> {
		if (!isValidDocumentKey(filename)) {
			return null;
		}
		try {
			return await this.read(filename);
		} catch (error) {
			if (!hasErrorCode(error, 'ENOENT')) {
				this.logger.error('Error loading document', { filename, error: describeLoadError(error) });
			}
			return null;
		}
	}

	/**
	 * Delete a document by key; false when absent or on failure
	 */
	async remove(filename: string): Promise<boolean> {
		if (!isValidDocumentKey(filename)) {
			return false;
		}
		try {
			await fs.rm(this.pathFor(filename));
			this.logger.info('Deleted document', { filename });
			return true;
		} catch (error) {
			if (!hasErrorCode(error, 'ENOENT')) {
				this.logger.error('Error deleting document', { filename, error });
			}
			return false;
		}
	}

	private pathFor(filename: string): string {
		return path.join(this.rootDir, `${filename}.json`);
	}

	private async read(filename: string): Promise<Document> {
		const raw = await fs.readFile(this.pathFor(filename), 'utf-8');
		const stored = StoredDocumentSchema.parse(JSON.parse(raw));
		return storedToDocument(stored, filename);
	}

	private async create(fields: DocumentFields): Promise<Document> {
		await fs.mkdir(this.rootDir, { recursive: true });

		const date = this.now();
		const timestamp = date.toISOString();
		const base = documentKey(fields.title, date);

		for (let n = 1; n <= MAX_KEY_SUFFIX; n++) {
			const filename = n === 1 ? base : `${base}-${n}`;
			const document: Document = { filename, ...fields, createdAt: timestamp, updatedAt: timestamp };
			if (await this.writeExclusive(document)) {
				return document;
			}
		}

		throw new Error(`No free filename for ${base}`);
	}

	private async update(filename: string, fields: DocumentFields): Promise<SaveResult> {
		let existing: Document;
		try {
			existing = await this.read(filename);
		} catch (error) {
			if (hasErrorCode(error, 'ENOENT')) {
				return { ok: false, reason: 'not_found', error: 'Document not found' };
			}
			throw error;
		}

		const document: Document = {
			filename,
			...fields,
			createdAt: existing.createdAt,
			updatedAt: this.now().toISOString(),
		};

		const tempPath = await this.writeTemp(document);
		try {
			await fs.rename(tempPath, this.pathFor(filename));
		} catch (error) {
			await fs.rm(tempPath, { force: true });
			throw error;
		}

		this.logger.info('Updated document', { title: document.title, filename });
		return { ok: true, document };
	}

	/**
	 * Link a fully written temp file to the document's path; false if a
	 * document with that key already exists.
	 */
	private async writeExclusive(document: Document): Promise<boolean> {
		const tempPath = await this.writeTemp(document);
		try {
			await fs.link(tempPath, this.pathFor(document.filename));
			return true;
		} catch (error) {
			if (hasErrorCode(error, 'EEXIST')) {
				return false;
			}
			throw error;
		} finally {
			await fs.rm(tempPath, { force: true });
		}
	}

	private async writeTemp(document: Document): Promise<string> {
		const tempPath = path.join(this.rootDir, `.${randomUUID()}.tmp`);
		const json = JSON.stringify(documentToStored(document), null, 2);
		await fs.writeFile(tempPath, json + '\n', 'utf-8');
		return tempPath;
	}
}
