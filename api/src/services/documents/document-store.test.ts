import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Chapter, Document } from '@quill/core';
import { DocumentStore, type SaveResult } from './document-store.ts';

const chapters: Chapter[] = [
	{
		title: 'Beginnings',
		content: 'It was a quiet morning.',
		sections: [
			{ title: 'The harbor', content: 'Boats rocked gently.' },
			{ title: 'The letter', content: 'An envelope arrived.' },
		],
	},
	{ title: 'Departure', content: '', sections: [] },
];

function expectSaved(result: SaveResult): Document {
	if (!result.ok) {
		throw new Error(`save failed: ${result.error}`);
	}
	return result.document;
}

describe('DocumentStore', () => {
	let rootDir: string;
	let clock: Date;
	let store: DocumentStore;

	beforeEach(async () => {
		rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'quill-docs-'));
		clock = new Date(2025, 2, 14, 9, 30, 0);
		store = new DocumentStore({ rootDir, now: () => clock });
	});

	afterEach(async () => {
		await fs.rm(rootDir, { recursive: true, force: true });
	});

	describe('save', () => {
		it('should derive the filename from title and timestamp', async () => {
			const document = expectSaved(await store.save({ title: 'My Novel' }));

			expect(document.filename).toBe('my_novel_20250314_093000');
			const files = await fs.readdir(rootDir);
			expect(files).toEqual(['my_novel_20250314_093000.json']);
		});

		it('should write the nested JSON layout', async () => {
			await store.save({
				title: 'My Novel',
				description: 'A story',
				keywords: [' sea ', '', 'voyage'],
				chapters,
			});

			const raw = await fs.readFile(path.join(rootDir, 'my_novel_20250314_093000.json'), 'utf-8');
			expect(JSON.parse(raw)).toEqual({
				title: 'My Novel',
				description: 'A story',
				keywords: ['sea', 'voyage'],
				chapters,
				metadata: {
					created_at: clock.toISOString(),
					updated_at: clock.toISOString(),
					filename: 'my_novel_20250314_093000',
				},
			});
		});

		it('should reject an empty title without writing', async () => {
			const result = await store.save({ title: '   ' });

			expect(result).toEqual({ ok: false, reason: 'invalid', error: 'Title is required' });
			expect(await fs.readdir(rootDir)).toEqual([]);
		});

		it('should reject an invalid filename', async () => {
			const result = await store.save({ title: 'Escape', filename: '../outside' });

			expect(result).toEqual({ ok: false, reason: 'invalid', error: 'Invalid document filename' });
		});

		it('should disambiguate same-title saves within one second', async () => {
			const first = expectSaved(await store.save({ title: 'Notes', description: 'one' }));
			const second = expectSaved(await store.save({ title: 'Notes', description: 'two' }));
			const third = expectSaved(await store.save({ title: 'Notes', description: 'three' }));

			expect(first.filename).toBe('notes_20250314_093000');
			expect(second.filename).toBe('notes_20250314_093000-2');
			expect(third.filename).toBe('notes_20250314_093000-3');

			const { documents } = await store.loadAll();
			expect(documents.map((d) => d.description).sort()).toEqual(['one', 'three', 'two']);
		});

		it('should save the longest ASCII title', async () => {
			const title = 'a'.repeat(255);

			const document = expectSaved(await store.save({ title }));

			expect(document.filename).toBe(`${'a'.repeat(100)}_20250314_093000`);
			expect(document.title).toBe(title);
			expect(await fs.readdir(rootDir)).toEqual([`${document.filename}.json`]);
		});

		it('should save the longest accented title', async () => {
			const title = 'é'.repeat(255);

			const document = expectSaved(await store.save({ title }));

			expect(document.filename).toBe(`${'é'.repeat(50)}_20250314_093000`);
			expect(await store.load(document.filename)).toMatchObject({ title });
		});

		it('should create the root directory when missing', async () => {
			const nested = new DocumentStore({ rootDir: path.join(rootDir, 'a', 'b'), now: () => clock });

			const result = await nested.save({ title: 'Deep' });

			expect(result.ok).toBe(true);
			expect(await fs.readdir(path.join(rootDir, 'a', 'b'))).toEqual(['deep_20250314_093000.json']);
		});

		it('should leave no temporary files behind', async () => {
			await store.save({ title: 'Clean' });
			await store.save({ title: 'Clean' });

			const files = await fs.readdir(rootDir);
			expect(files.filter((f) => f.endsWith('.tmp'))).toEqual([]);
		});

		it('should report I/O failures instead of throwing', async () => {
			const blocker = path.join(rootDir, 'not-a-dir');
			await fs.writeFile(blocker, 'x');
			const broken = new DocumentStore({ rootDir: blocker, now: () => clock });

			const result = await broken.save({ title: 'Nowhere' });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.reason).toBe('io');
			}
		});
	});

	describe('save existing', () => {
		it('should keep the key and creation time when the title changes', async () => {
			const created = expectSaved(await store.save({ title: 'Working Title', chapters }));
			const createdAt = created.createdAt;

			clock = new Date(2025, 2, 15, 8, 0, 0);
			const updated = expectSaved(
				await store.save({ filename: created.filename, title: 'Final Title', keywords: ['done'] })
			);

			expect(updated.filename).toBe('working_title_20250314_093000');
			expect(updated.title).toBe('Final Title');
			expect(updated.createdAt).toBe(createdAt);
			expect(updated.updatedAt).toBe(clock.toISOString());
			expect(updated.chapters).toEqual([]);
			expect(await fs.readdir(rootDir)).toEqual(['working_title_20250314_093000.json']);
		});

		it('should report an unknown filename', async () => {
			const result = await store.save({ filename: 'ghost_20250101_000000', title: 'Ghost' });

			expect(result).toEqual({ ok: false, reason: 'not_found', error: 'Document not found' });
		});
	});

	describe('loadAll', () => {
		it('should round-trip saved documents', async () => {
			await store.save({ title: 'Round Trip', description: 'desc', keywords: ['a', 'b'], chapters });

			const { documents, failures } = await store.loadAll();

			expect(failures).toEqual([]);
			expect(documents).toHaveLength(1);
			expect(documents[0]).toMatchObject({
				title: 'Round Trip',
				description: 'desc',
				keywords: ['a', 'b'],
				chapters,
			});
		});

		it('should return an empty result for a missing directory', async () => {
			const missing = new DocumentStore({ rootDir: path.join(rootDir, 'missing') });

			expect(await missing.loadAll()).toEqual({ documents: [], failures: [] });
		});

		it('should isolate unreadable files', async () => {
			await store.save({ title: 'Good' });
			await fs.writeFile(path.join(rootDir, 'broken.json'), '{ not json');
			await fs.writeFile(path.join(rootDir, 'partial.json'), JSON.stringify({ title: 'No metadata' }));
			await fs.writeFile(path.join(rootDir, 'notes.txt'), 'ignored');

			const { documents, failures } = await store.loadAll();

			expect(documents.map((d) => d.title)).toEqual(['Good']);
			expect(failures.map((f) => f.filename)).toEqual(['broken.json', 'partial.json']);
			expect(failures[0]?.error).toMatch(/^Invalid JSON: /);
			expect(failures[1]?.error).toBe('metadata: Required');
		});

		it('should fill defaults for optional fields', async () => {
			await fs.writeFile(
				path.join(rootDir, 'sparse_20240101_000000.json'),
				JSON.stringify({
					title: 'Sparse',
					chapters: [{ title: 'Only title' }],
					metadata: {
						created_at: '2024-01-01T00:00:00',
						updated_at: '2024-01-01T00:00:00',
						filename: 'sparse_20240101_000000',
					},
				})
			);

			const { documents } = await store.loadAll();

			expect(documents[0]).toEqual({
				filename: 'sparse_20240101_000000',
				title: 'Sparse',
				description: '',
				keywords: [],
				chapters: [{ title: 'Only title', content: '', sections: [] }],
				createdAt: '2024-01-01T00:00:00',
				updatedAt: '2024-01-01T00:00:00',
			});
		});

		it('should sort newest first', async () => {
			clock = new Date(2025, 0, 1, 0, 0, 0);
			await store.save({ title: 'Older' });
			clock = new Date(2025, 5, 1, 0, 0, 0);
			await store.save({ title: 'Newer' });

			const { documents } = await store.loadAll();

			expect(documents.map((d) => d.title)).toEqual(['Newer', 'Older']);
		});
	});

	describe('load', () => {
		it('should load a document by filename', async () => {
			const saved = expectSaved(await store.save({ title: 'Single', chapters }));

			const loaded = await store.load(saved.filename);

			expect(loaded).toEqual(saved);
		});

		it('should return null for unknown or invalid filenames', async () => {
			expect(await store.load('unknown_20250101_000000')).toBeNull();
			expect(await store.load('../etc/passwd')).toBeNull();
		});
	});

	describe('remove', () => {
		it('should delete a stored document', async () => {
			const saved = expectSaved(await store.save({ title: 'Disposable' }));

			expect(await store.remove(saved.filename)).toBe(true);
			expect(await store.load(saved.filename)).toBeNull();
			expect(await store.remove(saved.filename)).toBe(false);
		});

		it('should refuse invalid filenames', async () => {
			expect(await store.remove('../secrets')).toBe(false);
		});
	});
});
