/**
 * Transform functions: snake_case on disk → camelCase API
 */

import type { Document, StoredDocument } from '@quill/core';

export function storedToDocument(stored: StoredDocument, filename: string): Document {
	return {
		filename,
		title: stored.title,
		description: stored.description,
		keywords: stored.keywords,
		chapters: stored.chapters,
		createdAt: stored.metadata.created_at,
		updatedAt: stored.metadata.updated_at,
	};
}

export function documentToStored(document: Document): StoredDocument {
	return {
		title: document.title,
		description: document.description,
		keywords: document.keywords,
		chapters: document.chapters,
		metadata: {
			created_at: document.createdAt,
			updated_at: document.updatedAt,
			filename: document.filename,
		},
	};
}
