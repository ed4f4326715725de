/**
 * Document model shared by the API and its clients.
 */

export interface Section {
	title: string;
	content: string;
}

export interface Chapter {
	title: string;
	content: string;
	sections: Section[];
}

export interface Document {
	/** Storage key, fixed when the document is first saved */
	filename: string;
	title: string;
	description: string;
	keywords: string[];
	chapters: Chapter[];
	createdAt: string;
	updatedAt: string;
}

/**
 * Editable fields of a document. `filename` is present when the
 * document has been saved before.
 */
export interface DocumentInput {
	filename?: string;
	title: string;
	description?: string;
	keywords?: string[];
	chapters?: Chapter[];
}

/**
 * On-disk representation (snake_case metadata)
 */
export interface StoredDocument {
	title: string;
	description: string;
	keywords: string[];
	chapters: Chapter[];
	metadata: {
		created_at: string;
		updated_at: string;
		filename: string;
	};
}
