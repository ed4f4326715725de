/**
 * zod schemas for stored documents and document input
 */

import { z } from 'zod';

export const MAX_TITLE_LENGTH = 255;

const TimestampSchema = z
	.string()
	.refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' });

export const SectionSchema = z.object({
	title: z.string().default(''),
	content: z.string().default(''),
});

export const ChapterSchema = z.object({
	title: z.string().default(''),
	content: z.string().default(''),
	sections: z.array(SectionSchema).default([]),
});

export const StoredDocumentSchema = z.object({
	title: z.string(),
	description: z.string().default(''),
	keywords: z.array(z.string()).default([]),
	chapters: z.array(ChapterSchema).default([]),
	metadata: z.object({
		created_at: TimestampSchema,
		updated_at: TimestampSchema,
		filename: z.string(),
	}),
});

export const DocumentInputSchema = z.object({
	title: z.string().max(MAX_TITLE_LENGTH),
	description: z.string().optional(),
	// Comma-separated string as typed in the editor, or an explicit list
	keywords: z.union([z.array(z.string()), z.string()]).optional(),
	chapters: z.array(ChapterSchema).optional(),
});

export type DocumentInputBody = z.infer<typeof DocumentInputSchema>;
