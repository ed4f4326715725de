/**
 * @quill/core
 * Document model, schemas and utilities shared across the platform.
 */

export * from './types.ts';
export * from './schema.ts';
export * from './filenames.ts';
export * from './errors.ts';
export * from './logger.ts';
