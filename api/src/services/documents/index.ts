/**
 * Document storage module exports
 */

export { DocumentStore } from './document-store.ts';
export type { SaveResult, LoadFailure, LoadAllResult, DocumentStoreOptions } from './document-store.ts';
export * from './transform.ts';
