/**
 * Writing assistant module exports
 */

export * from './errors.ts';
export * from './retry.ts';
export { WritingAssistant, DEFAULT_RETRY_POLICY } from './writing-assistant.ts';
export type { RetryPolicy, WritingAssistantOptions } from './writing-assistant.ts';
