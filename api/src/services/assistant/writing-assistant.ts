/**
 * WritingAssistant - writing feedback and contextual chat over a
 * CompletionProvider
 *
 * Every operation resolves to an AssistantResult; nothing is thrown to
 * the caller. Rate-limited requests are retried with exponential backoff
 * before being reported.
 */

import pLimit from 'p-limit';
import { createNullLogger, type Logger } from '@quill/core';
import type { ChatMessage, CompletionProvider } from '../../providers/types.ts';
import { withRetry, sleep } from './retry.ts';
import { classifyError, invalidInput, isRateLimitError, type AssistantResult } from './errors.ts';
import {
	ANALYZE_CONTENT,
	CHAT,
	IMPROVE_WRITING,
	analyzeContentPrompt,
	improveWritingPrompt,
	type PromptSettings,
} from './prompts.ts';

export interface RetryPolicy {
	attempts: number;
	initialDelayMs: number;
	maxDelayMs: number;
	sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	attempts: 3,
	initialDelayMs: 2000,
	maxDelayMs: 10000,
	sleep,
};

export interface WritingAssistantOptions {
	logger?: Logger;
	retry?: Partial<RetryPolicy>;
	/**
	 * Maximum transcript entries kept for chat, at least 2. Oldest entries
	 * are evicted first. Unbounded when omitted.
	 */
	maxHistoryEntries?: number;
}

export class WritingAssistant {
	private history: ChatMessage[] = [];
	// Chat and clear are serialized so a reply always follows its own message
	private readonly queue = pLimit(1);
	private readonly logger: Logger;
	private readonly retry: RetryPolicy;
	private readonly maxHistoryEntries: number | undefined;

	constructor(
		private readonly provider: CompletionProvider,
		options: WritingAssistantOptions = {}
	) {
		this.logger = options.logger ?? createNullLogger();
		this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
		const limit = options.maxHistoryEntries;
		// A smaller limit would evict the user message before it is sent
		if (limit !== undefined && (!Number.isInteger(limit) || limit < 2)) {
			throw new RangeError(`maxHistoryEntries must be an integer of at least 2, got ${limit}`);
		}
		this.maxHistoryEntries = limit;
		this.logger.info('Writing assistant initialized', { model: provider.model });
	}

	async improveWriting(content: string): Promise<AssistantResult> {
		if (!content.trim()) {
			return invalidInput('Content is required');
		}
		this.logger.debug('Requesting writing improvements', { length: content.length });
		return this.complete('improve_writing', 'Error getting improvements', IMPROVE_WRITING, [
			{ role: 'user', content: improveWritingPrompt(content) },
		]);
	}

	async analyzeContent(content: string): Promise<AssistantResult> {
		if (!content.trim()) {
			return invalidInput('Content is required');
		}
		this.logger.debug('Requesting content analysis', { length: content.length });
		return this.complete('analyze_content', 'Error analyzing content', ANALYZE_CONTENT, [
			{ role: 'user', content: analyzeContentPrompt(content) },
		]);
	}

	/**
	 * Send a message with the whole conversation so far as context.
	 * The user message stays in the transcript even when the call fails;
	 * the reply is only recorded on success.
	 */
	async chatWithContext(message: string): Promise<AssistantResult> {
		if (!message.trim()) {
			return invalidInput('Message is required');
		}

		return this.queue(async () => {
			this.append({ role: 'user', content: message });
			this.logger.debug('Sending message with conversation history', {
				length: message.length,
				entries: this.history.length,
			});

			const result = await this.complete('chat_with_context', 'Error in conversation', CHAT, [
				...this.history,
			]);
			if (result.ok) {
				this.append({ role: 'assistant', content: result.text });
			}
			return result;
		});
	}

	/**
	 * Snapshot of the transcript
	 */
	getHistory(): ChatMessage[] {
		return this.history.map((entry) => ({ ...entry }));
	}

	clearHistory(): Promise<void> {
		return this.queue(() => {
			this.history = [];
			this.logger.info('Conversation history cleared');
		});
	}

	private append(entry: ChatMessage): void {
		this.history.push(entry);

		const limit = this.maxHistoryEntries;
		if (limit === undefined) return;

		// The API expects the conversation to open with a user message
		while (
			this.history.length > limit ||
			(this.history.length > 0 && this.history[0]?.role !== 'user')
		) {
			this.history.shift();
		}
	}

	private async complete(
		operation: string,
		errorContext: string,
		prompt: PromptSettings,
		messages: ChatMessage[]
	): Promise<AssistantResult> {
		try {
			const text = await withRetry(
				() =>
					this.provider.complete({
						maxTokens: prompt.maxTokens,
						temperature: prompt.temperature,
						system: prompt.system,
						messages,
					}),
				{
					attempts: this.retry.attempts,
					initialDelayMs: this.retry.initialDelayMs,
					maxDelayMs: this.retry.maxDelayMs,
					sleep: this.retry.sleep,
					shouldRetry: isRateLimitError,
					onRetry: (_error, attempt, delayMs) => {
						this.logger.warn('Rate limited, retrying', { operation, attempt, delayMs });
					},
				}
			);
			this.logger.info('Completion received', { operation });
			return { ok: true, text };
		} catch (error) {
			const failure = classifyError(error, errorContext);
			this.logger.error('Completion failed', { operation, kind: failure.kind, error });
			return failure;
		}
	}
}
