/**
 * Anthropic provider implementation
 *
 * Implements CompletionProvider for Claude models.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionProvider, CompletionRequest } from './types.ts';

export const DEFAULT_MODEL = 'claude-3-7-sonnet-20250219';

export interface AnthropicProviderOptions {
	apiKey: string;
	model?: string;
	/** Network timeout per request */
	timeoutMs?: number;
}

export class AnthropicProvider implements CompletionProvider {
	readonly model: string;
	private client: Anthropic;

	constructor(options: AnthropicProviderOptions) {
		this.model = options.model ?? DEFAULT_MODEL;
		// Retries are driven by the writing assistant's own policy
		this.client = new Anthropic({
			apiKey: options.apiKey,
			timeout: options.timeoutMs,
			maxRetries: 0,
		});
	}

	async complete(request: CompletionRequest): Promise<string> {
		const response = await this.client.messages.create({
			model: this.model,
			max_tokens: request.maxTokens,
			temperature: request.temperature,
			...(request.system ? { system: request.system } : {}),
			messages: request.messages,
		});

		const block = response.content[0];
		if (!block || block.type !== 'text') {
			throw new Error('Response did not contain any text content');
		}
		return block.text;
	}
}
