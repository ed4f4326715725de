/**
 * Provider types and interfaces
 *
 * Defines the contract the writing assistant uses to reach a hosted model.
 */

/**
 * Chat message format (common across all providers)
 */
export interface ChatMessage {
	role: 'user' | 'assistant';
	content: string;
}

/**
 * A single request/response completion
 */
export interface CompletionRequest {
	maxTokens: number;
	temperature: number;
	/** Optional system instruction */
	system?: string;
	messages: ChatMessage[];
}

/**
 * Completion provider interface
 *
 * Implementations throw on failure; the writing assistant classifies
 * whatever they throw.
 */
export interface CompletionProvider {
	readonly model: string;

	/**
	 * Return the text of the model's reply
	 */
	complete(request: CompletionRequest): Promise<string>;
}
