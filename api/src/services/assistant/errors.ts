/**
 * Classification of completion failures into user-facing results
 */

import Anthropic from '@anthropic-ai/sdk';
import { getErrorMessage } from '@quill/core';

export type FailureKind =
	| 'authentication'
	| 'bad_request'
	| 'rate_limit'
	| 'api'
	| 'unexpected'
	| 'invalid_input';

export interface AssistantSuccess {
	ok: true;
	text: string;
}

export interface AssistantFailure {
	ok: false;
	kind: FailureKind;
	/** Human-readable description, suitable for display */
	message: string;
}

export type AssistantResult = AssistantSuccess | AssistantFailure;

/**
 * API errors that came back with an HTTP status. Connection failures
 * and timeouts are APIErrors too in the SDK, but have no status.
 */
function isStatusError(error: unknown): error is InstanceType<typeof Anthropic.APIError> {
	return error instanceof Anthropic.APIError && !(error instanceof Anthropic.APIConnectionError);
}

export function isRateLimitError(error: unknown): boolean {
	return isStatusError(error) && error.status === 429;
}

export function invalidInput(message: string): AssistantFailure {
	return { ok: false, kind: 'invalid_input', message };
}

/**
 * Map an error to a result.
 * @param context - prefix for non-API failures, e.g. "Error analyzing content"
 */
export function classifyError(error: unknown, context: string): AssistantFailure {
	if (isStatusError(error)) {
		switch (error.status) {
			case 401:
				return { ok: false, kind: 'authentication', message: 'Authentication error: Check your API key' };
			case 400:
				return { ok: false, kind: 'bad_request', message: 'Bad request: Check your parameters' };
			case 429:
				return { ok: false, kind: 'rate_limit', message: 'Rate limit exceeded: Slow down requests' };
			default:
				return { ok: false, kind: 'api', message: `API error: ${error.message}` };
		}
	}

	return { ok: false, kind: 'unexpected', message: `${context}: ${getErrorMessage(error)}` };
}
