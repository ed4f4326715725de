/**
 * Retry a function with exponential backoff.
 */

export interface RetryOptions {
	/** Total attempts, including the first */
	attempts: number;
	initialDelayMs: number;
	maxDelayMs: number;
	/** Only errors this accepts are retried; anything else is rethrown at once */
	shouldRetry: (error: unknown) => boolean;
	sleep?: (ms: number) => Promise<void>;
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the given retry (1-based): initial, 2x, 4x, ... capped at max
 */
export function backoffDelay(retry: number, initialDelayMs: number, maxDelayMs: number): number {
	return Math.min(initialDelayMs * Math.pow(2, retry - 1), maxDelayMs);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
	const { attempts, initialDelayMs, maxDelayMs, shouldRetry, onRetry } = options;
	const wait = options.sleep ?? sleep;
	let lastError: unknown;

	for (let attempt = 1; attempt <= attempts; attempt++) {
		try {
			return await fn(attempt);
		} catch (error) {
			lastError = error;

			if (!shouldRetry(error) || attempt === attempts) {
				throw error;
			}

			const delay = backoffDelay(attempt, initialDelayMs, maxDelayMs);
			onRetry?.(error, attempt, delay);
			await wait(delay);
		}
	}

	throw lastError;
}
