/**
 * Fixed instructions and sampling settings for each assistant operation
 */

export interface PromptSettings {
	system?: string;
	maxTokens: number;
	temperature: number;
}

export const IMPROVE_WRITING: PromptSettings = {
	system:
		'You are a professional editor. Your task is to improve writing for clarity and conciseness while maintaining the original meaning.',
	maxTokens: 2048,
	temperature: 0.3,
};

export const ANALYZE_CONTENT: PromptSettings = {
	system:
		'You are a content analysis expert. Provide clear, structured feedback focusing on organization, clarity, and specific improvement suggestions.',
	maxTokens: 1024,
	temperature: 0.1,
};

// No system instruction: the transcript is the whole context
export const CHAT: PromptSettings = {
	maxTokens: 2048,
	temperature: 0.7,
};

export function improveWritingPrompt(content: string): string {
	return `Please improve this writing for clarity and conciseness:\n\n${content}`;
}

export function analyzeContentPrompt(content: string): string {
	return `Analyze this text and provide feedback on:
1. Overall structure
2. Clarity and readability
3. Specific improvement suggestions

Text to analyze:
${content}`;
}
