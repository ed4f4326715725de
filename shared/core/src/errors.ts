/**
 * Node filesystem errors carry a string `code` (ENOENT, EEXIST, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
	return error instanceof Error && 'code' in error && error.code === code;
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
