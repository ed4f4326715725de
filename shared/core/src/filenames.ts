/**
 * Helpers for deriving document storage keys and normalizing editor input
 */

const KEY_REGEX = /^[\p{L}\p{N}_-]+$/u;

/** UTF-8 bytes kept from a title's slug */
export const MAX_SLUG_BYTES = 100;

/** Slug, `_YYYYMMDD_HHMMSS` and a `-N` collision suffix, with room to spare */
export const MAX_KEY_BYTES = 128;

function truncateBytes(value: string, maxBytes: number): string {
	let out = '';
	let bytes = 0;
	for (const char of value) {
		bytes += Buffer.byteLength(char, 'utf-8');
		if (bytes > maxBytes) {
			break;
		}
		out += char;
	}
	return out;
}

/**
 * Filesystem-safe slug of a title: lowercase, whitespace runs become `_`,
 * anything other than letters, digits, `_` and `-` is dropped. Cut to
 * MAX_SLUG_BYTES on a code point boundary.
 */
export function slugify(title: string): string {
	const slug = title
		.trim()
		.toLowerCase()
		.replace(/\s+/g, '_')
		.replace(/[^\p{L}\p{N}_-]/gu, '');
	return truncateBytes(slug, MAX_SLUG_BYTES) || 'untitled';
}

function pad(value: number): string {
	return value.toString().padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
	return `${day}_${time}`;
}

export function documentKey(title: string, date: Date): string {
	return `${slugify(title)}_${formatTimestamp(date)}`;
}

/**
 * Keys are used as file names, so anything that could leave the
 * store's directory is rejected.
 */
export function isValidDocumentKey(key: string): boolean {
	return (
		key.length > 0 && Buffer.byteLength(key, 'utf-8') <= MAX_KEY_BYTES && KEY_REGEX.test(key)
	);
}

/**
 * Split a comma-separated keyword string, trimming and dropping empty entries.
 */
export function parseKeywords(value: string | string[]): string[] {
	const parts = Array.isArray(value) ? value : value.split(',');
	return parts.map((k) => k.trim()).filter((k) => k.length > 0);
}
