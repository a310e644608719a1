/**
 * SQL identifier helpers
 *
 * Every table name that reaches the engine passes through sanitizeIdentifier,
 * so quoting is only needed for column names taken from user files.
 */

/** PostgreSQL truncates identifiers beyond this many bytes */
export const PG_IDENTIFIER_MAX = 63

const SANITIZED_MAX = 64

/**
 * Reduce arbitrary text to a safe, lower-case identifier.
 *
 * "Order Details" → "orderdetails", "123abc" → "t_123abc"
 */
export function sanitizeIdentifier(identifier: string): string {
	let clean = identifier.replace(/[^A-Za-z0-9_]/g, "")
	if (!/^[A-Za-z_]/.test(clean)) {
		clean = `t_${clean}`
	}
	return clean.slice(0, SANITIZED_MAX).toLowerCase()
}

/** sanitizeIdentifier, further capped to what PostgreSQL keeps */
export function sanitizeTableName(name: string): string {
	return sanitizeIdentifier(name).slice(0, PG_IDENTIFIER_MAX)
}

/** Double-quote an identifier, escaping embedded quotes */
export function quoteIdentifier(identifier: string): string {
	return `"${identifier.replace(/"/g, '""')}"`
}

/**
 * Longest prefix of `text` that fits in `maxBytes` of UTF-8, cut between characters
 */
export function truncateUtf8(text: string, maxBytes: number): string {
	if (Buffer.byteLength(text, "utf8") <= maxBytes) return text
	let out = ""
	let bytes = 0
	for (const char of text) {
		const size = Buffer.byteLength(char, "utf8")
		if (bytes + size > maxBytes) break
		out += char
		bytes += size
	}
	return out
}
