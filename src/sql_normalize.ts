/**
 * Normalization of model output into a bare SQL statement
 *
 * Model replies are untrusted text: they may wrap the query in markdown
 * fences, add a language tag, or chat before and after the block.
 * normalizeSql is pure and idempotent: normalizeSql(normalizeSql(x)) === normalizeSql(x).
 */

const SQL_START = /^(SELECT|WITH|INSERT|UPDATE|DELETE)\b/i
const FENCE = "```"
const CLOSED_FENCE = /```([\s\S]*?)```/

/**
 * Drop a markdown language tag ("sql", "postgresql") from the start of a fenced block
 */
function stripLanguageTag(block: string): string {
	const tag = /^[\w-]+/.exec(block)
	if (!tag || SQL_START.test(tag[0])) return block
	return block.slice(tag[0].length)
}

/**
 * Body of the first fenced block, or of an unclosed leading fence.
 * Returns null when the text carries no fence.
 */
function extractFencedBlock(text: string): string | null {
	const closed = CLOSED_FENCE.exec(text)
	if (closed) return stripLanguageTag(closed[1])
	if (text.startsWith(FENCE)) return stripLanguageTag(text.slice(FENCE.length))
	return null
}

export function normalizeSql(raw: string): string {
	let current = raw.trim()
	for (;;) {
		if (SQL_START.test(current)) return current
		const block = extractFencedBlock(current)
		if (block === null) return current
		const next = block.trim()
		if (next === current) return current
		current = next
	}
}
