/**
 * String and vector similarity on a 0-100 scale
 *
 * ratio:        normalized longest-common-subsequence similarity of two strings
 * partialRatio: best ratio of the shorter string against any same-length window of the longer
 * cosine:       cosine similarity of two embedding vectors, scaled and clamped
 */

function lcsLength(a: string, b: string): number {
	if (a.length === 0 || b.length === 0) return 0
	let prev = new Array<number>(b.length + 1).fill(0)
	let curr = new Array<number>(b.length + 1).fill(0)
	for (let i = 1; i <= a.length; i++) {
		for (let j = 1; j <= b.length; j++) {
			curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1])
		}
		;[prev, curr] = [curr, prev]
		curr.fill(0)
	}
	return prev[b.length]
}

function rawRatio(a: string, b: string): number {
	const total = a.length + b.length
	if (a.length === 0 || b.length === 0) return 0
	return (200 * lcsLength(a, b)) / total
}

/**
 * Similarity of two whole strings, rounded to an integer in [0, 100]
 */
export function ratio(a: string, b: string): number {
	return Math.round(rawRatio(a, b))
}

/**
 * Similarity of the shorter string to its best-aligned window in the longer one.
 *
 * Windows slide past both ends, so a keyword that overlaps only the start or
 * end of a column name still scores.
 */
export function partialRatio(a: string, b: string): number {
	if (a.length === 0 || b.length === 0) return 0
	const [short, long] = a.length <= b.length ? [a, b] : [b, a]
	if (long.includes(short)) return 100

	let best = 0
	for (let start = -(short.length - 1); start < long.length; start++) {
		const window = long.slice(Math.max(0, start), Math.min(long.length, start + short.length))
		const score = rawRatio(short, window)
		if (score > best) best = score
	}
	return Math.round(best)
}

/**
 * Cosine similarity × 100, clamped to [0, 100]. Mismatched or zero vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length === 0 || a.length !== b.length) return 0
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	const score = (dot / (Math.sqrt(normA) * Math.sqrt(normB))) * 100
	return Math.min(100, Math.max(0, score))
}
