/**
 * Relevance gate
 *
 * Rejects questions that share no vocabulary with the loaded tables before
 * any generation budget is spent. Vocabulary is derived from the schema on
 * every call, so newly loaded tables count immediately.
 */

import { DEFAULTS } from "./config.js"
import { partialRatio } from "./similarity.js"
import { tokenize } from "./schema_resolver.js"
import type { Schema } from "./schema_types.js"

/**
 * Underscore-split, lower-cased fragments of every column and table name
 */
export function buildVocabulary(schema: Schema): Set<string> {
	const vocabulary = new Set<string>()
	const add = (name: string) => {
		for (const part of name.toLowerCase().split("_")) {
			if (part) vocabulary.add(part)
		}
	}
	for (const [table, columns] of Object.entries(schema)) {
		for (const c of columns) add(c.column)
		add(table)
	}
	return vocabulary
}

export interface RelevanceVerdict {
	relevant: boolean
	/** Token that let the question through */
	matchedToken?: string
}

/**
 * Relevant when any token is a vocabulary word, or scores at least
 * `threshold` (partial ratio) against some table name.
 */
export function checkRelevance(
	question: string,
	schema: Schema,
	threshold: number = DEFAULTS.relevanceThreshold,
): RelevanceVerdict {
	const vocabulary = buildVocabulary(schema)
	const tables = Object.keys(schema)

	for (const token of tokenize(question)) {
		if (vocabulary.has(token)) return { relevant: true, matchedToken: token }
		if (tables.some((table) => partialRatio(token, table) >= threshold)) {
			return { relevant: true, matchedToken: token }
		}
	}
	return { relevant: false }
}

export function rejectionMessage(schema: Schema): string {
	const examples = Object.keys(schema).slice(0, 3).join(", ")
	return `I can only answer questions about your database. Try asking about ${examples || "your data"}.`
}
