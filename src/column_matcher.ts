/**
 * Column matching strategies
 *
 * Two strategies implement the same scoring contract (0-100 per
 * keyword/column pair); the resolver picks one at startup and never
 * branches on capability again.
 *
 * - lexical: partial-ratio of keyword vs lower-cased column name
 * - hybrid:  max(lexical, cosine similarity of embeddings × 100)
 */

import { cosineSimilarity, partialRatio } from "./similarity.js"
import { errorMessage } from "./config.js"
import type { Embedder } from "./model_client.js"
import type { MatchingMode } from "./schema_types.js"
import type { Logger } from "./logger.js"

export interface KeywordScores {
	/** Mode actually used for this call (hybrid degrades to lexical on failure) */
	mode: MatchingMode
	/** scores[k][i] = keyword k vs column i */
	scores: number[][]
}

/**
 * Column names prepared for scoring (embeddings precomputed in hybrid mode)
 */
export interface ColumnIndex {
	readonly mode: MatchingMode
	readonly size: number
	scoreKeywords(keywords: readonly string[], signal?: AbortSignal): Promise<KeywordScores>
}

export interface MatchingStrategy {
	readonly mode: MatchingMode
	buildIndex(columnNames: readonly string[], signal?: AbortSignal): Promise<ColumnIndex>
}

// ============================================================================
// Lexical
// ============================================================================

function lexicalScores(keywords: readonly string[], names: readonly string[]): number[][] {
	return keywords.map((kw) => names.map((name) => partialRatio(kw, name)))
}

class LexicalIndex implements ColumnIndex {
	readonly mode = "lexical"
	private names: string[]

	constructor(columnNames: readonly string[]) {
		this.names = columnNames.map((n) => n.toLowerCase())
	}

	get size(): number {
		return this.names.length
	}

	async scoreKeywords(keywords: readonly string[]): Promise<KeywordScores> {
		return { mode: "lexical", scores: lexicalScores(keywords, this.names) }
	}
}

export class LexicalStrategy implements MatchingStrategy {
	readonly mode = "lexical"

	async buildIndex(columnNames: readonly string[]): Promise<ColumnIndex> {
		return new LexicalIndex(columnNames)
	}
}

// ============================================================================
// Hybrid
// ============================================================================

class HybridIndex implements ColumnIndex {
	readonly mode = "hybrid"
	private names: string[]

	constructor(
		columnNames: readonly string[],
		private columnEmbeddings: readonly number[][],
		private embedder: Embedder,
		private logger: Logger,
	) {
		this.names = columnNames.map((n) => n.toLowerCase())
	}

	get size(): number {
		return this.names.length
	}

	async scoreKeywords(keywords: readonly string[], signal?: AbortSignal): Promise<KeywordScores> {
		const lexical = lexicalScores(keywords, this.names)
		if (keywords.length === 0 || this.names.length === 0) {
			return { mode: "hybrid", scores: lexical }
		}

		let keywordEmbeddings: number[][]
		try {
			keywordEmbeddings = await this.embedder.embed([...keywords], signal)
		} catch (error) {
			this.logger.warn("Keyword embedding failed, using lexical scores for this question", {
				error: errorMessage(error),
			})
			return { mode: "lexical", scores: lexical }
		}

		const scores = lexical.map((row, k) =>
			row.map((lex, i) => Math.max(lex, cosineSimilarity(keywordEmbeddings[k] ?? [], this.columnEmbeddings[i] ?? []))),
		)
		return { mode: "hybrid", scores }
	}
}

export class HybridStrategy implements MatchingStrategy {
	readonly mode = "hybrid"

	constructor(
		private embedder: Embedder,
		private logger: Logger,
	) {}

	/**
	 * Embed every column name once. If that fails, the snapshot scores lexically.
	 */
	async buildIndex(columnNames: readonly string[], signal?: AbortSignal): Promise<ColumnIndex> {
		if (columnNames.length === 0) {
			return new HybridIndex([], [], this.embedder, this.logger)
		}
		try {
			const embeddings = await this.embedder.embed(
				columnNames.map((n) => n.toLowerCase()),
				signal,
			)
			return new HybridIndex(columnNames, embeddings, this.embedder, this.logger)
		} catch (error) {
			this.logger.warn("Column embedding failed, falling back to lexical matching", {
				columns: columnNames.length,
				error: errorMessage(error),
			})
			return new LexicalIndex(columnNames)
		}
	}
}

// ============================================================================
// Selection
// ============================================================================

export interface StrategySelection {
	embedder?: Embedder
	/** Semantic matching switched on in config */
	enabled: boolean
	logger: Logger
}

/**
 * Resolve the matching mode once at startup: hybrid only when enabled and
 * a probe embedding succeeds.
 */
export async function selectMatchingStrategy(selection: StrategySelection): Promise<MatchingStrategy> {
	const { embedder, enabled, logger } = selection
	if (!enabled || !embedder) {
		logger.info("Using lexical matching only", { reason: enabled ? "no embedder" : "disabled in config" })
		return new LexicalStrategy()
	}

	try {
		const [probe] = await embedder.embed(["probe"])
		if (!probe || probe.length === 0) {
			logger.warn("Embedding probe returned no vector, using lexical matching")
			return new LexicalStrategy()
		}
		logger.info("Hybrid matching enabled (lexical + semantic)", { dimensions: probe.length })
		return new HybridStrategy(embedder, logger)
	} catch (error) {
		logger.warn("Embedding model unavailable, using lexical matching", { error: errorMessage(error) })
		return new LexicalStrategy()
	}
}
