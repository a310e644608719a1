/**
 * Schema Resolver
 *
 * Maps question keywords to candidate (table, column) pairs and samples a few
 * values for each match, producing the EnrichedContext the prompt is built from.
 *
 * Algorithm:
 * 1. Extract keywords (stop words dropped)
 * 2. Score every keyword against every column of the active tables
 * 3. Keep the best match per (table, column) at or above the threshold
 * 4. Sample distinct values for each kept column
 * 5. Relevant tables = tables of kept matches, first-seen order
 *
 * The flattened columns and their index live in one immutable snapshot that
 * refreshSchema swaps atomically; enrich works on the snapshot it started with.
 */

import { errorMessage, DEFAULTS } from "./config.js"
import { formatSchemaForPrompt } from "./prompts.js"
import type { ColumnIndex, MatchingStrategy } from "./column_matcher.js"
import type { ColumnMatch, EnrichedContext, ExecutionEngine, MatchingMode, Schema } from "./schema_types.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Keywords
// ============================================================================

const STOP_WORDS = new Set([
	"the", "a", "an", "is", "in", "of", "for", "by", "and",
	"or", "to", "show", "me", "what", "how", "many", "which",
	"who", "where", "get", "find", "list", "give", "with", "per",
])

/** Lower-cased word tokens */
export function tokenize(question: string): string[] {
	return question
		.toLowerCase()
		.split(/[^\p{L}\p{N}_]+/u)
		.filter((t) => t.length > 0)
}

export function extractKeywords(question: string): string[] {
	return tokenize(question).filter((t) => !STOP_WORDS.has(t))
}

// ============================================================================
// Types
// ============================================================================

export interface ResolverOptions {
	/** Minimum combined score (0-100) for a match */
	fuzzyThreshold: number
	/** Distinct values sampled per matched column */
	sampleValues: number
}

interface FlatColumn {
	table: string
	column: string
	type: string
}

interface ResolverSnapshot {
	schema: Schema
	columns: readonly FlatColumn[]
	index: ColumnIndex
}

function flattenSchema(schema: Schema): FlatColumn[] {
	return Object.entries(schema).flatMap(([table, columns]) =>
		columns.map((c) => ({ table, column: c.column, type: c.type })),
	)
}

// ============================================================================
// Resolver
// ============================================================================

export class SchemaResolver {
	private generation = 0

	private constructor(
		private engine: ExecutionEngine,
		private strategy: MatchingStrategy,
		private options: ResolverOptions,
		private logger: Logger,
		private snapshot: ResolverSnapshot,
	) {}

	static async create(
		engine: ExecutionEngine,
		strategy: MatchingStrategy,
		options: Partial<ResolverOptions>,
		logger: Logger,
	): Promise<SchemaResolver> {
		const schema = engine.getSchema()
		const snapshot = await SchemaResolver.buildSnapshot(strategy, schema)
		const resolver = new SchemaResolver(
			engine,
			strategy,
			{
				fuzzyThreshold: options.fuzzyThreshold ?? DEFAULTS.fuzzyThreshold,
				sampleValues: options.sampleValues ?? DEFAULTS.sampleValues,
			},
			logger,
			snapshot,
		)
		logger.info("Schema resolver ready", { mode: snapshot.index.mode, columns: snapshot.columns.length })
		return resolver
	}

	private static async buildSnapshot(strategy: MatchingStrategy, schema: Schema): Promise<ResolverSnapshot> {
		const columns = flattenSchema(schema)
		const index = await strategy.buildIndex(columns.map((c) => c.column))
		return { schema, columns, index }
	}

	/** Mode of the current snapshot */
	get mode(): MatchingMode {
		return this.snapshot.index.mode
	}

	/** Schema the current snapshot was built from */
	getSchema(): Schema {
		return this.snapshot.schema
	}

	/**
	 * Resolve a question against the active tables in `schema`.
	 *
	 * Never fails for "no matches": relevant_tables is then empty.
	 */
	async enrich(question: string, schema: Schema, signal?: AbortSignal): Promise<EnrichedContext> {
		const snapshot = this.snapshot
		const keywords = extractKeywords(question)
		const activeTables = new Set(Object.keys(schema))

		let mode = snapshot.index.mode
		const best = new Map<string, ColumnMatch>()

		if (keywords.length > 0 && snapshot.columns.length > 0) {
			const scored = await snapshot.index.scoreKeywords(keywords, signal)
			mode = scored.mode

			keywords.forEach((keyword, k) => {
				snapshot.columns.forEach((entry, i) => {
					if (!activeTables.has(entry.table)) return
					const score = scored.scores[k]?.[i] ?? 0
					if (score < this.options.fuzzyThreshold) return

					const key = `${entry.table}\u0000${entry.column}`
					const existing = best.get(key)
					// Ties keep the first keyword; Map keeps first-insertion order
					if (!existing || score > existing.score) {
						best.set(key, { keyword, table: entry.table, column: entry.column, score })
					}
				})
			})
		}

		const columnMatches = [...best.values()]
		const valueHints: Record<string, unknown[]> = {}
		for (const match of columnMatches) {
			valueHints[`${match.table}.${match.column}`] = await this.sampleValues(match.table, match.column)
		}

		const relevantTables = [...new Set(columnMatches.map((m) => m.table))]

		this.logger.debug("Question enriched", {
			keywords,
			mode,
			matches: columnMatches.length,
			relevant_tables: relevantTables,
		})

		return {
			original_schema: schema,
			column_matches: columnMatches,
			value_hints: valueHints,
			relevant_tables: relevantTables,
			matching_mode: mode,
		}
	}

	/**
	 * Rebuild columns (and embeddings) for a new schema, then swap the snapshot.
	 *
	 * If a newer refresh started while this one was building, this result is dropped.
	 */
	async refreshSchema(newSchema: Schema): Promise<void> {
		const generation = ++this.generation
		const snapshot = await SchemaResolver.buildSnapshot(this.strategy, newSchema)
		if (generation !== this.generation) {
			this.logger.debug("Discarding superseded schema refresh", { generation })
			return
		}
		this.snapshot = snapshot
		this.logger.info("Schema resolver refreshed", {
			mode: snapshot.index.mode,
			tables: Object.keys(newSchema).length,
			columns: snapshot.columns.length,
		})
	}

	private async sampleValues(table: string, column: string): Promise<unknown[]> {
		if (this.options.sampleValues <= 0) return []
		try {
			return await this.engine.sampleDistinctValues(table, column, this.options.sampleValues)
		} catch (error) {
			this.logger.warn("Value sampling failed", { table, column, error: errorMessage(error) })
			return []
		}
	}
}

// ============================================================================
// Formatting
// ============================================================================

function formatValue(value: unknown): string {
	return value instanceof Date ? value.toISOString() : String(value)
}

/**
 * Render an EnrichedContext as prompt text.
 *
 * Schema is restricted to relevant_tables, or the whole schema when none matched.
 */
export function formatEnrichedContext(enriched: EnrichedContext): string {
	const filtered: Record<string, Schema[string]> = {}
	for (const table of enriched.relevant_tables) {
		const columns = enriched.original_schema[table]
		if (columns) filtered[table] = columns
	}
	const shown = Object.keys(filtered).length > 0 ? filtered : enriched.original_schema

	const parts = [`Matching mode: ${enriched.matching_mode}\n${formatSchemaForPrompt(shown)}`]

	if (enriched.column_matches.length > 0) {
		parts.push("Semantic Hints:")
		for (const match of enriched.column_matches) {
			parts.push(`  '${match.keyword}' likely refers to ${match.table}.${match.column}`)
		}
		for (const [key, values] of Object.entries(enriched.value_hints)) {
			if (values.length > 0) {
				parts.push(`  Sample values for ${key}: ${values.map(formatValue).join(", ")}`)
			}
		}
	}

	return parts.join("\n")
}
