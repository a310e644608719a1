/**
 * Pipeline Orchestrator
 *
 * RelevanceCheck → SchemaResolution → ContextAssembly → SQLGeneration →
 * SelfCorrectingExecution → [InsightSummary]
 *
 * Stages run strictly in order. `stream` yields progress events in stage
 * order; `run` drains the same stages and returns the terminal result.
 * Relevance rejection, generation failure, engine failure and retry
 * exhaustion come back as failed results. Anything else propagates.
 */

import { v4 as uuidv4 } from "uuid"
import { DEFAULTS, GenerationError, NL2SQLError, errorMessage } from "./config.js"
import { buildSqlGenerationPrompt, buildSummaryPrompt, formatSchemaForPrompt } from "./prompts.js"
import { checkRelevance, rejectionMessage } from "./relevance_gate.js"
import { detectRelationships } from "./relationships.js"
import { formatEnrichedContext, type SchemaResolver } from "./schema_resolver.js"
import { normalizeSql } from "./sql_normalize.js"
import type { SelfCorrectingExecutor } from "./critic.js"
import type { TextGenerator } from "./model_client.js"
import type { Logger } from "./logger.js"
import type {
	Attempt,
	ColumnInfo,
	EnrichedContext,
	ExecutionEngine,
	ExecutionResult,
	FailureKind,
	PipelineEvent,
	PipelineResult,
	PriorTurn,
	Schema,
} from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export interface PipelineOptions {
	relevanceThreshold: number
	relationshipThreshold: number
	categoricalMaxDistinct: number
	dialect: string
	datasetNotes: string
	generation: { temperature?: number; maxTokens?: number }
	summary: { enabled: boolean; maxRows: number; temperature: number; maxTokens: number }
}

export interface PipelineDeps {
	engine: ExecutionEngine
	resolver: SchemaResolver
	generator: TextGenerator
	critic: SelfCorrectingExecutor
	logger: Logger
}

export interface RunOptions {
	/** Restrict the run to these tables (unknown names ignored) */
	tables?: readonly string[]
	/** Earlier question/SQL pairs; when present the relevance gate is skipped */
	history?: readonly PriorTurn[]
	/** Produce an insight summary after a successful run */
	summarize?: boolean
	signal?: AbortSignal
}

const NO_TABLES_MESSAGE = "No tables found in the database."

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
	relevanceThreshold: DEFAULTS.relevanceThreshold,
	relationshipThreshold: DEFAULTS.relationshipThreshold,
	categoricalMaxDistinct: DEFAULTS.categoricalMaxDistinct,
	dialect: "PostgreSQL",
	datasetNotes: "",
	generation: {},
	summary: { enabled: true, maxRows: DEFAULTS.summaryMaxRows, temperature: 0.7, maxTokens: 200 },
}

export function exhaustionMessage(attempts: number, error: string | null): string {
	return `Could not produce a working query after ${attempts} attempt(s). Last error: ${error ?? "unknown"}`
}

/**
 * Full schema restricted to the requested tables, in schema order.
 * No selection (or nothing known selected) means the full schema.
 */
export function selectTables(schema: Schema, tables: readonly string[] | undefined): Schema {
	if (!tables || tables.length === 0) return schema
	const wanted = new Set(tables)
	const selected: Record<string, readonly ColumnInfo[]> = {}
	for (const [table, columns] of Object.entries(schema)) {
		if (wanted.has(table)) selected[table] = columns
	}
	return Object.keys(selected).length > 0 ? selected : schema
}

/** Failures reported as a result; null means the error propagates */
function failureKindOf(error: unknown): FailureKind | null {
	if (!(error instanceof NL2SQLError)) return null
	if (error.type === "generation") return "generation"
	if (error.type === "engine") return "engine"
	return null
}

// ============================================================================
// Orchestrator
// ============================================================================

export class Pipeline {
	private options: PipelineOptions

	constructor(
		private deps: PipelineDeps,
		options: Partial<PipelineOptions> = {},
	) {
		this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options }
	}

	/**
	 * Answer a question and return the terminal result
	 */
	async run(question: string, options: RunOptions = {}): Promise<PipelineResult> {
		const stages = this.process(question, options, options.summarize ?? false)
		let next = await stages.next()
		while (!next.done) {
			next = await stages.next()
		}
		return next.value
	}

	/**
	 * Answer a question as an ordered stream of progress events.
	 *
	 * Ends after the result (and summary) or after the first fatal error.
	 */
	async *stream(question: string, options: RunOptions = {}): AsyncGenerator<PipelineEvent, PipelineResult, void> {
		return yield* this.process(question, options, options.summarize ?? this.options.summary.enabled)
	}

	// ── Stages ──────────────────────────────────────────────────────────

	private async *process(
		question: string,
		options: RunOptions,
		summarize: boolean,
	): AsyncGenerator<PipelineEvent, PipelineResult, void> {
		const { resolver, critic, logger } = this.deps
		const queryId = uuidv4()
		const signal = options.signal
		const history = options.history ?? []
		const startTime = Date.now()

		logger.info("Question received", {
			query_id: queryId,
			question,
			tables: options.tables,
			turns: history.length,
			matching_mode: resolver.mode,
		})

		let enriched: EnrichedContext | null = null
		// Attempts seen so far, kept when a later stage fails
		const tried: Attempt[] = []
		const fail = (failure: FailureKind, error: string, sql: string | null = null): PipelineResult => {
			logger.info("Question failed", {
				query_id: queryId,
				failure,
				error,
				attempts: tried.length,
				duration_ms: Date.now() - startTime,
			})
			return {
				query_id: queryId,
				question,
				success: false,
				sql,
				data: null,
				error,
				attempts: tried.length,
				history: [...tried],
				relevant_tables: enriched?.relevant_tables ?? [],
				column_matches: enriched?.column_matches ?? [],
				failure,
			}
		}

		yield { type: "thinking", content: "Analyzing your question..." }

		// One snapshot for the whole run: the one the resolver scores against
		const fullSchema = resolver.getSchema()
		if (Object.keys(fullSchema).length === 0) {
			yield { type: "error", content: NO_TABLES_MESSAGE, fatal: true }
			return fail("relevance", NO_TABLES_MESSAGE)
		}
		const schema = selectTables(fullSchema, options.tables)

		if (history.length === 0) {
			const verdict = checkRelevance(question, schema, this.options.relevanceThreshold)
			if (!verdict.relevant) {
				const message = rejectionMessage(schema)
				yield { type: "error", content: message, fatal: true }
				return fail("relevance", message)
			}
			logger.debug("Relevance check passed", { query_id: queryId, token: verdict.matchedToken })
		}

		signal?.throwIfAborted()
		yield { type: "thinking", content: "Searching schema for relevant tables..." }

		enriched = await resolver.enrich(question, schema, signal)
		const tableList = enriched.relevant_tables.join(", ") || "none found"
		yield { type: "thinking", content: `Found relevant tables: ${tableList}` }

		signal?.throwIfAborted()
		const context = await this.assembleContext(enriched, schema, queryId)

		let sql: string
		try {
			sql = await this.generateSql(context, question, history, signal)
		} catch (error) {
			const kind = failureKindOf(error)
			if (!kind || signal?.aborted) throw error
			const message = errorMessage(error)
			yield { type: "error", content: message, fatal: true }
			return fail(kind, message)
		}
		yield { type: "sql", content: sql }

		const steps = critic.steps({ sql, schemaText: formatSchemaForPrompt(schema), question, signal })
		let outcome: ExecutionResult
		let executing = false
		try {
			let step = await steps.next()
			while (!step.done) {
				if (step.value.kind === "attempting") {
					tried.push({ sql: step.value.sql, error: null })
					executing = true
				} else {
					const last = tried.pop()
					if (last) tried.push({ ...last, error: step.value.error })
					executing = false
					yield { type: "thinking", content: `Refining query... (attempt ${step.value.attempt})` }
				}
				step = await steps.next()
			}
			outcome = step.value
		} catch (error) {
			const kind = failureKindOf(error)
			if (!kind || signal?.aborted) throw error
			const message = errorMessage(error)
			const last = tried.pop()
			if (last) tried.push(executing ? { ...last, error: message } : last)
			yield { type: "error", content: message, fatal: true }
			return fail(kind, message, last?.sql ?? sql)
		}

		const result: PipelineResult = {
			...outcome,
			query_id: queryId,
			question,
			relevant_tables: enriched.relevant_tables,
			column_matches: enriched.column_matches,
			failure: outcome.success ? null : "execution",
		}

		if (!outcome.success || !outcome.data) {
			const message = exhaustionMessage(outcome.attempts, outcome.error)
			logger.info("Question failed", {
				query_id: queryId,
				failure: "execution",
				attempts: outcome.attempts,
				duration_ms: Date.now() - startTime,
			})
			yield { type: "error", content: message, fatal: true }
			return { ...result, error: message }
		}

		const rows = outcome.data.rows
		yield { type: "result", content: rows, row_count: outcome.data.row_count, attempts: outcome.attempts, sql: outcome.sql }

		logger.info("Question answered", {
			query_id: queryId,
			attempts: outcome.attempts,
			rows: outcome.data.row_count,
			duration_ms: Date.now() - startTime,
		})

		if (!summarize) return result

		// Best effort: a failed summary never invalidates the result
		yield { type: "thinking", content: "Generating insight summary..." }
		let summary = ""
		try {
			for await (const chunk of this.deps.generator.generateStream(
				buildSummaryPrompt(question, rows, this.options.summary.maxRows),
				{ temperature: this.options.summary.temperature, maxTokens: this.options.summary.maxTokens, signal },
			)) {
				summary += chunk
				yield { type: "summary", content: chunk }
			}
		} catch (error) {
			if (signal?.aborted) throw error
			logger.warn("Insight summary failed", { query_id: queryId, error: errorMessage(error) })
			yield { type: "error", content: `Insight generation failed: ${errorMessage(error)}`, fatal: false }
			return result
		}
		yield { type: "summary_done" }

		return { ...result, summary }
	}

	/**
	 * Resolver context plus the optional join and categorical blocks.
	 * Either augmentation is skipped with a warning when it fails.
	 */
	private async assembleContext(enriched: EnrichedContext, schema: Schema, queryId: string): Promise<string> {
		const { engine, logger } = this.deps
		let context = formatEnrichedContext(enriched)

		try {
			const relationships = detectRelationships(schema, this.options.relationshipThreshold)
			if (relationships.length > 0) {
				context += `\n\nDetected Join Relationships:\n${relationships.join("\n")}`
			}
		} catch (error) {
			logger.warn("Relationship detection failed", { query_id: queryId, error: errorMessage(error) })
		}

		try {
			const categoricals = await engine.getCategoricalValues(Object.keys(schema), this.options.categoricalMaxDistinct)
			const lines = Object.entries(categoricals).map(([key, values]) => `${key}: ${values.join(", ")}`)
			if (lines.length > 0) {
				context += `\n\nCategorical Values:\n${lines.join("\n")}`
			}
		} catch (error) {
			logger.warn("Categorical value lookup failed", { query_id: queryId, error: errorMessage(error) })
		}

		return context
	}

	private async generateSql(
		context: string,
		question: string,
		history: readonly PriorTurn[],
		signal: AbortSignal | undefined,
	): Promise<string> {
		const messages = buildSqlGenerationPrompt(context, question, {
			dialect: this.options.dialect,
			history,
			notes: this.options.datasetNotes,
		})
		const raw = await this.deps.generator.generate(messages, { ...this.options.generation, signal })
		const sql = normalizeSql(raw)
		if (!sql) throw new GenerationError("Model returned an empty reply")
		this.deps.logger.debug("SQL generated", { sql })
		return sql
	}
}
