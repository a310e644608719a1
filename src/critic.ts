/**
 * Self-Correcting Executor
 *
 * Runs a SQL statement and, when the engine rejects it, asks the model for a
 * corrected statement with the full history of failed attempts. Bounded by
 * maxRetries total attempts.
 *
 * States per invocation:
 *   attempting(n) → succeeded
 *                 → correcting(n) → attempting(n + 1)
 *                 → exhausted (n == maxRetries)
 *
 * Only ExecutionError drives a correction. Anything else (model failure,
 * engine infrastructure failure, cancellation) propagates as-is and does not
 * count as an attempt.
 */

import { DEFAULTS, ExecutionError, NL2SQLError } from "./config.js"
import { buildCorrectionPrompt } from "./prompts.js"
import { normalizeSql } from "./sql_normalize.js"
import type { ExecutionEngine, Attempt, ExecutionResult } from "./schema_types.js"
import type { TextGenerator } from "./model_client.js"
import type { Logger } from "./logger.js"

export interface CriticOptions {
	/** Total attempts including the first, at least 1 */
	maxRetries: number
	dialect: string
	temperature?: number
	maxTokens?: number
}

export interface CorrectionRequest {
	sql: string
	/** Prompt text describing the schema */
	schemaText: string
	question: string
	signal?: AbortSignal
}

export type CriticStep =
	| { kind: "attempting"; attempt: number; sql: string }
	| { kind: "correcting"; attempt: number; error: string }

export class SelfCorrectingExecutor {
	private options: CriticOptions

	constructor(
		private engine: ExecutionEngine,
		private generator: TextGenerator,
		options: Partial<CriticOptions>,
		private logger: Logger,
	) {
		const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries
		if (!Number.isInteger(maxRetries) || maxRetries < 1) {
			throw new NL2SQLError("execution", `maxRetries must be a positive integer, got ${maxRetries}`)
		}
		this.options = { ...options, maxRetries, dialect: options.dialect ?? "PostgreSQL" }
	}

	get maxRetries(): number {
		return this.options.maxRetries
	}

	/**
	 * Walk the retry state machine, yielding each transition.
	 *
	 * The generator's return value is the terminal ExecutionResult. Each call
	 * owns its history; nothing is shared between invocations.
	 */
	async *steps(request: CorrectionRequest): AsyncGenerator<CriticStep, ExecutionResult, void> {
		const history: Attempt[] = []
		let sql = request.sql

		for (let attempt = 1; ; attempt++) {
			request.signal?.throwIfAborted()
			yield { kind: "attempting", attempt, sql }

			try {
				const data = await this.engine.execute(sql)
				history.push({ sql, error: null })
				this.logger.debug("SQL attempt succeeded", { attempt, rows: data.row_count })
				return { success: true, sql, data, error: null, attempts: attempt, history }
			} catch (error) {
				if (!(error instanceof ExecutionError)) throw error

				history.push({ sql, error: error.message })
				this.logger.info("SQL attempt failed", {
					attempt,
					max_retries: this.options.maxRetries,
					sqlstate: error.sqlstate,
					error: error.message,
				})

				if (attempt >= this.options.maxRetries) {
					return { success: false, sql, data: null, error: error.message, attempts: attempt, history }
				}

				yield { kind: "correcting", attempt: attempt + 1, error: error.message }
				sql = await this.correct(request, sql, error.message, history)
			}
		}
	}

	/**
	 * Drain steps() and return the terminal result
	 */
	async executeWithRetry(request: CorrectionRequest): Promise<ExecutionResult> {
		const machine = this.steps(request)
		let next = await machine.next()
		while (!next.done) {
			next = await machine.next()
		}
		return next.value
	}

	private async correct(request: CorrectionRequest, failedSql: string, error: string, history: readonly Attempt[]): Promise<string> {
		const messages = buildCorrectionPrompt({
			schemaText: request.schemaText,
			question: request.question,
			failedSql,
			error,
			history,
			dialect: this.options.dialect,
		})
		const raw = await this.generator.generate(messages, {
			temperature: this.options.temperature,
			maxTokens: this.options.maxTokens,
			signal: request.signal,
		})
		const corrected = normalizeSql(raw)
		this.logger.debug("Correction received", { sql: corrected })
		return corrected
	}
}
