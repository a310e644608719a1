/**
 * Composition root
 *
 * Wires config → pg pool → table registry → Ollama client → matching strategy →
 * resolver → critic → pipeline → dataset manager. The matching mode is decided
 * here, once.
 */

import { Pool, type PoolConfig } from "pg"
import { OllamaClient } from "./model_client.js"
import { PostgresTableRegistry } from "./table_registry.js"
import { selectMatchingStrategy } from "./column_matcher.js"
import { SchemaResolver } from "./schema_resolver.js"
import { SelfCorrectingExecutor } from "./critic.js"
import { Pipeline } from "./pipeline.js"
import { DatasetManager } from "./dataset_manager.js"
import type { QuillConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"

export interface QuillApp {
	pipeline: Pipeline
	datasets: DatasetManager
	close(): Promise<void>
}

export function poolConfig(config: QuillConfig): PoolConfig {
	const db = config.database
	if (db.url) {
		return { connectionString: db.url, max: db.pool_max }
	}
	return {
		host: db.host,
		port: db.port,
		database: db.name,
		user: db.user,
		password: db.password,
		max: db.pool_max,
	}
}

export async function createApp(config: QuillConfig, logger: Logger): Promise<QuillApp> {
	const pool = new Pool(poolConfig(config))
	pool.on("error", (error: Error) => logger.error("Idle database client error", { error: error.message }))

	try {
		const registry = new PostgresTableRegistry(
			pool,
			{
				schema: config.database.schema,
				statementTimeoutMs: config.database.statement_timeout_ms,
				readOnly: config.database.read_only,
			},
			logger,
		)
		await registry.init()

		const model = new OllamaClient({
			baseUrl: config.model.ollama_url,
			model: config.model.llm,
			embeddingModel: config.model.embedding,
			timeoutMs: config.model.timeout_ms,
			numCtx: config.model.num_ctx,
			temperature: config.model.temperature,
			maxTokens: config.model.max_tokens,
		})

		const strategy = await selectMatchingStrategy({
			embedder: model,
			enabled: config.resolver.semantic,
			logger,
		})
		const resolver = await SchemaResolver.create(
			registry,
			strategy,
			{ fuzzyThreshold: config.resolver.fuzzy_threshold, sampleValues: config.resolver.sample_values },
			logger,
		)

		const critic = new SelfCorrectingExecutor(
			registry,
			model,
			{ maxRetries: config.critic.max_retries, dialect: config.prompts.dialect },
			logger,
		)

		const pipeline = new Pipeline(
			{ engine: registry, resolver, generator: model, critic, logger },
			{
				relevanceThreshold: config.relevance.table_threshold,
				relationshipThreshold: config.context.relationship_threshold,
				categoricalMaxDistinct: config.context.categorical_max_distinct,
				dialect: config.prompts.dialect,
				datasetNotes: config.prompts.dataset_notes,
				generation: {},
				summary: {
					enabled: config.summary.enabled,
					maxRows: config.summary.max_rows,
					temperature: config.summary.temperature,
					maxTokens: config.summary.max_tokens,
				},
			},
		)

		const datasets = new DatasetManager(registry, resolver, { dataDir: config.data.dir }, logger)
		if (config.data.load_on_start) {
			await datasets.loadDataDirectory()
		}

		return {
			pipeline,
			datasets,
			close: () => pool.end(),
		}
	} catch (error) {
		await pool.end()
		throw error
	}
}
