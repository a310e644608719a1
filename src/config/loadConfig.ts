/**
 * Unified config loader for Quill.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml
 *
 * The merged object is validated by `appConfigSchema`, which also supplies
 * defaults for anything the YAML files leave out.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("quill"),
	user: z.string().default("postgres"),
	password: z.string().default(""),
	/** Full connection string; wins over the discrete fields when set */
	url: z.string().optional(),
	/** Postgres schema that holds the loaded tables */
	schema: z.string().default("public"),
	pool_max: z.number().int().positive().default(5),
	statement_timeout_ms: z.number().int().nonnegative().default(30000),
	read_only: z.boolean().default(true),
})

const modelSchema = z.object({
	ollama_url: z.string().default("http://localhost:11434"),
	llm: z.string().default("qwen2.5-coder:7b"),
	embedding: z.string().default("nomic-embed-text"),
	timeout_ms: z.number().int().positive().default(60000),
	num_ctx: z.number().int().positive().default(8192),
	temperature: z.number().min(0).default(0.1),
	max_tokens: z.number().int().positive().default(1000),
})

const resolverSchema = z.object({
	fuzzy_threshold: z.number().min(0).max(100).default(70),
	sample_values: z.number().int().nonnegative().default(5),
	semantic: z.boolean().default(true),
})

const relevanceSchema = z.object({
	table_threshold: z.number().min(0).max(100).default(70),
})

const contextSchema = z.object({
	relationship_threshold: z.number().min(0).max(100).default(85),
	categorical_max_distinct: z.number().int().positive().default(50),
})

const criticSchema = z.object({
	max_retries: z.number().int().min(1).default(3),
})

const summarySchema = z.object({
	enabled: z.boolean().default(true),
	max_rows: z.number().int().positive().default(50),
	temperature: z.number().min(0).default(0.7),
	max_tokens: z.number().int().positive().default(200),
})

const promptsSchema = z.object({
	dialect: z.string().default("PostgreSQL"),
	dataset_notes: z.string().default(""),
})

const dataSchema = z.object({
	dir: z.string().default("data"),
	load_on_start: z.boolean().default(true),
})

const loggingSchema = z.object({
	level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
})

export const appConfigSchema = z.object({
	database: databaseSchema.default({}),
	model: modelSchema.default({}),
	resolver: resolverSchema.default({}),
	relevance: relevanceSchema.default({}),
	context: contextSchema.default({}),
	critic: criticSchema.default({}),
	summary: summarySchema.default({}),
	prompts: promptsSchema.default({}),
	data: dataSchema.default({}),
	logging: loggingSchema.default({}),
})

export type QuillConfig = z.infer<typeof appConfigSchema>

// ── YAML Loading ─────────────────────────────────────────────────────

type ConfigRecord = Record<string, unknown>

function isRecord(value: unknown): value is ConfigRecord {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): ConfigRecord {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed: unknown = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigRecord, b: ConfigRecord): ConfigRecord {
	const result: ConfigRecord = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envBoolDefaultOn(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v !== "false" && v !== "0"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: ConfigRecord, key: string): ConfigRecord {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: ConfigRecord = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: ConfigRecord): void {
	// database
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password
	db.url = env("DATABASE_URL") ?? db.url
	db.schema = env("DB_SCHEMA") ?? db.schema

	// model
	const m = section(cfg, "model")
	m.ollama_url = env("OLLAMA_BASE_URL") ?? m.ollama_url
	m.llm = env("OLLAMA_MODEL") ?? m.llm
	m.embedding = env("EMBEDDING_MODEL") ?? m.embedding
	m.timeout_ms = envInt("OLLAMA_TIMEOUT") ?? m.timeout_ms
	m.num_ctx = envInt("OLLAMA_NUM_CTX") ?? m.num_ctx
	m.temperature = envFloat("TEMPERATURE") ?? m.temperature

	// resolver  (semantic matching is ON by default)
	const r = section(cfg, "resolver")
	r.fuzzy_threshold = envFloat("FUZZY_THRESHOLD") ?? r.fuzzy_threshold
	r.semantic = envBoolDefaultOn("SEMANTIC_MATCHING_ENABLED") ?? r.semantic

	// critic
	const c = section(cfg, "critic")
	c.max_retries = envInt("MAX_RETRIES") ?? c.max_retries

	// summary
	const s = section(cfg, "summary")
	s.enabled = envBool("SUMMARY_ENABLED") ?? s.enabled

	// data
	const d = section(cfg, "data")
	d.dir = env("DATA_DIR") ?? d.dir

	// logging
	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

/** Drop keys whose value is undefined so schema defaults apply. */
function stripUndefined(cfg: ConfigRecord): ConfigRecord {
	const result: ConfigRecord = {}
	for (const [key, value] of Object.entries(cfg)) {
		if (value === undefined) continue
		result[key] = isRecord(value) ? stripUndefined(value) : value
	}
	return result
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: QuillConfig | null = null

export function loadConfig(): QuillConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: ConfigRecord = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = appConfigSchema.parse(stripUndefined(merged))
	return _config
}

export function getConfig(): QuillConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
