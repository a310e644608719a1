/**
 * Shared constants and error types for the Quill MCP server
 *
 * Includes:
 * - Error taxonomy (NL2SQLError and its subclasses)
 * - SQLSTATE classification for retry gating
 * - Default values used when callers omit options
 */

// ============================================================================
// Errors
// ============================================================================

export type ErrorType = "generation" | "execution" | "engine" | "timeout" | "ingestion" | "relevance"

export class NL2SQLError extends Error {
	constructor(
		public type: ErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "NL2SQLError"
	}
}

/**
 * SQL was rejected by the engine (syntax, unknown column, type mismatch...).
 *
 * The only error class the Critic retries.
 */
export class ExecutionError extends NL2SQLError {
	constructor(
		message: string,
		public sql: string,
		public sqlstate: string = "UNKNOWN",
		public hint?: string,
		public position?: number,
	) {
		super("execution", `SQL execution failed: ${message}`, true, { sqlstate, sql })
		this.name = "ExecutionError"
	}
}

/**
 * Text generation or embedding failed (transport, timeout, malformed reply).
 */
export class GenerationError extends NL2SQLError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("generation", message, false, context)
		this.name = "GenerationError"
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// PostgreSQL error classification
// ============================================================================

/**
 * PostgreSQL error fields as reported by `pg`
 */
export interface PostgresErrorContext {
	sqlstate: string
	message: string
	hint?: string
	detail?: string
	position?: number
}

/**
 * SQLSTATE classes that mean the engine itself is unhealthy.
 *
 * Two-character entries match the whole class.
 */
export const INFRASTRUCTURE_SQLSTATES = [
	"08", // Connection exception (08000, 08003, 08006, etc.)
	"53", // Insufficient resources (53100, 53200, 53300)
	"54", // Program limit exceeded
	"58", // System error (58000, 58030)
	"F0", // Config file error
	"XX", // Internal error
	"57P01", // Admin shutdown
	"57P02", // Crash shutdown
	"57P03", // Cannot connect now
]

/** Node socket errors surfaced by `pg` before a server reply */
const SOCKET_ERROR_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"ETIMEDOUT",
	"EPIPE",
	"EHOSTUNREACH",
])

/**
 * Check if SQLSTATE is an infrastructure error (connection, pool, resource)
 */
export function isInfrastructureError(sqlstate: string): boolean {
	if (SOCKET_ERROR_CODES.has(sqlstate)) return true
	if (INFRASTRUCTURE_SQLSTATES.includes(sqlstate)) return true
	return INFRASTRUCTURE_SQLSTATES.some(
		(prefix) => prefix.length === 2 && sqlstate.startsWith(prefix),
	)
}

function stringField(obj: object, key: string): string | undefined {
	const value: unknown = Reflect.get(obj, key)
	return typeof value === "string" && value.length > 0 ? value : undefined
}

/**
 * Extract SQLSTATE and friends from whatever `pg` threw
 */
export function parsePostgresError(error: unknown): PostgresErrorContext {
	if (error && typeof error === "object") {
		const rawPosition = stringField(error, "position")
		const position = rawPosition === undefined ? undefined : parseInt(rawPosition, 10)
		return {
			sqlstate: stringField(error, "code") ?? "UNKNOWN",
			message: stringField(error, "message") ?? String(error),
			hint: stringField(error, "hint"),
			detail: stringField(error, "detail"),
			position: position === undefined || isNaN(position) ? undefined : position,
		}
	}

	return {
		sqlstate: "UNKNOWN",
		message: String(error),
	}
}

/**
 * Map a raw driver error to the taxonomy.
 *
 * Infrastructure failures become a non-recoverable "engine" error; everything
 * else is an ExecutionError the Critic may repair.
 */
export function classifyExecutionError(error: unknown, sql: string): NL2SQLError {
	if (error instanceof NL2SQLError) return error
	const pgError = parsePostgresError(error)
	if (isInfrastructureError(pgError.sqlstate)) {
		return new NL2SQLError("engine", `Database unavailable: ${pgError.message}`, false, {
			sqlstate: pgError.sqlstate,
		})
	}
	return new ExecutionError(pgError.message, sql, pgError.sqlstate, pgError.hint, pgError.position)
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULTS = {
	fuzzyThreshold: 70,
	sampleValues: 5,
	relevanceThreshold: 70,
	relationshipThreshold: 85,
	categoricalMaxDistinct: 50,
	maxRetries: 3,
	summaryMaxRows: 50,
}
