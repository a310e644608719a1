/**
 * Shared types for schema resolution, execution and the query pipeline
 *
 * Defines:
 * - Schema snapshots and column metadata
 * - Resolver output (ColumnMatch, EnrichedContext)
 * - Critic output (Attempt, ExecutionResult)
 * - Pipeline output and stream events
 * - The execution engine / table store contracts
 */

// ============================================================================
// Schema
// ============================================================================

export interface ColumnInfo {
	column: string
	/** Declared type, upper-cased (e.g. "TEXT", "BIGINT") */
	type: string
}

/**
 * Ordered mapping table name → ordered columns.
 *
 * Snapshots handed out by the engine are frozen; a table-set change produces
 * a new object rather than mutating the old one.
 */
export type Schema = Readonly<Record<string, readonly ColumnInfo[]>>

export interface TableInfo {
	name: string
	row_count: number
	columns: ColumnInfo[]
}

// ============================================================================
// Resolver output
// ============================================================================

export type MatchingMode = "hybrid" | "lexical"

export interface ColumnMatch {
	keyword: string
	table: string
	column: string
	/** Similarity in [0, 100] */
	score: number
}

export interface EnrichedContext {
	original_schema: Schema
	column_matches: ColumnMatch[]
	/** Keyed "table.column" */
	value_hints: Record<string, unknown[]>
	/** First-seen order; empty means "use the full schema" */
	relevant_tables: string[]
	matching_mode: MatchingMode
}

// ============================================================================
// Execution
// ============================================================================

export type Row = Record<string, unknown>

export interface TabularResult {
	columns: string[]
	rows: Row[]
	row_count: number
}

export interface Attempt {
	sql: string
	error: string | null
}

export interface ExecutionResult {
	success: boolean
	sql: string
	data: TabularResult | null
	error: string | null
	/** All tries, including the final one */
	attempts: number
	history: Attempt[]
}

/**
 * Parsed file contents ready to become a table
 */
export interface ParsedTable {
	columns: ColumnInfo[]
	rows: unknown[][]
}

/**
 * The only component that touches the live dataset.
 */
export interface ExecutionEngine {
	/** Throws ExecutionError for rejected SQL, NL2SQLError("engine") for infrastructure failures */
	execute(sql: string): Promise<TabularResult>
	getSchema(): Schema
	getTableSample(table: string, n?: number): Promise<TabularResult>
	sampleDistinctValues(table: string, column: string, limit: number): Promise<unknown[]>
	/** "table.column" → distinct values, for text columns with at most maxDistinct values */
	getCategoricalValues(tables: readonly string[], maxDistinct: number): Promise<Record<string, string[]>>
}

/**
 * Engine that can also change its table set.
 *
 * Mutations are serialized; each one replaces the schema snapshot.
 */
export interface TableStore extends ExecutionEngine {
	listTables(): Promise<TableInfo[]>
	loadTable(name: string, table: ParsedTable): Promise<TableInfo>
	/** Returns false when no such table existed */
	dropTable(name: string): Promise<boolean>
}

// ============================================================================
// Pipeline
// ============================================================================

export interface PriorTurn {
	question: string
	sql: string
}

export type FailureKind = "relevance" | "generation" | "execution" | "engine"

export interface PipelineResult extends Omit<ExecutionResult, "sql"> {
	query_id: string
	question: string
	/** null when no SQL was produced (relevance rejection, generation failure) */
	sql: string | null
	relevant_tables: string[]
	column_matches: ColumnMatch[]
	failure: FailureKind | null
	summary?: string
}

export type PipelineEvent =
	| { type: "thinking"; content: string }
	| { type: "sql"; content: string }
	| { type: "result"; content: Row[]; row_count: number; attempts: number; sql: string }
	| { type: "summary"; content: string }
	| { type: "summary_done" }
	| { type: "error"; content: string; fatal: boolean }

const TEXT_TYPES = new Set(["TEXT", "VARCHAR", "CHARACTER VARYING", "CHARACTER", "CHAR", "STRING"])

/** Whether a declared column type holds free text (candidates for categorical enumeration) */
export function isTextType(type: string): boolean {
	return TEXT_TYPES.has(type.toUpperCase())
}
