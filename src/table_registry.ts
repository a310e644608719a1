/**
 * PostgreSQL Table Registry
 *
 * Owns the loaded dataset: executes generated SQL, hands out frozen schema
 * snapshots, samples values for the resolver, and loads / drops tables.
 *
 * - Every generated query runs in its own transaction (READ ONLY by default)
 *   with a statement timeout, and is always committed or rolled back.
 * - Table-set mutations are serialized through a single write lock and run
 *   as one DROP + CREATE + INSERT transaction, then the snapshot is swapped.
 */

import { Pool } from "pg"
import type { PoolClient, QueryResult } from "pg"
import { NL2SQLError, classifyExecutionError, errorMessage, isInfrastructureError, parsePostgresError } from "./config.js"
import { quoteIdentifier, sanitizeTableName } from "./identifiers.js"
import { buildCreateTableSql, buildInsertBatches, qualifiedName } from "./table_loader.js"
import { isTextType } from "./schema_types.js"
import type { ColumnInfo, ParsedTable, Row, Schema, TableInfo, TableStore, TabularResult } from "./schema_types.js"
import type { Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export interface TableRegistryOptions {
	/** Postgres schema holding the dataset */
	schema: string
	statementTimeoutMs: number
	readOnly: boolean
}

export type SchemaColumnRow = {
	table_name: string
	column_name: string
	data_type: string
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Fold information_schema rows (already ordered) into a frozen snapshot
 */
export function buildSchemaSnapshot(rows: readonly SchemaColumnRow[]): Schema {
	const tables: Record<string, ColumnInfo[]> = {}
	for (const row of rows) {
		const columns = tables[row.table_name] ?? (tables[row.table_name] = [])
		columns.push(Object.freeze({ column: row.column_name, type: row.data_type.toUpperCase() }))
	}
	const snapshot: Record<string, readonly ColumnInfo[]> = {}
	for (const [name, columns] of Object.entries(tables)) {
		snapshot[name] = Object.freeze(columns)
	}
	return Object.freeze(snapshot)
}

export function toTabularResult(result: Pick<QueryResult<Row>, "fields" | "rows">): TabularResult {
	return {
		columns: (result.fields ?? []).map((f) => f.name),
		rows: result.rows ?? [],
		row_count: (result.rows ?? []).length,
	}
}

// ============================================================================
// Registry
// ============================================================================

export class PostgresTableRegistry implements TableStore {
	private snapshot: Schema = Object.freeze({})
	private version = 0
	private categoricalCache: { key: string; values: Record<string, string[]> } | null = null
	private writeChain: Promise<void> = Promise.resolve()

	constructor(
		private pool: Pool,
		private options: TableRegistryOptions,
		private logger: Logger,
	) {}

	/**
	 * Build the first schema snapshot
	 */
	async init(): Promise<Schema> {
		await this.rebuildSnapshot()
		this.logger.info("Table registry ready", {
			schema: this.options.schema,
			tables: Object.keys(this.snapshot).length,
		})
		return this.snapshot
	}

	getSchema(): Schema {
		return this.snapshot
	}

	/**
	 * Execute generated SQL.
	 *
	 * Throws ExecutionError when the engine rejects the statement and
	 * NL2SQLError("engine") when the database itself is unavailable.
	 */
	async execute(sql: string): Promise<TabularResult> {
		const client = await this.connect()
		try {
			await client.query(this.options.readOnly ? "BEGIN READ ONLY" : "BEGIN")
			await client.query(`SET LOCAL statement_timeout = ${Math.floor(this.options.statementTimeoutMs)}`)
			await client.query(`SET LOCAL search_path TO ${quoteIdentifier(this.options.schema)}`)
			const result = await client.query<Row>(sql)
			await client.query("COMMIT")
			return toTabularResult(result)
		} catch (error) {
			await this.rollback(client)
			const classified = classifyExecutionError(error, sql)
			this.logger.debug("Query execution failed", {
				sqlstate: parsePostgresError(error).sqlstate,
				type: classified.type,
				message: classified.message,
			})
			throw classified
		} finally {
			client.release()
		}
	}

	async getTableSample(table: string, n: number = 3): Promise<TabularResult> {
		this.requireTable(table)
		const limit = Math.max(0, Math.floor(n))
		return this.execute(`SELECT * FROM ${this.qualified(table)} LIMIT ${limit}`)
	}

	/**
	 * Up to `limit` distinct non-null values, in sorted order
	 */
	async sampleDistinctValues(table: string, column: string, limit: number): Promise<unknown[]> {
		this.requireColumn(table, column)
		const col = quoteIdentifier(column)
		const result = await this.execute(
			`SELECT DISTINCT ${col} AS value FROM ${this.qualified(table)} WHERE ${col} IS NOT NULL ORDER BY 1 LIMIT ${Math.max(0, Math.floor(limit))}`,
		)
		return result.rows.map((r) => r.value)
	}

	/**
	 * Enumerate low-cardinality text columns of the given tables.
	 *
	 * Cached per snapshot; a failing column is logged and left out.
	 */
	async getCategoricalValues(tables: readonly string[], maxDistinct: number): Promise<Record<string, string[]>> {
		const key = `${this.version}|${maxDistinct}|${tables.join(",")}`
		if (this.categoricalCache?.key === key) return this.categoricalCache.values

		const values: Record<string, string[]> = {}
		for (const table of tables) {
			const columns = this.snapshot[table]
			if (!columns) continue
			for (const { column, type } of columns) {
				if (!isTextType(type)) continue
				try {
					const distinct = await this.sampleDistinctValues(table, column, maxDistinct + 1)
					if (distinct.length > 0 && distinct.length <= maxDistinct) {
						values[`${table}.${column}`] = distinct.map((v) => String(v))
					}
				} catch (error) {
					if (error instanceof NL2SQLError && error.type === "engine") throw error
					this.logger.warn("Categorical scan failed", { table, column, error: errorMessage(error) })
				}
			}
		}

		this.categoricalCache = { key, values }
		return values
	}

	async listTables(): Promise<TableInfo[]> {
		const infos: TableInfo[] = []
		for (const [name, columns] of Object.entries(this.snapshot)) {
			const result = await this.execute(`SELECT COUNT(*) AS n FROM ${this.qualified(name)}`)
			infos.push({ name, row_count: Number(result.rows[0]?.n ?? 0), columns: [...columns] })
		}
		return infos
	}

	/**
	 * Create (or replace) a table from parsed file contents
	 */
	async loadTable(name: string, table: ParsedTable): Promise<TableInfo> {
		const tableName = sanitizeTableName(name)
		if (table.columns.length === 0) {
			throw new NL2SQLError("ingestion", `Table "${tableName}" has no columns`)
		}

		return this.withWriteLock(async () => {
			const client = await this.connect()
			try {
				await client.query("BEGIN")
				await client.query(`DROP TABLE IF EXISTS ${this.qualified(tableName)}`)
				await client.query(buildCreateTableSql(this.options.schema, tableName, table.columns))
				for (const batch of buildInsertBatches(this.options.schema, tableName, table)) {
					await client.query(batch.text, batch.values)
				}
				await client.query("COMMIT")
			} catch (error) {
				await this.rollback(client)
				throw this.mutationError(`Failed to load table "${tableName}"`, error)
			} finally {
				client.release()
			}

			await this.rebuildSnapshot()
			this.logger.info("Table loaded", { table: tableName, rows: table.rows.length, columns: table.columns.length })
			return { name: tableName, row_count: table.rows.length, columns: [...table.columns] }
		})
	}

	async dropTable(name: string): Promise<boolean> {
		const tableName = sanitizeTableName(name)
		return this.withWriteLock(async () => {
			const existed = tableName in this.snapshot
			const client = await this.connect()
			try {
				await client.query(`DROP TABLE IF EXISTS ${this.qualified(tableName)}`)
			} catch (error) {
				throw this.mutationError(`Failed to drop table "${tableName}"`, error)
			} finally {
				client.release()
			}

			await this.rebuildSnapshot()
			this.logger.info("Table dropped", { table: tableName, existed })
			return existed
		})
	}

	// ========================================================================
	// Internals
	// ========================================================================

	private async rebuildSnapshot(): Promise<void> {
		const query = `
			SELECT c.table_name, c.column_name, c.data_type
			FROM information_schema.columns c
			JOIN information_schema.tables t
				ON t.table_schema = c.table_schema
				AND t.table_name = c.table_name
			WHERE c.table_schema = $1
				AND t.table_type = 'BASE TABLE'
			ORDER BY c.table_name, c.ordinal_position
		`
		let result: QueryResult<SchemaColumnRow>
		try {
			result = await this.pool.query<SchemaColumnRow>(query, [this.options.schema])
		} catch (error) {
			throw new NL2SQLError("engine", `Schema introspection failed: ${errorMessage(error)}`, false, {
				schema: this.options.schema,
			})
		}
		this.snapshot = buildSchemaSnapshot(result.rows)
		this.version++
		this.categoricalCache = null
		this.logger.debug("Schema snapshot rebuilt", { version: this.version, tables: Object.keys(this.snapshot) })
	}

	private async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
		const run = this.writeChain.then(fn)
		// The chain only orders writers; each caller sees its own outcome through `run`
		this.writeChain = run.then(
			() => undefined,
			() => undefined,
		)
		return run
	}

	private async connect(): Promise<PoolClient> {
		try {
			return await this.pool.connect()
		} catch (error) {
			throw new NL2SQLError("engine", `Database unavailable: ${errorMessage(error)}`, false, {
				sqlstate: parsePostgresError(error).sqlstate,
			})
		}
	}

	private async rollback(client: PoolClient): Promise<void> {
		try {
			await client.query("ROLLBACK")
		} catch (error) {
			this.logger.warn("Rollback failed", { error: errorMessage(error) })
		}
	}

	private mutationError(prefix: string, error: unknown): NL2SQLError {
		const pgError = parsePostgresError(error)
		if (isInfrastructureError(pgError.sqlstate)) {
			return new NL2SQLError("engine", `${prefix}: ${pgError.message}`, false, { sqlstate: pgError.sqlstate })
		}
		return new NL2SQLError("ingestion", `${prefix}: ${pgError.message}`, false, { sqlstate: pgError.sqlstate })
	}

	private qualified(table: string): string {
		return qualifiedName(this.options.schema, table)
	}

	private requireTable(table: string): readonly ColumnInfo[] {
		const columns = this.snapshot[table]
		if (!columns) {
			throw new NL2SQLError("execution", `Unknown table "${table}"`, false, { table })
		}
		return columns
	}

	private requireColumn(table: string, column: string): void {
		if (!this.requireTable(table).some((c) => c.column === column)) {
			throw new NL2SQLError("execution", `Unknown column "${table}.${column}"`, false, { table, column })
		}
	}
}
