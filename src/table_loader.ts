/**
 * Tabular file ingestion
 *
 * Reads CSV / TSV / spreadsheet files with SheetJS (first sheet only),
 * normalizes the header row into column names, infers a PostgreSQL type per
 * column, and builds the DDL + parameterized INSERT batches that load it.
 */

import * as fs from "fs"
import * as path from "path"
import * as XLSX from "xlsx"
import { NL2SQLError, errorMessage } from "./config.js"
import { PG_IDENTIFIER_MAX, quoteIdentifier, truncateUtf8 } from "./identifiers.js"
import type { ColumnInfo, ParsedTable } from "./schema_types.js"

export const SUPPORTED_EXTENSIONS = [".csv", ".tsv", ".xlsx", ".xls"]

/** PostgreSQL caps bind parameters per statement at 65535 */
const MAX_BIND_PARAMS = 65535
const MAX_ROWS_PER_BATCH = 1000

export function isSupportedFile(filePath: string): boolean {
	return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase())
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Lower-case a header and join its words with underscores.
 *
 * "Unit Price ($)" → "unit_price"
 */
export function normalizeColumnName(raw: string): string {
	return raw
		.trim()
		.toLowerCase()
		.replace(/^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu, "")
		.replace(/[^\p{L}\p{N}_]+/gu, "_")
}

/**
 * Turn a raw header row into unique, non-empty column names that fit
 * PostgreSQL's identifier limit (counted in bytes)
 */
export function normalizeHeaders(raw: readonly unknown[]): string[] {
	const used = new Set<string>()
	return raw.map((cell, idx) => {
		let base = cell === null || cell === undefined ? "" : normalizeColumnName(String(cell))
		if (!base) base = `column_${idx + 1}`
		base = truncateUtf8(base, PG_IDENTIFIER_MAX)

		let name = base
		for (let n = 2; used.has(name); n++) {
			const suffix = `_${n}`
			name = truncateUtf8(base, PG_IDENTIFIER_MAX - suffix.length) + suffix
		}
		used.add(name)
		return name
	})
}

function isValidDate(value: unknown): value is Date {
	return value instanceof Date && !isNaN(value.getTime())
}

/**
 * Pick the narrowest type that holds every non-null value
 */
export function inferColumnType(values: readonly unknown[]): string {
	const present = values.filter((v) => v !== null && v !== undefined && v !== "")
	if (present.length === 0) return "TEXT"
	if (present.every((v) => typeof v === "boolean")) return "BOOLEAN"
	if (present.every((v) => typeof v === "number" && Number.isSafeInteger(v))) return "BIGINT"
	if (present.every((v) => typeof v === "number" && Number.isFinite(v))) return "DOUBLE PRECISION"
	if (present.every(isValidDate)) return "TIMESTAMP"
	return "TEXT"
}

/**
 * Convert one cell to what the column's type expects
 */
export function coerceValue(value: unknown, type: string): unknown {
	if (value === null || value === undefined) return null
	if (type !== "TEXT") return value === "" ? null : value
	if (isValidDate(value)) return value.toISOString()
	return String(value)
}

/**
 * Parse the first sheet of a workbook (any SheetJS-readable format)
 */
export function parseWorkbook(data: Buffer): ParsedTable {
	const workbook = XLSX.read(data, { type: "buffer", cellDates: true })
	const sheetName = workbook.SheetNames[0]
	const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName]
	if (!sheet) {
		throw new NL2SQLError("ingestion", "File contains no sheets")
	}

	const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false })
	const [headerRow, ...body] = grid
	if (!headerRow || headerRow.length === 0) {
		throw new NL2SQLError("ingestion", "Sheet is empty")
	}

	const names = normalizeHeaders(headerRow)
	const columns: ColumnInfo[] = names.map((column, idx) => ({
		column,
		type: inferColumnType(body.map((row) => row[idx])),
	}))
	const rows = body.map((row) => columns.map((col, idx) => coerceValue(row[idx], col.type)))

	return { columns, rows }
}

/**
 * Read and parse a tabular file from disk
 */
export function readTabularFile(filePath: string): ParsedTable {
	if (!isSupportedFile(filePath)) {
		throw new NL2SQLError(
			"ingestion",
			`Unsupported file type "${path.extname(filePath)}". Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`,
			false,
			{ path: filePath },
		)
	}

	let data: Buffer
	try {
		data = fs.readFileSync(filePath)
	} catch (error) {
		throw new NL2SQLError("ingestion", `Cannot read ${filePath}: ${errorMessage(error)}`, false, { path: filePath })
	}

	try {
		return parseWorkbook(data)
	} catch (error) {
		if (error instanceof NL2SQLError) {
			error.context = { ...error.context, path: filePath }
			throw error
		}
		throw new NL2SQLError("ingestion", `Cannot parse ${filePath}: ${errorMessage(error)}`, false, { path: filePath })
	}
}

// ============================================================================
// SQL builders
// ============================================================================

export interface ParameterizedStatement {
	text: string
	values: unknown[]
}

export function qualifiedName(schema: string, table: string): string {
	return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`
}

export function buildCreateTableSql(schema: string, table: string, columns: readonly ColumnInfo[]): string {
	const defs = columns.map((c) => `${quoteIdentifier(c.column)} ${c.type}`).join(", ")
	return `CREATE TABLE ${qualifiedName(schema, table)} (${defs})`
}

/**
 * Split rows into multi-row INSERTs that stay under the bind-parameter limit
 */
export function buildInsertBatches(schema: string, table: string, parsed: ParsedTable): ParameterizedStatement[] {
	const width = parsed.columns.length
	if (width === 0 || parsed.rows.length === 0) return []

	const rowsPerBatch = Math.max(1, Math.min(MAX_ROWS_PER_BATCH, Math.floor(MAX_BIND_PARAMS / width)))
	const columnList = parsed.columns.map((c) => quoteIdentifier(c.column)).join(", ")
	const statements: ParameterizedStatement[] = []

	for (let offset = 0; offset < parsed.rows.length; offset += rowsPerBatch) {
		const batch = parsed.rows.slice(offset, offset + rowsPerBatch)
		const values: unknown[] = []
		const tuples = batch.map((row) => {
			const placeholders = parsed.columns.map((_, idx) => {
				values.push(row[idx] ?? null)
				return `$${values.length}`
			})
			return `(${placeholders.join(", ")})`
		})
		statements.push({
			text: `INSERT INTO ${qualifiedName(schema, table)} (${columnList}) VALUES ${tuples.join(", ")}`,
			values,
		})
	}

	return statements
}
