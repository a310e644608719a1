/**
 * Dataset management
 *
 * Loads spreadsheet/CSV files as tables, drops tables, and keeps the data
 * directory and the resolver snapshot in step with the table store.
 *
 * Every mutation goes through one queue, so the store change, the data
 * directory copy and the resolver refresh of one operation never interleave
 * with another's.
 */

import * as fs from "fs"
import * as path from "path"
import { NL2SQLError, errorMessage } from "./config.js"
import { sanitizeTableName } from "./identifiers.js"
import { SUPPORTED_EXTENSIONS, isSupportedFile, readTabularFile } from "./table_loader.js"
import type { SchemaResolver } from "./schema_resolver.js"
import type { TableInfo, TableStore, TabularResult } from "./schema_types.js"
import type { Logger } from "./logger.js"

export interface DatasetManagerOptions {
	/** Directory scanned at startup and holding a copy of every loaded file */
	dataDir: string
	/** Rows returned as a preview after a load */
	previewRows?: number
}

export interface LoadedTable {
	table: TableInfo
	preview: TabularResult
}

export interface DroppedTable {
	table: string
	dropped: boolean
}

export class DatasetManager {
	private queue: Promise<void> = Promise.resolve()

	constructor(
		private store: TableStore,
		private resolver: SchemaResolver,
		private options: DatasetManagerOptions,
		private logger: Logger,
	) {}

	async listTables(): Promise<TableInfo[]> {
		return this.store.listTables()
	}

	/**
	 * Load a file as a table, replacing any table of the same name.
	 *
	 * The table name is `tableName` or the file stem, sanitized.
	 */
	async loadFile(filePath: string, tableName?: string): Promise<LoadedTable> {
		return this.serialize(async () => {
			const table = await this.ingest(filePath, tableName)
			// The store already holds the table, so the resolver follows even if the copy fails
			try {
				this.keepCopy(filePath, table.name)
			} finally {
				await this.resolver.refreshSchema(this.store.getSchema())
			}
			const preview = await this.store.getTableSample(table.name, this.options.previewRows ?? 3)
			return { table, preview }
		})
	}

	/**
	 * Drop a table and its data directory copy. Dropping an unknown table is not an error.
	 */
	async dropTable(name: string): Promise<DroppedTable> {
		return this.serialize(async () => {
			const table = sanitizeTableName(name)
			const dropped = await this.store.dropTable(table)
			try {
				this.removeCopies(table)
			} finally {
				if (dropped) await this.resolver.refreshSchema(this.store.getSchema())
			}
			this.logger.info(dropped ? "Table dropped" : "Drop requested for unknown table", { table })
			return { table, dropped }
		})
	}

	/**
	 * Load every supported file in the data directory. A file that fails is
	 * logged and skipped; a missing directory loads nothing.
	 */
	async loadDataDirectory(): Promise<TableInfo[]> {
		return this.serialize(async () => {
			const dir = this.options.dataDir
			if (!fs.existsSync(dir)) {
				this.logger.info("Data directory not found, starting without preloaded tables", { dir })
				return []
			}

			const files = fs
				.readdirSync(dir)
				.filter((f) => isSupportedFile(f))
				.sort()

			const loaded: TableInfo[] = []
			for (const file of files) {
				try {
					loaded.push(await this.ingest(path.join(dir, file)))
				} catch (error) {
					if (error instanceof NL2SQLError && error.type === "engine") throw error
					this.logger.warn("Skipping data file", { file, error: errorMessage(error) })
				}
			}

			await this.resolver.refreshSchema(this.store.getSchema())
			this.logger.info("Data directory loaded", { dir, tables: loaded.map((t) => t.name) })
			return loaded
		})
	}

	// ── Internals ───────────────────────────────────────────────────────

	private async ingest(filePath: string, tableName?: string): Promise<TableInfo> {
		const parsed = readTabularFile(filePath)
		const name = sanitizeTableName(tableName ?? path.basename(filePath, path.extname(filePath)))
		const info = await this.store.loadTable(name, parsed)
		this.logger.info("Table loaded", { table: info.name, rows: info.row_count, columns: info.columns.length, file: filePath })
		return info
	}

	private copyPath(table: string, ext: string): string {
		return path.join(this.options.dataDir, `${table}${ext}`)
	}

	/** Copy the source into the data directory so the table is reloaded on restart */
	private keepCopy(filePath: string, table: string): void {
		const ext = path.extname(filePath).toLowerCase()
		const target = this.copyPath(table, ext)
		this.removeCopies(table, path.resolve(filePath))
		if (path.resolve(filePath) === path.resolve(target)) return

		try {
			fs.mkdirSync(this.options.dataDir, { recursive: true })
			fs.copyFileSync(filePath, target)
		} catch (error) {
			throw new NL2SQLError("ingestion", `Table loaded but could not be saved to ${target}: ${errorMessage(error)}`, false, {
				table,
			})
		}
	}

	/** Delete data directory copies of `table`, except `keep` */
	private removeCopies(table: string, keep?: string): void {
		for (const ext of SUPPORTED_EXTENSIONS) {
			const candidate = this.copyPath(table, ext)
			if (path.resolve(candidate) === keep || !fs.existsSync(candidate)) continue
			fs.rmSync(candidate)
			this.logger.debug("Removed data file", { file: candidate })
		}
	}

	private async serialize<T>(fn: () => Promise<T>): Promise<T> {
		const run = this.queue.then(fn)
		this.queue = run.then(
			() => undefined,
			() => undefined,
		)
		return run
	}
}
