/**
 * Quill MCP Server
 *
 * Tools:
 * - nl_query:   answer a natural-language question over the loaded tables
 * - list_tables: loaded tables with row counts and columns
 * - load_table: load a CSV/TSV/XLSX/XLS file as a table
 * - drop_table: drop a loaded table
 *
 * nl_query forwards every pipeline event as an MCP logging notification while
 * it runs, then returns the outcome as JSON text.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult, LoggingLevel } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import { errorMessage, NL2SQLError } from "./config.js"
import type { DatasetManager } from "./dataset_manager.js"
import type { Pipeline } from "./pipeline.js"
import type { PipelineEvent, PipelineResult } from "./schema_types.js"
import type { Logger } from "./logger.js"

export const SERVER_NAME = "quill"
export const SERVER_VERSION = "0.1.0"

export interface ServerDeps {
	pipeline: Pick<Pipeline, "stream">
	datasets: Pick<DatasetManager, "listTables" | "loadFile" | "dropTable">
	logger: Logger
}

// ── Result helpers ───────────────────────────────────────────────────

function jsonSafe(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value
}

function jsonResult(value: unknown, isError = false): CallToolResult {
	return { content: [{ type: "text", text: JSON.stringify(value, jsonSafe, 2) }], isError }
}

function toolError(tool: string, error: unknown, logger: Logger): CallToolResult {
	const message = errorMessage(error)
	logger.error("Tool failed", {
		tool,
		type: error instanceof NL2SQLError ? error.type : "unexpected",
		error: message,
	})
	return { content: [{ type: "text", text: `Error: ${message}` }], isError: true }
}

function eventLevel(event: PipelineEvent): LoggingLevel {
	if (event.type !== "error") return "info"
	return event.fatal ? "error" : "warning"
}

/**
 * Shape returned to the MCP client for one question
 */
export function formatOutcome(result: PipelineResult) {
	return {
		query_id: result.query_id,
		success: result.success,
		sql: result.sql,
		columns: result.data?.columns ?? [],
		rows: result.data?.rows ?? [],
		row_count: result.data?.row_count ?? 0,
		attempts: result.attempts,
		relevant_tables: result.relevant_tables,
		summary: result.summary ?? null,
		error: result.error,
		failure: result.failure,
	}
}

// ── Server ───────────────────────────────────────────────────────────

export default function createServer({ pipeline, datasets, logger }: ServerDeps): McpServer {
	const server = new McpServer(
		{ name: SERVER_NAME, version: SERVER_VERSION },
		{ capabilities: { logging: {} } },
	)

	server.tool(
		"nl_query",
		"Answer a natural-language question about the loaded tables. Generates PostgreSQL, runs it, " +
			"repairs it on errors, and returns the rows with an optional one-sentence summary.",
		{
			question: z.string().min(1).describe("The question, in plain language"),
			tables: z.array(z.string()).optional().describe("Limit the question to these tables"),
			history: z
				.array(z.object({ question: z.string(), sql: z.string() }))
				.optional()
				.describe("Earlier questions and their SQL, oldest first, for follow-up questions"),
		},
		async ({ question, tables, history }, extra) => {
			try {
				const stream = pipeline.stream(question, { tables, history, signal: extra.signal })
				let next = await stream.next()
				while (!next.done) {
					await server.server.sendLoggingMessage({ level: eventLevel(next.value), logger: "nl_query", data: next.value })
					next = await stream.next()
				}
				const result = next.value
				return jsonResult(formatOutcome(result), !result.success)
			} catch (error) {
				return toolError("nl_query", error, logger)
			}
		},
	)

	server.tool("list_tables", "List the loaded tables with their row counts and columns.", async () => {
		try {
			return jsonResult(await datasets.listTables())
		} catch (error) {
			return toolError("list_tables", error, logger)
		}
	})

	server.tool(
		"load_table",
		"Load a CSV, TSV, XLSX or XLS file from the server's filesystem as a table. " +
			"Replaces any table with the same name and returns a preview of the first rows.",
		{
			path: z.string().min(1).describe("Path to the file on the server"),
			table_name: z.string().optional().describe("Table name (defaults to the file name)"),
		},
		async ({ path, table_name }) => {
			try {
				return jsonResult(await datasets.loadFile(path, table_name))
			} catch (error) {
				return toolError("load_table", error, logger)
			}
		},
	)

	server.tool(
		"drop_table",
		"Drop a loaded table and forget its source file.",
		{ table_name: z.string().min(1).describe("Table to drop") },
		async ({ table_name }) => {
			try {
				return jsonResult(await datasets.dropTable(table_name))
			} catch (error) {
				return toolError("drop_table", error, logger)
			}
		},
	)

	return server
}
