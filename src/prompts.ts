/**
 * Prompt templates
 *
 * Builds the chat messages for SQL generation, SQL correction and the
 * one-sentence insight summary, plus the plain-text schema rendering they share.
 */

import type { ChatMessage } from "./model_client.js"
import type { Attempt, PriorTurn, Row, Schema } from "./schema_types.js"

// ============================================================================
// Schema rendering
// ============================================================================

/**
 * "Table: orders\n    total (DOUBLE PRECISION)" blocks separated by blank lines
 */
export function formatSchemaForPrompt(schema: Schema): string {
	return Object.entries(schema)
		.map(([table, columns]) => {
			const colLines = columns.map((c) => `    ${c.column} (${c.type})`).join("\n")
			return colLines ? `Table: ${table}\n${colLines}` : `Table: ${table}`
		})
		.join("\n\n")
}

// ============================================================================
// SQL generation
// ============================================================================

export interface GenerationPromptOptions {
	dialect: string
	history?: readonly PriorTurn[]
	/** Free-form notes about the loaded data, appended to the system prompt */
	notes?: string
}

export function formatConversationHistory(history: readonly PriorTurn[] | undefined): string {
	if (!history || history.length === 0) return "None"
	return history.map((turn) => `Q: ${turn.question}\nSQL: ${turn.sql}`).join("\n")
}

export function buildSqlGenerationPrompt(
	context: string,
	question: string,
	options: GenerationPromptOptions,
): ChatMessage[] {
	const { dialect } = options
	const notes = options.notes?.trim()

	const system = `You are an expert ${dialect} SQL generator.

Rules:
- Only use tables and columns from the provided schema
- Return ONLY the raw SQL query, no markdown, no explanation
- Use the exact column names given in the schema context
- Wrap every table and column identifier in double quotes (e.g. SELECT "column_name" FROM "table_name")
- Always alias computed columns with clear names
- Use ${dialect} specific syntax (e.g. CURRENT_DATE, INTERVAL)
- Use LOWER() for string comparisons (e.g. LOWER("dept") = 'cs')
- When filtering on text, accept the likely spellings with IN() (e.g. LOWER("dept") IN ('cs', 'computer science'))
- Prefer the sample and categorical values listed in the context when filtering
- If the question cannot be answered with the given schema,
  return: SELECT 'I cannot answer this question with the available data' AS message

### CONVERSATIONAL CONTEXT
If the question uses pronouns ("those", "them", "it") or refers to earlier results
("filter that by..."), resolve them from the conversation history below and write a
new, fully self-contained query. Do not answer that the data is missing.

### CONVERSATIONAL HISTORY
${formatConversationHistory(options.history)}${notes ? `\n\n### DATASET NOTES\n${notes}` : ""}`

	const user = `Schema:
${context}

Question: ${question}

Return only the raw SQL query with no markdown or explanation.`

	return [
		{ role: "system", content: system },
		{ role: "user", content: user },
	]
}

// ============================================================================
// SQL correction
// ============================================================================

export interface CorrectionPromptInput {
	schemaText: string
	question: string
	failedSql: string
	error: string
	/** Every failed attempt so far, oldest first */
	history: readonly Attempt[]
	dialect: string
}

export function formatAttemptHistory(history: readonly Attempt[]): string {
	if (history.length === 0) return ""
	const attempts = history
		.map((attempt, idx) => `Attempt ${idx + 1}:\nSQL: ${attempt.sql}\nError: ${attempt.error ?? "none"}`)
		.join("\n\n")
	return `\nPrevious failed attempts:\n\n${attempts}\n`
}

export function buildCorrectionPrompt(input: CorrectionPromptInput): ChatMessage[] {
	const system = `You are an expert SQL debugger for ${input.dialect}.
You fix broken SQL queries.
Study all previous attempts to avoid repeating the same mistakes.
Return ONLY the raw SQL query.`

	const user = `Original question: ${input.question}

Schema:
${input.schemaText}
${formatAttemptHistory(input.history)}
Current failing SQL:
${input.failedSql}

Current error:
${input.error}

Fix the SQL query. Return only the corrected query with no markdown or explanation.`

	return [
		{ role: "system", content: system },
		{ role: "user", content: user },
	]
}

// ============================================================================
// Insight summary
// ============================================================================

const SUMMARY_SYSTEM_PROMPT =
	"You are a data analyst. Given the user's original question and this JSON result set, " +
	"provide exactly ONE sentence summarizing the core insight in plain English. " +
	"Do not explain the SQL. Keep it punchy."

function jsonSafe(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value
}

export function buildSummaryPrompt(question: string, rows: readonly Row[], maxRows: number): ChatMessage[] {
	const sample = rows.slice(0, maxRows)
	return [
		{ role: "system", content: SUMMARY_SYSTEM_PROMPT },
		{ role: "user", content: `Question: ${question}\n\nResults:\n${JSON.stringify(sample, jsonSafe)}` },
	]
}
