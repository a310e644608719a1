import { describe, it, expect } from "vitest"
import {
	formatSchemaForPrompt,
	formatConversationHistory,
	buildSqlGenerationPrompt,
	buildCorrectionPrompt,
	formatAttemptHistory,
	buildSummaryPrompt,
} from "./prompts.js"
import type { Schema } from "./schema_types.js"

const schema: Schema = {
	orders: [
		{ column: "customerID", type: "TEXT" },
		{ column: "total", type: "DOUBLE PRECISION" },
	],
	customers: [{ column: "companyName", type: "TEXT" }],
}

describe("formatSchemaForPrompt", () => {
	it("renders one block per table", () => {
		expect(formatSchemaForPrompt(schema)).toBe(
			"Table: orders\n    customerID (TEXT)\n    total (DOUBLE PRECISION)\n\nTable: customers\n    companyName (TEXT)",
		)
	})

	it("renders an empty schema as an empty string", () => {
		expect(formatSchemaForPrompt({})).toBe("")
	})
})

describe("buildSqlGenerationPrompt", () => {
	it("puts the context and question in the user message", () => {
		const [system, user] = buildSqlGenerationPrompt("CTX", "How many orders?", { dialect: "PostgreSQL" })
		expect(system.role).toBe("system")
		expect(system.content.startsWith("You are an expert PostgreSQL SQL generator.")).toBe(true)
		expect(user).toEqual({
			role: "user",
			content:
				"Schema:\nCTX\n\nQuestion: How many orders?\n\nReturn only the raw SQL query with no markdown or explanation.",
		})
	})

	it("includes prior turns", () => {
		const [system] = buildSqlGenerationPrompt("CTX", "and them?", {
			dialect: "PostgreSQL",
			history: [{ question: "top customers", sql: "SELECT 1" }],
		})
		expect(system.content).toContain("### CONVERSATIONAL HISTORY\nQ: top customers\nSQL: SELECT 1")
	})

	it("appends dataset notes only when present", () => {
		const [withNotes] = buildSqlGenerationPrompt("CTX", "q", { dialect: "PostgreSQL", notes: "Amounts are in EUR." })
		const [without] = buildSqlGenerationPrompt("CTX", "q", { dialect: "PostgreSQL", notes: "  " })
		expect(withNotes.content.endsWith("### DATASET NOTES\nAmounts are in EUR.")).toBe(true)
		expect(without.content.endsWith("### CONVERSATIONAL HISTORY\nNone")).toBe(true)
	})
})

describe("formatConversationHistory", () => {
	it("says None without turns", () => {
		expect(formatConversationHistory([])).toBe("None")
		expect(formatConversationHistory(undefined)).toBe("None")
	})
})

describe("buildCorrectionPrompt", () => {
	const history = [
		{ sql: "SELECT totl FROM orders", error: 'column "totl" does not exist' },
		{ sql: "SELECT amount FROM orders", error: 'column "amount" does not exist' },
	]

	it("lists every previous attempt in order", () => {
		expect(formatAttemptHistory(history)).toBe(
			"\nPrevious failed attempts:\n\n" +
				'Attempt 1:\nSQL: SELECT totl FROM orders\nError: column "totl" does not exist\n\n' +
				'Attempt 2:\nSQL: SELECT amount FROM orders\nError: column "amount" does not exist\n',
		)
	})

	it("builds the full user message", () => {
		const [system, user] = buildCorrectionPrompt({
			schemaText: "Table: orders\n    total (DOUBLE PRECISION)",
			question: "total revenue",
			failedSql: "SELECT amount FROM orders",
			error: 'column "amount" does not exist',
			history: history.slice(1),
			dialect: "PostgreSQL",
		})
		expect(system.content.startsWith("You are an expert SQL debugger for PostgreSQL.")).toBe(true)
		expect(user.content).toBe(
			"Original question: total revenue\n\n" +
				"Schema:\nTable: orders\n    total (DOUBLE PRECISION)\n" +
				"\nPrevious failed attempts:\n\n" +
				'Attempt 1:\nSQL: SELECT amount FROM orders\nError: column "amount" does not exist\n' +
				"\nCurrent failing SQL:\nSELECT amount FROM orders\n\n" +
				'Current error:\ncolumn "amount" does not exist\n\n' +
				"Fix the SQL query. Return only the corrected query with no markdown or explanation.",
		)
	})
})

describe("buildSummaryPrompt", () => {
	it("serializes at most maxRows rows", () => {
		const rows = [{ n: 1 }, { n: 2 }, { n: 3 }]
		const [, user] = buildSummaryPrompt("how many?", rows, 2)
		expect(user.content).toBe('Question: how many?\n\nResults:\n[{"n":1},{"n":2}]')
	})

	it("serializes bigint and date values", () => {
		const [, user] = buildSummaryPrompt("q", [{ n: 10n, at: new Date("2024-01-02T00:00:00Z") }], 50)
		expect(user.content).toBe('Question: q\n\nResults:\n[{"n":"10","at":"2024-01-02T00:00:00.000Z"}]')
	})
})
