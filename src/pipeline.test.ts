import { describe, it, expect } from "vitest"
import { Pipeline, exhaustionMessage, selectTables } from "./pipeline.js"
import { SchemaResolver } from "./schema_resolver.js"
import { LexicalStrategy } from "./column_matcher.js"
import { SelfCorrectingExecutor } from "./critic.js"
import { GenerationError, NL2SQLError } from "./config.js"
import { InMemoryTableStore } from "./testing/fake_engine.js"
import { ScriptedGenerator } from "./testing/fake_model.js"
import { silentLogger } from "./logger.js"
import type { PipelineEvent, PipelineResult } from "./schema_types.js"

const QUESTION = "Show me total revenue by customer"
const BAD_SQL = "SELECT customerName, SUM(total) FROM orders GROUP BY customerName"
const BAD_ERROR = 'SQL execution failed: syntax error at or near "SELECT"'
const GOOD_SQL = 'SELECT "customerID", SUM("total") AS revenue FROM "orders" GROUP BY "customerID"'
const ROWS = [{ customerID: "ALFKI", revenue: 42 }]

function salesStore(): InMemoryTableStore {
	return new InMemoryTableStore({
		orders: [
			{ column: "customerID", type: "TEXT" },
			{ column: "total", type: "DOUBLE PRECISION" },
		],
		customers: [
			{ column: "customerID", type: "TEXT" },
			{ column: "companyName", type: "TEXT" },
		],
	}).onQuery(GOOD_SQL, ROWS)
}

async function setup(
	store: InMemoryTableStore,
	replies: Array<string | Error>,
	streams: Array<Array<string | Error>> = [],
	maxRetries = 3,
) {
	const generator = new ScriptedGenerator(replies, streams)
	const resolver = await SchemaResolver.create(store, new LexicalStrategy(), { fuzzyThreshold: 70 }, silentLogger)
	const critic = new SelfCorrectingExecutor(store, generator, { maxRetries }, silentLogger)
	const pipeline = new Pipeline({ engine: store, resolver, generator, critic, logger: silentLogger })
	return { pipeline, generator, resolver }
}

async function collect(
	stream: AsyncGenerator<PipelineEvent, PipelineResult, void>,
): Promise<{ events: PipelineEvent[]; result: PipelineResult }> {
	const events: PipelineEvent[] = []
	let next = await stream.next()
	while (!next.done) {
		events.push(next.value)
		next = await stream.next()
	}
	return { events, result: next.value }
}

// ── stream ──────────────────────────────────────────────────────────

describe("Pipeline.stream", () => {
	it("emits stage events in order, including corrections and the summary", async () => {
		const { pipeline } = await setup(salesStore(), [BAD_SQL, GOOD_SQL], [["Revenue ", "is led by ALFKI."]])

		const { events, result } = await collect(pipeline.stream(QUESTION))

		expect(events).toEqual([
			{ type: "thinking", content: "Analyzing your question..." },
			{ type: "thinking", content: "Searching schema for relevant tables..." },
			{ type: "thinking", content: "Found relevant tables: orders, customers" },
			{ type: "sql", content: BAD_SQL },
			{ type: "thinking", content: "Refining query... (attempt 2)" },
			{ type: "result", content: ROWS, row_count: 1, attempts: 2, sql: GOOD_SQL },
			{ type: "thinking", content: "Generating insight summary..." },
			{ type: "summary", content: "Revenue " },
			{ type: "summary", content: "is led by ALFKI." },
			{ type: "summary_done" },
		])
		expect(result.summary).toBe("Revenue is led by ALFKI.")
		expect(result.failure).toBeNull()
	})

	it("stops after the rejection for an unrelated question", async () => {
		const { pipeline, generator } = await setup(salesStore(), [])

		const { events, result } = await collect(pipeline.stream("What is the meaning of life"))

		expect(events).toEqual([
			{ type: "thinking", content: "Analyzing your question..." },
			{
				type: "error",
				content: "I can only answer questions about your database. Try asking about orders, customers.",
				fatal: true,
			},
		])
		expect(result.failure).toBe("relevance")
		expect(generator.calls).toHaveLength(0)
	})

	it("reports a failed summary as a non-fatal error after the result", async () => {
		const { pipeline } = await setup(
			salesStore(),
			[GOOD_SQL],
			[["Partial", new GenerationError("Ollama stream error: boom")]],
		)

		const { events, result } = await collect(pipeline.stream(QUESTION))

		expect(events.slice(-4)).toEqual([
			{ type: "result", content: ROWS, row_count: 1, attempts: 1, sql: GOOD_SQL },
			{ type: "thinking", content: "Generating insight summary..." },
			{ type: "summary", content: "Partial" },
			{ type: "error", content: "Insight generation failed: Ollama stream error: boom", fatal: false },
		])
		expect(result.success).toBe(true)
		expect(result.summary).toBeUndefined()
	})

	it("ends with the exhaustion message when no attempt works", async () => {
		const { pipeline } = await setup(salesStore(), [BAD_SQL, "SELECT nope"], [], 2)

		const { events, result } = await collect(pipeline.stream(QUESTION))

		expect(events.slice(-2)).toEqual([
			{ type: "thinking", content: "Refining query... (attempt 2)" },
			{
				type: "error",
				content: 'Could not produce a working query after 2 attempt(s). Last error: SQL execution failed: syntax error at or near "SELECT"',
				fatal: true,
			},
		])
		expect(result.attempts).toBe(2)
		expect(result.history).toHaveLength(2)
	})

	it("skips the summary when asked to", async () => {
		const { pipeline, generator } = await setup(salesStore(), [GOOD_SQL])

		const { events } = await collect(pipeline.stream(QUESTION, { summarize: false }))

		expect(events.at(-1)).toEqual({ type: "result", content: ROWS, row_count: 1, attempts: 1, sql: GOOD_SQL })
		expect(generator.streamCalls).toHaveLength(0)
	})
})

// ── run ─────────────────────────────────────────────────────────────

describe("Pipeline.run", () => {
	it("returns the result with resolver output and no summary by default", async () => {
		const { pipeline, generator } = await setup(salesStore(), [GOOD_SQL])

		const result = await pipeline.run(QUESTION)

		expect(result).toMatchObject({
			question: QUESTION,
			success: true,
			sql: GOOD_SQL,
			data: { columns: ["customerID", "revenue"], rows: ROWS, row_count: 1 },
			error: null,
			attempts: 1,
			relevant_tables: ["orders", "customers"],
			failure: null,
		})
		expect(result.column_matches.map((m) => `${m.table}.${m.column}`)).toEqual([
			"orders.total",
			"orders.customerID",
			"customers.customerID",
		])
		expect(result.query_id).toMatch(/^[0-9a-f-]{36}$/)
		expect(result.summary).toBeUndefined()
		expect(generator.streamCalls).toHaveLength(0)
	})

	it("collects the summary when requested", async () => {
		const { pipeline } = await setup(salesStore(), [GOOD_SQL], [["One ", "customer."]])

		const result = await pipeline.run(QUESTION, { summarize: true })

		expect(result.summary).toBe("One customer.")
	})

	it("assembles relationships and categorical values into the generation prompt", async () => {
		const store = salesStore().withCategoricalValues({ "customers.companyName": ["Alfreds", "Bon app"] })
		const { pipeline, generator } = await setup(store, [GOOD_SQL])

		await pipeline.run(QUESTION)

		const user = generator.calls[0]?.[1]?.content ?? ""
		expect(user).toContain("\n\nDetected Join Relationships:\norders.customerID <-> customers.customerID")
		expect(user).toContain("\n\nCategorical Values:\ncustomers.companyName: Alfreds, Bon app\n\nQuestion: ")
	})

	it("still answers when categorical lookup fails", async () => {
		const store = salesStore()
		store.categoricalError = new Error("permission denied")
		const { pipeline, generator } = await setup(store, [GOOD_SQL])

		const result = await pipeline.run(QUESTION)

		expect(result.success).toBe(true)
		expect(generator.calls[0]?.[1]?.content).not.toContain("Categorical Values:")
	})

	it("rejects an unrelated question without generating", async () => {
		const { pipeline, generator } = await setup(salesStore(), [])

		const result = await pipeline.run("What is the meaning of life")

		expect(result).toMatchObject({
			success: false,
			sql: null,
			data: null,
			attempts: 0,
			failure: "relevance",
			error: "I can only answer questions about your database. Try asking about orders, customers.",
		})
		expect(generator.calls).toHaveLength(0)
	})

	it("skips the relevance check for follow-up questions", async () => {
		const { pipeline, generator } = await setup(salesStore(), [GOOD_SQL])
		const history = [{ question: "top customers by revenue", sql: GOOD_SQL }]

		const result = await pipeline.run("what about those?", { history })

		expect(result.success).toBe(true)
		expect(generator.calls[0]?.[0]?.content).toContain(`Q: top customers by revenue\nSQL: ${GOOD_SQL}`)
	})

	it("fails cleanly when no tables are loaded", async () => {
		const { pipeline } = await setup(new InMemoryTableStore(), [])

		const result = await pipeline.run("total orders")

		expect(result.failure).toBe("relevance")
		expect(result.error).toBe("No tables found in the database.")
	})

	it("restricts the run to the selected tables", async () => {
		const { pipeline, generator } = await setup(salesStore(), [GOOD_SQL])

		const result = await pipeline.run("total by customer", { tables: ["customers", "missing"] })

		expect(result.relevant_tables).toEqual(["customers"])
		const user = generator.calls[0]?.[1]?.content ?? ""
		expect(user).toContain("Table: customers")
		expect(user).not.toContain("Table: orders")
	})

	it("reports generation failures", async () => {
		const { pipeline } = await setup(salesStore(), [
			new GenerationError("Cannot connect to Ollama at http://ollama.test. Is it running?"),
		])

		const result = await pipeline.run(QUESTION)

		expect(result).toMatchObject({
			success: false,
			sql: null,
			failure: "generation",
			error: "Cannot connect to Ollama at http://ollama.test. Is it running?",
			relevant_tables: ["orders", "customers"],
		})
	})

	it("treats an empty model reply as a generation failure", async () => {
		const { pipeline } = await setup(salesStore(), ["   "])

		const result = await pipeline.run(QUESTION)

		expect(result.failure).toBe("generation")
		expect(result.error).toBe("Model returned an empty reply")
	})

	it("reports engine failures without retrying", async () => {
		const store = salesStore().onQuery(BAD_SQL, new NL2SQLError("engine", "Database unavailable: connection refused"))
		const { pipeline, generator } = await setup(store, [BAD_SQL])

		const result = await pipeline.run(QUESTION)

		expect(result).toMatchObject({ success: false, sql: BAD_SQL, failure: "engine", attempts: 1 })
		expect(result.error).toBe("Database unavailable: connection refused")
		expect(result.history).toEqual([{ sql: BAD_SQL, error: "Database unavailable: connection refused" }])
		expect(generator.calls).toHaveLength(1)
	})

	it("keeps the attempts already made when a correction cannot be generated", async () => {
		const { pipeline } = await setup(salesStore(), [BAD_SQL, new GenerationError("Ollama request timed out")])

		const result = await pipeline.run(QUESTION)

		expect(result).toMatchObject({
			success: false,
			sql: BAD_SQL,
			failure: "generation",
			error: "Ollama request timed out",
			attempts: 1,
			history: [{ sql: BAD_SQL, error: BAD_ERROR }],
		})
	})

	it("answers from the resolver's snapshot until it is refreshed", async () => {
		const refundSql = 'SELECT SUM("amount") FROM "refunds"'
		const store = new InMemoryTableStore().onQuery(refundSql, [{ sum: 5 }])
		const { pipeline, resolver } = await setup(store, [refundSql])
		await store.loadTable("refunds", { columns: [{ column: "amount", type: "BIGINT" }], rows: [[5]] })

		const stale = await pipeline.run("refund amounts")
		expect(stale.error).toBe("No tables found in the database.")

		await resolver.refreshSchema(store.getSchema())
		const fresh = await pipeline.run("refund amounts")
		expect(fresh.success).toBe(true)
		expect(fresh.relevant_tables).toEqual(["refunds"])
	})

	it("returns retry exhaustion as a failed result", async () => {
		const { pipeline } = await setup(salesStore(), [BAD_SQL, BAD_SQL, BAD_SQL])

		const result = await pipeline.run(QUESTION)

		expect(result.success).toBe(false)
		expect(result.failure).toBe("execution")
		expect(result.attempts).toBe(3)
		expect(result.error).toBe(exhaustionMessage(3, BAD_ERROR))
	})

	it("propagates cancellation", async () => {
		const { pipeline } = await setup(salesStore(), [GOOD_SQL])
		const controller = new AbortController()
		controller.abort()

		await expect(pipeline.run(QUESTION, { signal: controller.signal })).rejects.toThrow()
	})
})

describe("selectTables", () => {
	const schema = { a: [], b: [], c: [] }

	it("keeps schema order and ignores unknown names", () => {
		expect(Object.keys(selectTables(schema, ["c", "a", "zzz"]))).toEqual(["a", "c"])
	})

	it("returns the full schema for an empty or unknown selection", () => {
		expect(selectTables(schema, [])).toBe(schema)
		expect(selectTables(schema, ["zzz"])).toBe(schema)
	})
})
