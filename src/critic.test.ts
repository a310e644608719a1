import { describe, it, expect } from "vitest"
import { SelfCorrectingExecutor, type CriticStep } from "./critic.js"
import { GenerationError, NL2SQLError } from "./config.js"
import { InMemoryTableStore } from "./testing/fake_engine.js"
import { ScriptedGenerator } from "./testing/fake_model.js"
import { silentLogger } from "./logger.js"

const BAD_SQL = "SELECT customerName, SUM(total) FROM orders GROUP BY customerName"
const BAD_ERROR = 'SQL execution failed: syntax error at or near "SELECT"'
const GOOD_SQL = 'SELECT "customerID", SUM("total") AS revenue FROM "orders" GROUP BY "customerID"'

function ordersStore(): InMemoryTableStore {
	return new InMemoryTableStore({
		orders: [
			{ column: "customerID", type: "TEXT" },
			{ column: "total", type: "DOUBLE PRECISION" },
		],
	})
}

const request = { sql: BAD_SQL, schemaText: "Table: orders", question: "revenue per customer" }

describe("SelfCorrectingExecutor", () => {
	it("returns on the first successful attempt without asking for corrections", async () => {
		const store = ordersStore().onQuery(GOOD_SQL, [{ customerID: "ALFKI", revenue: 42 }])
		const generator = new ScriptedGenerator()
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		const result = await critic.executeWithRetry({ ...request, sql: GOOD_SQL })

		expect(result).toEqual({
			success: true,
			sql: GOOD_SQL,
			data: { columns: ["customerID", "revenue"], rows: [{ customerID: "ALFKI", revenue: 42 }], row_count: 1 },
			error: null,
			attempts: 1,
			history: [{ sql: GOOD_SQL, error: null }],
		})
		expect(generator.calls).toHaveLength(0)
	})

	it("corrects a failing statement and reports the attempt it succeeded on", async () => {
		const store = ordersStore().onQuery(GOOD_SQL, [{ customerID: "ALFKI", revenue: 42 }])
		const generator = new ScriptedGenerator([`\`\`\`sql\n${GOOD_SQL}\n\`\`\``])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		const result = await critic.executeWithRetry(request)

		expect(result.success).toBe(true)
		expect(result.attempts).toBe(2)
		expect(result.sql).toBe(GOOD_SQL)
		expect(result.history).toEqual([
			{ sql: BAD_SQL, error: BAD_ERROR },
			{ sql: GOOD_SQL, error: null },
		])
		expect(store.executed).toEqual([BAD_SQL, GOOD_SQL])
	})

	it("sends the full attempt history with each correction", async () => {
		const second = "SELECT amount FROM orders"
		const store = ordersStore()
		const generator = new ScriptedGenerator([second, "SELECT cost FROM orders"])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		await critic.executeWithRetry(request)

		const lastPrompt = generator.calls[1]?.[1]?.content ?? ""
		expect(lastPrompt).toContain(`Attempt 1:\nSQL: ${BAD_SQL}\nError: ${BAD_ERROR}`)
		expect(lastPrompt).toContain(`Attempt 2:\nSQL: ${second}`)
		expect(lastPrompt).toContain(`Current failing SQL:\n${second}`)
	})

	it("stops after maxRetries attempts", async () => {
		const store = ordersStore()
		const generator = new ScriptedGenerator(["SELECT 1 FROM nowhere", "SELECT 2 FROM nowhere"])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		const result = await critic.executeWithRetry(request)

		expect(result.success).toBe(false)
		expect(result.attempts).toBe(3)
		expect(result.history).toHaveLength(3)
		expect(result.sql).toBe("SELECT 2 FROM nowhere")
		expect(result.error).toBe('SQL execution failed: syntax error at or near "SELECT"')
		expect(result.data).toBeNull()
		expect(generator.calls).toHaveLength(2)
	})

	it("makes a single attempt when maxRetries is 1", async () => {
		const generator = new ScriptedGenerator()
		const critic = new SelfCorrectingExecutor(ordersStore(), generator, { maxRetries: 1 }, silentLogger)

		const result = await critic.executeWithRetry(request)

		expect(result.attempts).toBe(1)
		expect(result.success).toBe(false)
		expect(generator.calls).toHaveLength(0)
	})

	it("propagates generation failures immediately", async () => {
		const store = ordersStore()
		const generator = new ScriptedGenerator([new GenerationError("Cannot connect to Ollama")])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		await expect(critic.executeWithRetry(request)).rejects.toThrow("Cannot connect to Ollama")
		expect(store.executed).toEqual([BAD_SQL])
	})

	it("does not retry engine failures", async () => {
		const store = ordersStore().onQuery(BAD_SQL, new NL2SQLError("engine", "Database unavailable: connection refused"))
		const generator = new ScriptedGenerator(["SELECT 1"])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		const error = await critic.executeWithRetry(request).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(NL2SQLError)
		expect(error).toMatchObject({ type: "engine" })
		expect(generator.calls).toHaveLength(0)
	})

	it("yields attempting and correcting steps in order", async () => {
		const store = ordersStore().onQuery(GOOD_SQL, [])
		const generator = new ScriptedGenerator([GOOD_SQL])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		const steps: CriticStep[] = []
		const machine = critic.steps(request)
		let next = await machine.next()
		while (!next.done) {
			steps.push(next.value)
			next = await machine.next()
		}

		expect(steps).toEqual([
			{ kind: "attempting", attempt: 1, sql: BAD_SQL },
			{ kind: "correcting", attempt: 2, error: BAD_ERROR },
			{ kind: "attempting", attempt: 2, sql: GOOD_SQL },
		])
		expect(next.value.attempts).toBe(2)
	})

	it("keeps histories of concurrent runs apart", async () => {
		const store = ordersStore().onQuery(GOOD_SQL, [])
		const generator = new ScriptedGenerator([GOOD_SQL, GOOD_SQL])
		const critic = new SelfCorrectingExecutor(store, generator, { maxRetries: 3 }, silentLogger)

		const [a, b] = await Promise.all([critic.executeWithRetry(request), critic.executeWithRetry(request)])

		expect(a.history).toHaveLength(2)
		expect(b.history).toHaveLength(2)
		expect(a.history).not.toBe(b.history)
	})

	it("stops before the next attempt once cancelled", async () => {
		const controller = new AbortController()
		controller.abort()
		const store = ordersStore()
		const critic = new SelfCorrectingExecutor(store, new ScriptedGenerator(), {}, silentLogger)

		await expect(critic.executeWithRetry({ ...request, signal: controller.signal })).rejects.toThrow()
		expect(store.executed).toEqual([])
	})

	it("rejects a retry budget below one", () => {
		expect(() => new SelfCorrectingExecutor(ordersStore(), new ScriptedGenerator(), { maxRetries: 0 }, silentLogger)).toThrow(
			"maxRetries must be a positive integer, got 0",
		)
	})
})
