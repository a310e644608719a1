import { describe, it, expect } from "vitest"
import { createStderrLogger, formatLogLine } from "./logger.js"

describe("formatLogLine", () => {
	it("appends metadata as JSON", () => {
		expect(formatLogLine("info", "Table loaded", { table: "orders", rows: 3 })).toBe(
			'[INFO] Table loaded {"table":"orders","rows":3}',
		)
	})

	it("omits empty metadata", () => {
		expect(formatLogLine("warn", "No tables", {})).toBe("[WARN] No tables")
	})
})

describe("createStderrLogger", () => {
	it("drops messages below the configured level", () => {
		const lines: string[] = []
		const logger = createStderrLogger("warn", (line) => lines.push(line))

		logger.debug("d")
		logger.info("i")
		logger.warn("w")
		logger.error("e", { code: "08006" })

		expect(lines).toEqual(["[WARN] w", '[ERROR] e {"code":"08006"}'])
	})

	it("writes nothing when silent", () => {
		const lines: string[] = []
		const logger = createStderrLogger("silent", (line) => lines.push(line))

		logger.error("e")

		expect(lines).toEqual([])
	})
})
