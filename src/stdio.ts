#!/usr/bin/env node
/**
 * Stdio entry point for the Quill MCP server
 *
 * Config comes from config/config.yaml (+ config.local.yaml), overridden by
 * environment variables; see src/config/loadConfig.ts.
 *
 * Usage:
 *   node dist/src/stdio.js
 *   DATABASE_URL=postgresql://... OLLAMA_MODEL=qwen2.5-coder:7b node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import createServer from "./index.js"
import { createApp } from "./app.js"
import { loadConfig } from "./config/loadConfig.js"
import { errorMessage } from "./config.js"
import { createStderrLogger } from "./logger.js"

async function main() {
	const config = loadConfig()
	const logger = createStderrLogger(config.logging.level)

	logger.info("Starting Quill MCP server with stdio transport", {
		database: config.database.url ? config.database.url.replace(/:[^:@]+@/, ":***@") : `${config.database.host}:${config.database.port}/${config.database.name}`,
		model: config.model.llm,
	})

	const app = await createApp(config, logger)
	const server = createServer({ pipeline: app.pipeline, datasets: app.datasets, logger })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Quill MCP server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		try {
			await server.close()
			await app.close()
		} catch (error) {
			logger.error("Shutdown failed", { error: errorMessage(error) })
			process.exit(1)
		}
		process.exit(0)
	}

	process.on("SIGINT", () => void shutdown())
	process.on("SIGTERM", () => void shutdown())
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", errorMessage(error))
	process.exit(1)
})
