/**
 * Ask one question from the command line and print the event stream
 *
 * Usage:
 *   node dist/scripts/ask.js "Show me total revenue by customer"
 *   node dist/scripts/ask.js --tables orders,customers "revenue per customer"
 */

import { createApp } from "../src/app.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { errorMessage } from "../src/config.js"
import { createStderrLogger } from "../src/logger.js"

function parseArgs(argv: string[]): { question: string; tables?: string[] } {
	const args = [...argv]
	let tables: string[] | undefined
	const flag = args.indexOf("--tables")
	if (flag !== -1) {
		tables = (args[flag + 1] ?? "").split(",").filter(Boolean)
		args.splice(flag, 2)
	}
	return { question: args.join(" ").trim(), tables }
}

async function main() {
	const { question, tables } = parseArgs(process.argv.slice(2))
	if (!question) {
		console.error('Usage: ask [--tables a,b] "question"')
		process.exit(1)
	}

	const config = loadConfig()
	const app = await createApp(config, createStderrLogger(config.logging.level))

	try {
		const stream = app.pipeline.stream(question, { tables })
		let next = await stream.next()
		while (!next.done) {
			const event = next.value
			switch (event.type) {
				case "thinking":
					console.log(`… ${event.content}`)
					break
				case "sql":
					console.log(`\nSQL:\n${event.content}\n`)
					break
				case "result":
					console.log(`${event.row_count} row(s) after ${event.attempts} attempt(s)`)
					console.table(event.content.slice(0, 10))
					break
				case "summary":
					process.stdout.write(event.content)
					break
				case "summary_done":
					process.stdout.write("\n")
					break
				case "error":
					console.log(`${event.fatal ? "ERROR" : "WARN"}: ${event.content}`)
					break
			}
			next = await stream.next()
		}
		console.log(`\nquery_id: ${next.value.query_id}`)
	} finally {
		await app.close()
	}
}

main().catch((error: unknown) => {
	console.error("Fatal:", errorMessage(error))
	process.exit(1)
})
