/**
 * Leveled logger that writes to stderr (stdout is reserved for MCP protocol)
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export type LogMeta = Record<string, unknown>

export interface Logger {
	debug(message: string, meta?: LogMeta): void
	info(message: string, meta?: LogMeta): void
	warn(message: string, meta?: LogMeta): void
	error(message: string, meta?: LogMeta): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

type Sink = (line: string) => void

export function formatLogLine(level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta): string {
	const tag = `[${level.toUpperCase()}]`
	if (!meta || Object.keys(meta).length === 0) return `${tag} ${message}`
	return `${tag} ${message} ${JSON.stringify(meta)}`
}

export function createStderrLogger(level: LogLevel = "info", sink: Sink = (line) => console.error(line)): Logger {
	const threshold = LEVEL_ORDER[level]
	const write = (lvl: Exclude<LogLevel, "silent">) => (message: string, meta?: LogMeta) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		sink(formatLogLine(lvl, message, meta))
	}
	return {
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	}
}

export const silentLogger: Logger = createStderrLogger("silent")
