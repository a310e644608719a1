/**
 * Ollama HTTP Client
 *
 * Text generation and embeddings for the pipeline.
 *
 * Responsibilities:
 * - Chat completion (/api/chat), whole reply or streamed NDJSON chunks
 * - Batch embeddings (/api/embed)
 * - Timeouts, caller cancellation, and mapping failures to GenerationError
 */

import { z } from "zod"
import { GenerationError, NL2SQLError, errorMessage } from "./config.js"

// ============================================================================
// Capability contracts
// ============================================================================

export interface ChatMessage {
	role: "system" | "user" | "assistant"
	content: string
}

export interface GenerationOptions {
	temperature?: number
	maxTokens?: number
	signal?: AbortSignal
}

/**
 * Opaque text generation: a structured prompt in, a best-effort string out.
 * Failures surface as GenerationError.
 */
export interface TextGenerator {
	generate(messages: ChatMessage[], options?: GenerationOptions): Promise<string>
	generateStream(messages: ChatMessage[], options?: GenerationOptions): AsyncIterable<string>
}

export interface Embedder {
	/** One vector per input text, in input order */
	embed(texts: string[], signal?: AbortSignal): Promise<number[][]>
}

// ============================================================================
// Wire formats
// ============================================================================

const chatResponseSchema = z.object({
	message: z.object({ content: z.string() }),
})

const chatChunkSchema = z.object({
	message: z.object({ content: z.string() }).optional(),
	done: z.boolean().optional(),
	error: z.string().optional(),
})

const embedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
})

// ============================================================================
// Client
// ============================================================================

export interface OllamaClientOptions {
	baseUrl: string
	model: string
	embeddingModel: string
	timeoutMs: number
	numCtx: number
	temperature: number
	maxTokens: number
}

interface RequestLease {
	signal: AbortSignal
	timedOut(): boolean
	abort(): void
	dispose(): void
}

/**
 * Abort on timeout or when the caller's signal fires, whichever comes first
 */
function lease(timeoutMs: number, callerSignal?: AbortSignal): RequestLease {
	const controller = new AbortController()
	let timedOut = false
	const timeoutId = setTimeout(() => {
		timedOut = true
		controller.abort()
	}, timeoutMs)
	const onAbort = () => controller.abort()
	if (callerSignal?.aborted) {
		controller.abort()
	} else {
		callerSignal?.addEventListener("abort", onAbort, { once: true })
	}
	return {
		signal: controller.signal,
		timedOut: () => timedOut,
		abort: () => controller.abort(),
		dispose: () => {
			clearTimeout(timeoutId)
			callerSignal?.removeEventListener("abort", onAbort)
		},
	}
}

export class OllamaClient implements TextGenerator, Embedder {
	private baseUrl: string

	constructor(private options: OllamaClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
	}

	/**
	 * Single chat completion
	 */
	async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<string> {
		const req = lease(this.options.timeoutMs, options.signal)
		try {
			const response = await this.post("/api/chat", this.chatBody(messages, options, false), req.signal)
			const parsed = chatResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new GenerationError("Ollama returned an unexpected chat response", { issues: parsed.error.issues })
			}
			return parsed.data.message.content
		} catch (error) {
			throw this.wrapError(error, req, "/api/chat")
		} finally {
			req.dispose()
		}
	}

	/**
	 * Streamed chat completion; yields content chunks as they arrive
	 */
	async *generateStream(messages: ChatMessage[], options: GenerationOptions = {}): AsyncGenerator<string> {
		const req = lease(this.options.timeoutMs, options.signal)
		let streamEnded = false
		try {
			const response = await this.post("/api/chat", this.chatBody(messages, options, true), req.signal)
			const reader = response.body?.getReader()
			if (!reader) throw new GenerationError("Ollama returned no response body")

			const decoder = new TextDecoder()
			let buffer = ""
			let finished = false

			while (!finished) {
				const { done, value } = await reader.read()
				if (done) {
					buffer += decoder.decode()
					streamEnded = true
					finished = true
				} else {
					buffer += decoder.decode(value, { stream: true })
				}

				const lines = buffer.split("\n")
				buffer = done ? "" : (lines.pop() ?? "")

				for (const line of lines) {
					if (!line.trim()) continue
					const chunk = parseChunk(line)
					if (chunk.error) throw new GenerationError(`Ollama stream error: ${chunk.error}`)
					if (chunk.message?.content) yield chunk.message.content
					if (chunk.done) finished = true
				}
			}
		} catch (error) {
			throw this.wrapError(error, req, "/api/chat")
		} finally {
			// Consumer stopped early or the reply ended before EOF: drop the connection
			if (!streamEnded) req.abort()
			req.dispose()
		}
	}

	/**
	 * Batch embeddings with the configured embedding model
	 */
	async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) return []

		const req = lease(this.options.timeoutMs, signal)
		try {
			const response = await this.post(
				"/api/embed",
				{ model: this.options.embeddingModel, input: texts },
				req.signal,
			)
			const parsed = embedResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new GenerationError("Ollama returned an unexpected embed response", { issues: parsed.error.issues })
			}
			if (parsed.data.embeddings.length !== texts.length) {
				throw new GenerationError(
					`Expected ${texts.length} embeddings, got ${parsed.data.embeddings.length}`,
				)
			}
			return parsed.data.embeddings
		} catch (error) {
			throw this.wrapError(error, req, "/api/embed")
		} finally {
			req.dispose()
		}
	}

	private chatBody(messages: ChatMessage[], options: GenerationOptions, stream: boolean) {
		return {
			model: this.options.model,
			messages,
			stream,
			options: {
				temperature: options.temperature ?? this.options.temperature,
				num_predict: options.maxTokens ?? this.options.maxTokens,
				num_ctx: this.options.numCtx,
			},
		}
	}

	private async post(path: string, body: unknown, signal: AbortSignal): Promise<Response> {
		const response = await fetch(`${this.baseUrl}${path}`, {
			method: "POST",
			headers: {
				"Content-Type": "application/json",
				"Accept": "application/json",
			},
			body: JSON.stringify(body),
			signal,
		})

		if (!response.ok) {
			const errorText = await response.text()
			throw new GenerationError(`Ollama returned error: ${response.status} ${errorText}`, {
				statusCode: response.status,
				responseBody: errorText,
			})
		}
		return response
	}

	private wrapError(error: unknown, req: RequestLease, path: string): NL2SQLError {
		// Re-throw NL2SQLError as-is
		if (error instanceof NL2SQLError) return error

		// Handle timeout / cancellation
		if (error instanceof Error && error.name === "AbortError") {
			if (req.timedOut()) {
				return new GenerationError(`Ollama request timed out after ${this.options.timeoutMs}ms`, {
					timeout: this.options.timeoutMs,
					path,
				})
			}
			return new GenerationError("Ollama request was cancelled", { path })
		}

		// Handle network errors
		if (error instanceof TypeError) {
			return new GenerationError(`Cannot connect to Ollama at ${this.baseUrl}. Is it running?`, {
				baseUrl: this.baseUrl,
				originalError: error.message,
			})
		}

		return new GenerationError(`Unexpected error communicating with Ollama: ${errorMessage(error)}`, {
			path,
		})
	}
}

function parseChunk(line: string): z.infer<typeof chatChunkSchema> {
	let raw: unknown
	try {
		raw = JSON.parse(line)
	} catch (error) {
		throw new GenerationError(`Malformed stream chunk: ${errorMessage(error)}`, { line })
	}
	const parsed = chatChunkSchema.safeParse(raw)
	if (!parsed.success) {
		throw new GenerationError("Ollama returned an unexpected stream chunk", { line })
	}
	return parsed.data
}
