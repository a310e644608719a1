/**
 * Scripted stand-ins for the model capabilities (tests only)
 */

import { GenerationError } from "../config.js"
import type { ChatMessage, Embedder, GenerationOptions, TextGenerator } from "../model_client.js"

/**
 * Replays canned replies in order. An Error entry is thrown instead of returned.
 */
export class ScriptedGenerator implements TextGenerator {
	readonly calls: ChatMessage[][] = []
	readonly streamCalls: ChatMessage[][] = []
	readonly options: GenerationOptions[] = []

	constructor(
		private replies: Array<string | Error> = [],
		private streams: Array<Array<string | Error>> = [],
	) {}

	async generate(messages: ChatMessage[], options: GenerationOptions = {}): Promise<string> {
		this.calls.push(messages)
		this.options.push(options)
		const next = this.replies.shift()
		if (next === undefined) throw new GenerationError("No scripted reply left")
		if (next instanceof Error) throw next
		return next
	}

	async *generateStream(messages: ChatMessage[], options: GenerationOptions = {}): AsyncGenerator<string> {
		this.streamCalls.push(messages)
		this.options.push(options)
		const next = this.streams.shift()
		if (next === undefined) throw new GenerationError("No scripted stream left")
		for (const chunk of next) {
			if (chunk instanceof Error) throw chunk
			yield chunk
		}
	}
}

/**
 * Looks vectors up by exact text; unknown texts get a zero vector.
 */
export class TableEmbedder implements Embedder {
	readonly calls: string[][] = []
	failWith: Error | null = null

	constructor(
		private vectors: Record<string, number[]>,
		private dimensions: number = 2,
	) {}

	async embed(texts: string[]): Promise<number[][]> {
		this.calls.push([...texts])
		if (this.failWith) throw this.failWith
		return texts.map((t) => this.vectors[t] ?? new Array<number>(this.dimensions).fill(0))
	}
}
