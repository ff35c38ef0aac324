import type { ActivityChunk, EmbeddedChunk } from "../types";
import * as log from "../log";

export interface EmbeddingConfig {
	endpoint: string;
	model: string;
	timeoutMs: number;
}

// ── Fetch helper ────────────────────────────────────────

async function embeddingFetch(url: string, body: string, timeoutMs: number): Promise<unknown> {
	const resp = await fetch(url, {
		method: "POST",
		headers: {
			"Content-Type": "application/json",
			Accept: "application/json",
		},
		body,
		signal: AbortSignal.timeout(timeoutMs),
	});
	if (!resp.ok) {
		const text = await resp.text().catch(() => "");
		throw new Error(`HTTP ${resp.status}: ${text.slice(0, 200)}`);
	}
	return await resp.json();
}

// ── Response parsing ────────────────────────────────────

export function isNumberArray(value: unknown): value is number[] {
	return Array.isArray(value) && value.every((n: unknown) => typeof n === "number");
}

/**
 * Accepts both the OpenAI shape `{ data: [{ embedding, index }] }` and the
 * Ollama native shape `{ embeddings: [[...], [...]] }`. Returns null for
 * anything else.
 */
export function parseEmbeddingResponse(data: unknown): number[][] | null {
	if (typeof data !== "object" || data === null) return null;

	if ("data" in data && Array.isArray(data.data)) {
		const items: unknown[] = data.data;
		const rows: { index: number; embedding: number[] }[] = [];
		for (const item of items) {
			if (typeof item !== "object" || item === null) return null;
			if (!("embedding" in item) || !isNumberArray(item.embedding)) return null;
			const index = "index" in item && typeof item.index === "number" ? item.index : rows.length;
			rows.push({ index, embedding: item.embedding });
		}
		return rows.sort((a, b) => a.index - b.index).map((r) => r.embedding);
	}

	if ("embeddings" in data && Array.isArray(data.embeddings)) {
		const rowsIn: unknown[] = data.embeddings;
		const out: number[][] = [];
		for (const row of rowsIn) {
			if (!isNumberArray(row)) return null;
			out.push(row);
		}
		return out;
	}

	return null;
}

// ── Embedding generation ────────────────────────────────

/**
 * Generate embeddings for an array of texts via an OpenAI-compatible endpoint.
 * Tries batch first, falls back to sequential if batch fails.
 */
export async function generateEmbeddings(
	texts: string[],
	config: EmbeddingConfig,
): Promise<number[][]> {
	if (texts.length === 0) return [];
	const baseUrl = config.endpoint.replace(/\/+$/, "");
	const url = `${baseUrl}/v1/embeddings`;

	try {
		const data = await embeddingFetch(
			url,
			JSON.stringify({ model: config.model, input: texts }),
			config.timeoutMs,
		);
		const vectors = parseEmbeddingResponse(data);
		if (vectors && vectors.length === texts.length) return vectors;
		throw new Error("Unexpected embedding response format");
	} catch (batchErr) {
		log.debug("Batch embedding failed, trying sequential:", batchErr);

		const results: number[][] = [];
		for (const text of texts) {
			const data = await embeddingFetch(
				url,
				JSON.stringify({ model: config.model, input: text }),
				config.timeoutMs,
			);
			const vectors = parseEmbeddingResponse(data);
			if (!vectors || vectors.length === 0) {
				throw new Error("No embedding returned for text");
			}
			results.push(vectors[0]);
		}
		return results;
	}
}

/** Single request, no sequential retry: one search makes at most one call. */
export async function embedQuery(text: string, config: EmbeddingConfig): Promise<number[]> {
	const baseUrl = config.endpoint.replace(/\/+$/, "");
	const data = await embeddingFetch(
		`${baseUrl}/v1/embeddings`,
		JSON.stringify({ model: config.model, input: text }),
		config.timeoutMs,
	);
	const vectors = parseEmbeddingResponse(data);
	if (!vectors || vectors.length === 0) {
		throw new Error("No embedding returned for query");
	}
	return vectors[0];
}

export async function embedChunks(
	chunks: ActivityChunk[],
	config: EmbeddingConfig,
): Promise<EmbeddedChunk[]> {
	const embeddings = await generateEmbeddings(chunks.map((c) => c.text), config);
	return chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }));
}

// ── Vector math ─────────────────────────────────────────

export function cosineSimilarity(a: number[], b: number[]): number {
	if (a.length !== b.length || a.length === 0) return 0;

	let dot = 0;
	let magA = 0;
	let magB = 0;
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i];
		magA += a[i] * a[i];
		magB += b[i] * b[i];
	}

	const denom = Math.sqrt(magA) * Math.sqrt(magB);
	return denom === 0 ? 0 : dot / denom;
}

export function retrieveTopK(
	queryEmbedding: number[],
	chunks: readonly EmbeddedChunk[],
	topK: number,
): { chunk: EmbeddedChunk; score: number }[] {
	const scored = chunks.map((chunk) => ({
		chunk,
		score: cosineSimilarity(queryEmbedding, chunk.embedding),
	}));
	scored.sort((a, b) => b.score - a.score);
	return scored.slice(0, Math.max(0, topK));
}

// ── Similarity search ───────────────────────────────────

/**
 * `ok` with zero fragments means nothing relevant was indexed;
 * `unavailable` means the embedding server could not be reached.
 */
export type SearchOutcome =
	| { status: "ok"; fragments: string[] }
	| { status: "unavailable"; error: string };

export interface SimilaritySearch {
	search(query: string, k: number): Promise<SearchOutcome>;
}

/** In-memory nearest-neighbour index over embedded chunks. */
export class VectorIndex implements SimilaritySearch {
	constructor(
		private readonly chunks: readonly EmbeddedChunk[],
		private readonly config: EmbeddingConfig,
	) {}

	get size(): number {
		return this.chunks.length;
	}

	get entries(): readonly EmbeddedChunk[] {
		return this.chunks;
	}

	static async build(chunks: ActivityChunk[], config: EmbeddingConfig): Promise<VectorIndex> {
		log.debug(`Embedding ${chunks.length} chunks with ${config.model}...`);
		const embedded = await embedChunks(chunks, config);
		return new VectorIndex(embedded, config);
	}

	async search(query: string, k: number): Promise<SearchOutcome> {
		if (this.chunks.length === 0 || k <= 0) return { status: "ok", fragments: [] };
		try {
			const queryEmbedding = await embedQuery(query, this.config);
			const results = retrieveTopK(queryEmbedding, this.chunks, k);
			log.debug(`Retrieved ${results.length} chunks (from ${this.chunks.length} total)`);
			return { status: "ok", fragments: results.map((r) => r.chunk.text) };
		} catch (e) {
			const msg = e instanceof Error ? e.message : String(e);
			log.warn(`similarity search failed: ${msg}`);
			return { status: "unavailable", error: msg };
		}
	}
}
