import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	cosineSimilarity,
	embedQuery,
	type EmbeddingConfig,
	generateEmbeddings,
	parseEmbeddingResponse,
	retrieveTopK,
	VectorIndex,
} from "../../../src/summarize/embeddings";
import type { EmbeddedChunk } from "../../../src/types";

// ── Mock setup ──────────────────────────────────────────

const fetchMock = vi.spyOn(globalThis, "fetch");

const CONFIG: EmbeddingConfig = { endpoint: "http://embed.test/", model: "test-embed", timeoutMs: 5000 };

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

function requestBody(call: number): unknown {
	const body = fetchMock.mock.calls[call][1]?.body;
	return typeof body === "string" ? JSON.parse(body) : null;
}

function chunk(id: string, text: string, embedding: number[]): EmbeddedChunk {
	return { id, kind: "task", key: id, text, embedding };
}

beforeEach(() => {
	fetchMock.mockReset();
	vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
	vi.mocked(console.warn).mockRestore();
});

// ── parseEmbeddingResponse ──────────────────────────────

describe("parseEmbeddingResponse", () => {
	it("reads the OpenAI shape in index order", () => {
		const data = { data: [{ index: 1, embedding: [2, 2] }, { index: 0, embedding: [1, 1] }] };
		expect(parseEmbeddingResponse(data)).toEqual([[1, 1], [2, 2]]);
	});

	it("reads the Ollama shape", () => {
		expect(parseEmbeddingResponse({ embeddings: [[0.5, 0.25]] })).toEqual([[0.5, 0.25]]);
	});

	it("rejects anything else", () => {
		expect(parseEmbeddingResponse(null)).toBeNull();
		expect(parseEmbeddingResponse({ vectors: [[1]] })).toBeNull();
		expect(parseEmbeddingResponse({ data: [{ embedding: ["x"] }] })).toBeNull();
		expect(parseEmbeddingResponse({ embeddings: [[1], "nope"] })).toBeNull();
	});
});

// ── generateEmbeddings ──────────────────────────────────

describe("generateEmbeddings", () => {
	it("makes no request for empty input", async () => {
		expect(await generateEmbeddings([], CONFIG)).toEqual([]);
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("embeds a batch in one request", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 0], [0, 1]] }));

		const vectors = await generateEmbeddings(["a", "b"], CONFIG);

		expect(vectors).toEqual([[1, 0], [0, 1]]);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(fetchMock.mock.calls[0][0]).toBe("http://embed.test/v1/embeddings");
		expect(requestBody(0)).toEqual({ model: "test-embed", input: ["a", "b"] });
	});

	it("falls back to one request per text when the batch fails", async () => {
		fetchMock
			.mockResolvedValueOnce(jsonResponse({ error: "batch unsupported" }, 400))
			.mockResolvedValueOnce(jsonResponse({ data: [{ embedding: [1, 0] }] }))
			.mockResolvedValueOnce(jsonResponse({ data: [{ embedding: [0, 1] }] }));

		const vectors = await generateEmbeddings(["a", "b"], CONFIG);

		expect(vectors).toEqual([[1, 0], [0, 1]]);
		expect(fetchMock).toHaveBeenCalledTimes(3);
		expect(requestBody(1)).toEqual({ model: "test-embed", input: "a" });
		expect(requestBody(2)).toEqual({ model: "test-embed", input: "b" });
	});

	it("falls back when the batch returns the wrong number of vectors", async () => {
		fetchMock
			.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 0]] }))
			.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 0]] }))
			.mockResolvedValueOnce(jsonResponse({ embeddings: [[0, 1]] }));

		expect(await generateEmbeddings(["a", "b"], CONFIG)).toEqual([[1, 0], [0, 1]]);
	});

	it("throws when a sequential request fails", async () => {
		fetchMock
			.mockResolvedValueOnce(jsonResponse({}, 500))
			.mockResolvedValueOnce(new Response("down", { status: 503 }));

		await expect(generateEmbeddings(["a"], CONFIG)).rejects.toThrow("HTTP 503: down");
	});
});

// ── embedQuery ──────────────────────────────────────────

describe("embedQuery", () => {
	it("makes exactly one request", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[0.1, 0.2]] }));
		expect(await embedQuery("who fixed login?", CONFIG)).toEqual([0.1, 0.2]);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(requestBody(0)).toEqual({ model: "test-embed", input: "who fixed login?" });
	});

	it("throws on an empty result without retrying", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [] }));
		await expect(embedQuery("q", CONFIG)).rejects.toThrow("No embedding returned for query");
		expect(fetchMock).toHaveBeenCalledTimes(1);
	});
});

// ── Vector math ─────────────────────────────────────────

describe("cosineSimilarity", () => {
	it("scores direction, not magnitude", () => {
		expect(cosineSimilarity([1, 0], [3, 0])).toBe(1);
		expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
		expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
	});

	it("returns 0 for mismatched, empty or zero vectors", () => {
		expect(cosineSimilarity([1], [1, 0])).toBe(0);
		expect(cosineSimilarity([], [])).toBe(0);
		expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
	});
});

describe("retrieveTopK", () => {
	it("returns the k most similar chunks, best first", () => {
		const chunks = [chunk("a", "A", [1, 0]), chunk("b", "B", [0, 1]), chunk("c", "C", [1, 1])];
		const results = retrieveTopK([0, 1], chunks, 2);
		expect(results.map((r) => r.chunk.id)).toEqual(["b", "c"]);
		expect(retrieveTopK([0, 1], chunks, 0)).toEqual([]);
	});
});

// ── VectorIndex ─────────────────────────────────────────

describe("VectorIndex", () => {
	const chunks = [chunk("a", "alpha", [1, 0]), chunk("b", "beta", [0, 1]), chunk("c", "gamma", [1, 1])];

	it("returns the nearest fragment texts", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[0, 1]] }));
		const index = new VectorIndex(chunks, CONFIG);
		expect(await index.search("q", 2)).toEqual({ status: "ok", fragments: ["beta", "gamma"] });
	});

	it("answers an empty index or k of zero without a request", async () => {
		expect(await new VectorIndex([], CONFIG).search("q", 3)).toEqual({ status: "ok", fragments: [] });
		expect(await new VectorIndex(chunks, CONFIG).search("q", 0)).toEqual({ status: "ok", fragments: [] });
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("reports an unreachable embedding server as unavailable", async () => {
		fetchMock.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
		const outcome = await new VectorIndex(chunks, CONFIG).search("q", 2);
		expect(outcome).toEqual({ status: "unavailable", error: "connect ECONNREFUSED" });
		expect(console.warn).toHaveBeenCalledWith("Activity Profiles:", "similarity search failed: connect ECONNREFUSED");
	});

	it("builds by embedding every chunk", async () => {
		fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 0]] }));
		const index = await VectorIndex.build([{ id: "task:PROJ-1:0", kind: "task", key: "PROJ-1", text: "t" }], CONFIG);
		expect(index.size).toBe(1);
		expect(index.entries[0].embedding).toEqual([1, 0]);
	});
});
