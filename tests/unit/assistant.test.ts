import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ActivityAssistant, type AnswerGenerator, createAssistant, PROMPT_FOR_KIND } from "../../src/assistant";
import { parseSnapshot } from "../../src/collect/snapshot";
import { DEFAULT_SETTINGS } from "../../src/settings/types";
import type { ChatResult } from "../../src/summarize/ai-client";
import type { SearchOutcome, SimilaritySearch } from "../../src/summarize/embeddings";

// ── Fakes ───────────────────────────────────────────────

function fakeSearch(outcome: SearchOutcome) {
	const search = vi.fn<SimilaritySearch["search"]>().mockResolvedValue(outcome);
	return { searcher: { search }, search };
}

function fakeGenerator(result: ChatResult) {
	return vi.fn<AnswerGenerator>().mockResolvedValue(result);
}

const ANSWER: ChatResult = {
	ok: true,
	text: "bob resolved PROJ-1",
	usage: { promptTokens: 30, completionTokens: 10, totalTokens: 40 },
};

beforeEach(() => {
	vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
	vi.mocked(console.warn).mockRestore();
});

// ── ActivityAssistant ───────────────────────────────────

describe("ActivityAssistant.ask", () => {
	it("answers from the retrieved fragments", async () => {
		const { searcher, search } = fakeSearch({ status: "ok", fragments: ["frag-1", "frag-2"] });
		const generate = fakeGenerator(ANSWER);
		const assistant = new ActivityAssistant("employee", searcher, generate, 2);

		const reply = await assistant.ask("  who resolved PROJ-1?  ");

		expect(reply).toEqual({
			status: "answered",
			answer: "bob resolved PROJ-1",
			usage: ANSWER.ok ? ANSWER.usage : null,
			fragments: ["frag-1", "frag-2"],
		});
		expect(search).toHaveBeenCalledWith("who resolved PROJ-1?", 2);
		expect(generate).toHaveBeenCalledWith("who resolved PROJ-1?", ["frag-1", "frag-2"]);
	});

	it("accumulates token usage across answered queries", async () => {
		const { searcher } = fakeSearch({ status: "ok", fragments: ["frag"] });
		const assistant = new ActivityAssistant("task", searcher, fakeGenerator(ANSWER), 3);

		await assistant.ask("one");
		await assistant.ask("two");

		expect(assistant.totalTokenUsage).toBe(80);
	});

	it("rejects a blank query without searching", async () => {
		const { searcher, search } = fakeSearch({ status: "ok", fragments: ["frag"] });
		const generate = fakeGenerator(ANSWER);
		const reply = await new ActivityAssistant("task", searcher, generate, 3).ask("   ");

		expect(reply.status).toBe("empty-query");
		expect(search).not.toHaveBeenCalled();
		expect(generate).not.toHaveBeenCalled();
	});

	it("does not call the model when nothing relevant is found", async () => {
		const { searcher } = fakeSearch({ status: "ok", fragments: [] });
		const generate = fakeGenerator(ANSWER);
		const reply = await new ActivityAssistant("task", searcher, generate, 3).ask("anything");

		expect(reply).toEqual({ status: "no-context", answer: null, usage: null, fragments: [] });
		expect(generate).not.toHaveBeenCalled();
	});

	it("reports an unavailable search", async () => {
		const { searcher } = fakeSearch({ status: "unavailable", error: "connect ECONNREFUSED" });
		const generate = fakeGenerator(ANSWER);
		const reply = await new ActivityAssistant("employee", searcher, generate, 3).ask("q");

		expect(reply.status).toBe("search-unavailable");
		expect(reply.error).toBe("connect ECONNREFUSED");
		expect(generate).not.toHaveBeenCalled();
	});

	it("keeps the fragments when generation fails and counts no tokens", async () => {
		const { searcher } = fakeSearch({ status: "ok", fragments: ["frag"] });
		const generate = fakeGenerator({ ok: false, kind: "timeout", error: "no response within 5000ms" });
		const assistant = new ActivityAssistant("employee", searcher, generate, 3);

		const reply = await assistant.ask("q");

		expect(reply).toEqual({
			status: "generation-failed",
			answer: null,
			usage: null,
			fragments: ["frag"],
			error: "timeout: no response within 5000ms",
		});
		expect(assistant.totalTokenUsage).toBe(0);
	});
});

// ── createAssistant ─────────────────────────────────────

describe("createAssistant", () => {
	const fetchMock = vi.spyOn(globalThis, "fetch");

	beforeEach(() => {
		fetchMock.mockReset();
	});

	const snapshot = parseSnapshot({
		jira: [
			{
				id: "PROJ-1",
				summary: "Login fails",
				status: "Done",
				assignee: "alice",
				created_at: "2024-03-01T09:00:00Z",
				updated_at: "2024-03-02T09:00:00Z",
				resolution: "Resolved by bob",
			},
		],
		git: [],
		emails: [],
	});

	it("indexes the task view and answers with the technical prompt", async () => {
		fetchMock
			.mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[1, 0]] })))
			.mockResolvedValueOnce(new Response(JSON.stringify({ embeddings: [[1, 0]] })))
			.mockResolvedValueOnce(
				new Response(JSON.stringify({ choices: [{ message: { content: "Login was fixed." } }] })),
			);

		const { assistant, batch } = await createAssistant(snapshot, "task", {
			...DEFAULT_SETTINGS,
			embeddingEndpoint: "http://embed.test",
			chatEndpoint: "http://chat.test",
		});
		const reply = await assistant.ask("what happened to login?");

		expect(batch.kind).toBe("task");
		expect(batch.clusters).toHaveLength(1);
		expect(PROMPT_FOR_KIND[assistant.kind]).toBe("technical-history");
		expect(reply.status).toBe("answered");
		expect(reply.answer).toBe("Login was fixed.");
		expect(reply.fragments[0].startsWith("Task PROJ-1: Login fails")).toBe(true);
		expect(fetchMock.mock.calls.map((c) => c[0])).toEqual([
			"http://embed.test/v1/embeddings",
			"http://embed.test/v1/embeddings",
			"http://chat.test/v1/chat/completions",
		]);
	});

	it("rejects when the chunks cannot be embedded", async () => {
		fetchMock.mockRejectedValue(new Error("connect ECONNREFUSED"));
		await expect(createAssistant(snapshot, "employee", DEFAULT_SETTINGS)).rejects.toThrow(
			"connect ECONNREFUSED",
		);
	});
});
