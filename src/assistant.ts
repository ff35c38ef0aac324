/**
 * Question answering over correlated activity.
 *
 * Two flavours share one class:
 *   - "task"     — technical history per ticket, answered without naming people
 *   - "employee" — per-person activity for HR-style questions
 *
 * Each `ask()` makes at most one similarity search and at most one chat call.
 * Neither collaborator can touch the clusters; a failure only changes the
 * reply status.
 */

import * as log from "./log";
import { batchChunks, type Batch, chatConfigFrom, embeddingConfigFrom, runBatch, vectorStorePath } from "./pipeline";
import type { ProfilerSettings } from "./settings/types";
import type { ChatResult, TokenUsage } from "./summarize/ai-client";
import { generateAnswer } from "./summarize/answer";
import type { SimilaritySearch } from "./summarize/embeddings";
import { loadPromptTemplate, type PromptName } from "./summarize/prompt-templates";
import { openVectorIndex } from "./summarize/vector-store";
import type { ClusterKind, Snapshot } from "./types";

export type ReplyStatus =
	| "answered"
	| "empty-query"
	| "no-context"
	| "search-unavailable"
	| "generation-failed";

export interface AssistantReply {
	status: ReplyStatus;
	answer: string | null;
	usage: TokenUsage | null;
	/** Retrieved context, in rank order. */
	fragments: string[];
	error?: string;
}

export type AnswerGenerator = (query: string, fragments: readonly string[]) => Promise<ChatResult>;

export const PROMPT_FOR_KIND: Record<ClusterKind, PromptName> = {
	task: "technical-history",
	employee: "hr-analytics",
};

export class ActivityAssistant {
	private tokensUsed = 0;

	constructor(
		readonly kind: ClusterKind,
		private readonly searcher: SimilaritySearch,
		private readonly generate: AnswerGenerator,
		private readonly topK: number,
	) {}

	/** Running total of tokens reported by the model across all answered queries. */
	get totalTokenUsage(): number {
		return this.tokensUsed;
	}

	async ask(query: string): Promise<AssistantReply> {
		const trimmed = query.trim();
		if (!trimmed) {
			return { status: "empty-query", answer: null, usage: null, fragments: [] };
		}

		const outcome = await this.searcher.search(trimmed, this.topK);
		if (outcome.status === "unavailable") {
			return {
				status: "search-unavailable",
				answer: null,
				usage: null,
				fragments: [],
				error: outcome.error,
			};
		}
		if (outcome.fragments.length === 0) {
			log.warn(`no relevant chunks found for query "${trimmed}"`);
			return { status: "no-context", answer: null, usage: null, fragments: [] };
		}

		const result = await this.generate(trimmed, outcome.fragments);
		if (!result.ok) {
			return {
				status: "generation-failed",
				answer: null,
				usage: null,
				fragments: outcome.fragments,
				error: `${result.kind}: ${result.error}`,
			};
		}

		this.tokensUsed += result.usage.totalTokens;
		return {
			status: "answered",
			answer: result.text,
			usage: result.usage,
			fragments: outcome.fragments,
		};
	}
}

/**
 * Build the batch for `kind`, chunk it, open (or build and persist) the
 * vector index, and wire the prompt for that kind. Rejects when the chunks
 * cannot be embedded.
 */
export async function createAssistant(
	snapshot: Snapshot,
	kind: ClusterKind,
	settings: ProfilerSettings,
): Promise<{ assistant: ActivityAssistant; batch: Batch }> {
	const batch = runBatch(snapshot, kind, settings);
	const chunks = batchChunks(batch, settings);
	log.debug(`Created ${chunks.length} chunks from ${batch.clusters.length} ${kind} clusters`);

	const index = await openVectorIndex(
		chunks,
		embeddingConfigFrom(settings),
		vectorStorePath(settings, kind),
	);

	const template = loadPromptTemplate(PROMPT_FOR_KIND[kind], settings.promptsDir || undefined);
	const chatConfig = chatConfigFrom(settings);
	const assistant = new ActivityAssistant(
		kind,
		index,
		(query, fragments) => generateAnswer(query, fragments, template, chatConfig),
		settings.topK,
	);
	return { assistant, batch };
}
