import { join } from "path";
import { createRegexExtractor } from "./analyze/extractors";
import { processAllEmployeeData } from "./analyze/report";
import { correlateTasks } from "./analyze/task-clusters";
import type { ChatCallConfig } from "./summarize/ai-client";
import { chunkClusters, type ClusterSet } from "./summarize/chunker";
import type { EmbeddingConfig } from "./summarize/embeddings";
import type { ProfilerSettings } from "./settings/types";
import type { ActivityChunk, ClusterKind, EmployeeCluster, EmployeeReport, Snapshot, TaskCluster } from "./types";

export type Batch =
	| { kind: "task"; clusters: TaskCluster[] }
	| { kind: "employee"; clusters: EmployeeCluster[]; report: EmployeeReport };

/**
 * One synchronous batch: correlate the snapshot for the requested view and,
 * on the employee path, run the analytics. Nothing here does I/O, so the
 * same snapshot always yields equal output.
 */
export function runBatch(snapshot: Snapshot, kind: ClusterKind, settings: ProfilerSettings): Batch {
	const extractor = createRegexExtractor({ taskKeyPrefix: settings.taskKeyPrefix });
	if (kind === "task") {
		return {
			kind,
			clusters: correlateTasks(snapshot.tickets, snapshot.commits, snapshot.emails, extractor),
		};
	}
	const report = processAllEmployeeData(snapshot.tickets, snapshot.commits, snapshot.emails, extractor);
	return { kind, clusters: report.clusters, report };
}

export function batchChunks(batch: Batch, settings: ProfilerSettings): ActivityChunk[] {
	const set: ClusterSet =
		batch.kind === "task"
			? { kind: "task", clusters: batch.clusters }
			: { kind: "employee", clusters: batch.clusters };
	return chunkClusters(set, { chunkSize: settings.chunkSize, chunkOverlap: settings.chunkOverlap });
}

export function embeddingConfigFrom(settings: ProfilerSettings): EmbeddingConfig {
	return {
		endpoint: settings.embeddingEndpoint,
		model: settings.embeddingModel,
		timeoutMs: settings.requestTimeoutMs,
	};
}

export function chatConfigFrom(settings: ProfilerSettings): ChatCallConfig {
	return {
		provider: settings.provider,
		endpoint: settings.chatEndpoint,
		model: settings.chatModel,
		apiKey: settings.apiKey,
		temperature: settings.temperature,
		maxTokens: settings.maxTokens,
		timeoutMs: settings.requestTimeoutMs,
	};
}

/** `<vectorStoreDir>/<kind>-index.sqlite`, or undefined when persistence is off. */
export function vectorStorePath(settings: ProfilerSettings, kind: ClusterKind): string | undefined {
	return settings.vectorStoreDir ? join(settings.vectorStoreDir, `${kind}-index.sqlite`) : undefined;
}
