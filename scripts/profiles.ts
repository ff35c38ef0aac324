/**
 * profiles.ts — Activity Profiles CLI
 *
 * Load a ticket/commit/email snapshot, correlate it, and either dump a
 * pipeline stage or answer a question over it.
 *
 * Usage:
 *   npx tsx scripts/profiles.ts [options]
 *
 * Options:
 *   --data <file>            Snapshot JSON (default: git-jira-email-data.json)
 *   --mode task|employee     Cluster view (default: employee)
 *   --stage <name>           Stage to output (default: report)
 *   --query <text>           Question for the answer stage
 *   --settings <file>        JSON settings file (see src/settings/types.ts)
 *   --out <file>             Write to file instead of stdout
 *   --debug                  Enable debug logging
 *
 * Stages:
 *   clusters   Correlated task or employee clusters
 *   report     Employee analytics: stats, roles, collaboration, skills
 *   chunks     Text fragments handed to the embedding server
 *   answer     Retrieve context for --query and ask the chat model
 *
 * Environment: PROFILES_API_KEY, PROFILES_PROVIDER, PROFILES_CHAT_ENDPOINT,
 * PROFILES_CHAT_MODEL, PROFILES_EMBEDDING_ENDPOINT, PROFILES_EMBEDDING_MODEL,
 * PROFILES_DEBUG.
 */

import { writeFileSync } from "fs";
import { parseArgs } from "util";

import { createAssistant } from "../src/assistant";
import { loadSnapshot } from "../src/collect/snapshot";
import { error, setDebugEnabled } from "../src/log";
import { batchChunks, runBatch } from "../src/pipeline";
import { loadSettingsFile, resolveSettings } from "../src/settings/resolve";
import type { ClusterKind } from "../src/types";

type Stage = "clusters" | "report" | "chunks" | "answer";

const STAGES: readonly Stage[] = ["clusters", "report", "chunks", "answer"];

function isStage(value: string): value is Stage {
	return STAGES.some((s) => s === value);
}

function isMode(value: string): value is ClusterKind {
	return value === "task" || value === "employee";
}

function emit(text: string, out: string | undefined): void {
	if (out) {
		writeFileSync(out, text + "\n", "utf-8");
	} else {
		console.log(text);
	}
}

async function main(): Promise<number> {
	const { values } = parseArgs({
		options: {
			data: { type: "string", default: "git-jira-email-data.json" },
			mode: { type: "string", default: "employee" },
			stage: { type: "string", default: "report" },
			query: { type: "string" },
			settings: { type: "string" },
			out: { type: "string" },
			debug: { type: "boolean", default: false },
		},
	});

	const mode = values.mode ?? "employee";
	const stage = values.stage ?? "report";
	if (!isMode(mode)) {
		error(`unknown --mode "${mode}" (expected task or employee)`);
		return 2;
	}
	if (!isStage(stage)) {
		error(`unknown --stage "${stage}" (expected ${STAGES.join(", ")})`);
		return 2;
	}

	const settings = resolveSettings(
		values.settings ? loadSettingsFile(values.settings) : {},
		process.env,
	);
	setDebugEnabled(settings.debugMode || values.debug === true);

	const snapshot = loadSnapshot(values.data ?? "git-jira-email-data.json");

	switch (stage) {
		case "clusters": {
			const batch = runBatch(snapshot, mode, settings);
			emit(JSON.stringify(batch.clusters, null, 2), values.out);
			return 0;
		}
		case "report": {
			const batch = runBatch(snapshot, "employee", settings);
			if (batch.kind !== "employee") return 1;
			const { clusters: _clusters, ...report } = batch.report;
			emit(JSON.stringify(report, null, 2), values.out);
			return 0;
		}
		case "chunks": {
			const chunks = batchChunks(runBatch(snapshot, mode, settings), settings);
			emit(chunks.map((c) => `### ${c.id}\n${c.text}`).join("\n\n"), values.out);
			return 0;
		}
		case "answer": {
			if (!values.query) {
				error("--stage answer needs --query");
				return 2;
			}
			const { assistant } = await createAssistant(snapshot, mode, settings);
			const reply = await assistant.ask(values.query);
			emit(JSON.stringify(reply, null, 2), values.out);
			return reply.status === "answered" ? 0 : 1;
		}
	}
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(e: unknown) => {
		error(e instanceof Error ? e.message : e);
		process.exitCode = 1;
	},
);
