import type { ActivityChunk, ClusterKind, EmployeeCluster, EmployeeTimelineEvent, TaskCluster } from "../types";

// ── Token estimation ────────────────────────────────────

/** Rough token count: ~4 chars per token on average. */
export function estimateTokens(text: string): number {
	return Math.ceil(text.length / 4);
}

// ── Recursive character splitting ───────────────────────

export interface SplitOptions {
	chunkSize: number;
	chunkOverlap: number;
	/** Tried in order; "" splits into single characters. */
	separators: string[];
}

export const DEFAULT_SPLIT_OPTIONS: SplitOptions = {
	chunkSize: 500,
	chunkOverlap: 200,
	separators: ["\n\n", "\n", ".", "!", "?", ",", " ", ""],
};

function joinPieces(pieces: string[], separator: string): string | null {
	const text = pieces.join(separator).trim();
	return text === "" ? null : text;
}

/**
 * Greedily pack pieces into chunks of at most chunkSize characters. When a
 * chunk closes, pieces are dropped from its front until at most chunkOverlap
 * characters remain to seed the next one.
 */
function mergePieces(pieces: string[], separator: string, opts: SplitOptions): string[] {
	const chunks: string[] = [];
	let current: string[] = [];
	let total = 0;

	for (const piece of pieces) {
		const sepLen = current.length > 0 ? separator.length : 0;
		if (total + piece.length + sepLen > opts.chunkSize && current.length > 0) {
			const text = joinPieces(current, separator);
			if (text) chunks.push(text);
			while (
				total > opts.chunkOverlap ||
				(total > 0 &&
					total + piece.length + (current.length > 0 ? separator.length : 0) > opts.chunkSize)
			) {
				total -= current[0].length + (current.length > 1 ? separator.length : 0);
				current = current.slice(1);
			}
		}
		current.push(piece);
		total += piece.length + (current.length > 1 ? separator.length : 0);
	}

	const text = joinPieces(current, separator);
	if (text) chunks.push(text);
	return chunks;
}

function splitRecursive(text: string, separators: string[], opts: SplitOptions): string[] {
	let separator = "";
	let remaining: string[] = [];
	for (let i = 0; i < separators.length; i++) {
		const candidate = separators[i];
		if (candidate === "" || text.includes(candidate)) {
			separator = candidate;
			remaining = separators.slice(i + 1);
			break;
		}
	}

	const pieces = (separator ? text.split(separator) : [...text]).filter((p) => p !== "");
	const chunks: string[] = [];
	let small: string[] = [];

	for (const piece of pieces) {
		if (piece.length < opts.chunkSize) {
			small.push(piece);
			continue;
		}
		if (small.length > 0) {
			chunks.push(...mergePieces(small, separator, opts));
			small = [];
		}
		if (remaining.length === 0) {
			chunks.push(piece);
		} else {
			chunks.push(...splitRecursive(piece, remaining, opts));
		}
	}
	if (small.length > 0) {
		chunks.push(...mergePieces(small, separator, opts));
	}
	return chunks;
}

/**
 * Split text on the coarsest separator that occurs in it, recursing into
 * finer separators only for pieces still longer than chunkSize.
 */
export function splitText(text: string, options: Partial<SplitOptions> = {}): string[] {
	const opts: SplitOptions = { ...DEFAULT_SPLIT_OPTIONS, ...options };
	if (text.trim() === "") return [];
	if (text.length <= opts.chunkSize) return [text.trim()];
	return splitRecursive(text, opts.separators, opts);
}

// ── Cluster rendering ───────────────────────────────────

function iso(d: Date): string {
	return d.toISOString();
}

function oneLine(text: string, max = 200): string {
	const flat = text.replace(/\s+/g, " ").trim();
	return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

export function renderTaskCluster(cluster: TaskCluster): string {
	const t = cluster.ticket;
	const lines: string[] = [
		`Task ${cluster.taskId}: ${t.summary}`,
		`Status: ${t.status} | Assignee: ${t.assignee ?? "unassigned"} | Created: ${iso(t.createdAt)} | Updated: ${iso(t.updatedAt)}`,
	];
	if (t.resolution) lines.push(`Resolution: ${oneLine(t.resolution)}`);

	if (cluster.commits.length > 0) {
		lines.push("", `Commits (${cluster.commits.length}):`);
		for (const c of cluster.commits) {
			lines.push(`- ${c.commitId} by ${c.author} at ${iso(c.timestamp)}: ${oneLine(c.message)}`);
		}
	}

	if (cluster.emails.length > 0) {
		lines.push("", `Emails (${cluster.emails.length}):`);
		for (const e of cluster.emails) {
			const to = e.recipients.length > 0 ? e.recipients.join(", ") : "nobody";
			lines.push(
				`- "${oneLine(e.subject, 120)}" from ${e.sender} to ${to} at ${iso(e.timestamp)}: ${oneLine(e.body)}`,
			);
		}
	}

	return lines.join("\n");
}

function describeEvent(event: EmployeeTimelineEvent): string {
	switch (event.type) {
		case "ticket-assigned":
		case "ticket-resolved":
			return `${event.type} ${event.id} [${event.record.status}]: ${oneLine(event.record.summary)}`;
		case "commit":
			return `commit ${event.id}${event.record.ticket ? ` (${event.record.ticket})` : ""}: ${oneLine(event.record.message)}`;
		case "email-sent":
			return `email-sent ${event.id} to ${event.record.recipients.join(", ") || "nobody"}: ${oneLine(event.record.subject, 120)}`;
		case "email-received":
			return `email-received ${event.id} from ${event.record.sender}: ${oneLine(event.record.subject, 120)}`;
	}
}

export function renderEmployeeCluster(cluster: EmployeeCluster): string {
	const s = cluster.summary;
	const lines: string[] = [
		`Employee: ${cluster.employee}`,
		`Activity: ${s.assigned} tickets assigned, ${s.resolved} tickets resolved, ${s.commits} commits, ${s.sent} emails sent, ${s.received} emails received (${s.total} total)`,
		"",
		"Timeline:",
	];
	for (const event of cluster.timeline) {
		lines.push(`- ${iso(event.timestamp)} ${describeEvent(event)}`);
	}
	return lines.join("\n");
}

// ── Chunk production ────────────────────────────────────

function toChunks(kind: ClusterKind, key: string, text: string, options: Partial<SplitOptions>): ActivityChunk[] {
	return splitText(text, options).map((piece, i) => ({
		id: `${kind}:${key}:${i}`,
		kind,
		key,
		text: piece,
	}));
}

export function chunkTaskCluster(cluster: TaskCluster, options: Partial<SplitOptions> = {}): ActivityChunk[] {
	return toChunks("task", cluster.taskId, renderTaskCluster(cluster), options);
}

export function chunkEmployeeCluster(
	cluster: EmployeeCluster,
	options: Partial<SplitOptions> = {},
): ActivityChunk[] {
	return toChunks("employee", cluster.employee, renderEmployeeCluster(cluster), options);
}

export type ClusterSet =
	| { kind: "task"; clusters: readonly TaskCluster[] }
	| { kind: "employee"; clusters: readonly EmployeeCluster[] };

export function chunkClusters(set: ClusterSet, options: Partial<SplitOptions> = {}): ActivityChunk[] {
	if (set.kind === "task") {
		return set.clusters.flatMap((c) => chunkTaskCluster(c, options));
	}
	return set.clusters.flatMap((c) => chunkEmployeeCluster(c, options));
}
