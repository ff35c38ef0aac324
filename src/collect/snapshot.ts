import { readFileSync } from "fs";
import { debug } from "../log";
import type { EmailMessage, GitCommit, JiraTicket, Snapshot } from "../types";

// ── Validation ───────────────────────────────────────────

export type SnapshotCollection = "jira" | "git" | "emails";

/**
 * Thrown when the snapshot is not an object with the three collections, or
 * when any record lacks a required field. One bad record rejects the whole
 * ingestion; nothing is loaded partially.
 */
export class SnapshotValidationError extends Error {
	constructor(
		message: string,
		readonly collection?: SnapshotCollection,
		readonly recordIndex?: number,
		readonly field?: string,
	) {
		super(message);
		this.name = "SnapshotValidationError";
	}
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Accepts "2024-03-01", "2024-03-01T09:30:00", "2024-03-01T09:30:00.123+02:00", "...Z".
const ISO_8601_RE =
	/^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Rewrite an accepted timestamp into the one form Date parses the same on
 * every host. Values without an offset (date-only or not) are read as UTC.
 */
export function normalizeTimestamp(value: string): string | null {
	const m = ISO_8601_RE.exec(value);
	if (!m) return null;
	const [, date, time = "00:00:00", zone = "Z"] = m;
	const offset = zone === "Z" || zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
	return `${date}T${time}${offset}`;
}

class RecordReader {
	constructor(
		private readonly raw: RawRecord,
		private readonly collection: SnapshotCollection,
		private readonly index: number,
	) {}

	private fail(field: string, problem: string): never {
		throw new SnapshotValidationError(
			`${this.collection}[${this.index}]: ${problem} "${field}"`,
			this.collection,
			this.index,
			field,
		);
	}

	/** Identifiers and names: "" counts as missing. */
	required(field: string): string {
		const v = this.text(field);
		if (v === "") return this.fail(field, "missing required field");
		return v;
	}

	/** Free text that must be present but may be empty, such as an email body. */
	text(field: string): string {
		const v = this.raw[field];
		if (v === undefined || v === null) return this.fail(field, "missing required field");
		if (typeof v !== "string") return this.fail(field, "expected a string for");
		return v;
	}

	/** Absent, null and "" all read as undefined. */
	optional(field: string): string | undefined {
		const v = this.raw[field];
		if (v === undefined || v === null || v === "") return undefined;
		if (typeof v !== "string") return this.fail(field, "expected a string for");
		return v;
	}

	timestamp(field: string): Date {
		const normalized = normalizeTimestamp(this.required(field).trim());
		const parsed = normalized === null ? null : new Date(normalized);
		if (parsed === null || isNaN(parsed.getTime())) {
			return this.fail(field, "expected an ISO-8601 timestamp for");
		}
		return parsed;
	}

	/** Absent reads as []; empty entries are dropped. */
	stringList(field: string): string[] {
		const v = this.raw[field];
		if (v === undefined || v === null) return [];
		if (!Array.isArray(v)) return this.fail(field, "expected an array for");
		const items: unknown[] = v;
		const out: string[] = [];
		for (const item of items) {
			if (typeof item !== "string") return this.fail(field, "expected only strings in");
			if (item !== "") out.push(item);
		}
		return out;
	}
}

function readCollection<T>(
	doc: RawRecord,
	collection: SnapshotCollection,
	parse: (reader: RecordReader) => T,
): T[] {
	const value = doc[collection];
	if (!Array.isArray(value)) {
		throw new SnapshotValidationError(
			`snapshot is missing the "${collection}" array`,
			collection,
		);
	}
	const list: unknown[] = value;
	return list.map((item, i) => {
		if (!isRecord(item)) {
			throw new SnapshotValidationError(
				`${collection}[${i}]: expected an object`,
				collection,
				i,
			);
		}
		return parse(new RecordReader(item, collection, i));
	});
}

// ── Record parsers ───────────────────────────────────────

function parseTicket(r: RecordReader): JiraTicket {
	return {
		id: r.required("id"),
		summary: r.text("summary"),
		status: r.required("status"),
		assignee: r.optional("assignee"),
		createdAt: r.timestamp("created_at"),
		updatedAt: r.timestamp("updated_at"),
		resolution: r.optional("resolution"),
	};
}

function parseCommit(r: RecordReader): GitCommit {
	return {
		commitId: r.required("commit_id"),
		author: r.required("author"),
		ticket: r.optional("ticket"),
		message: r.text("message"),
		timestamp: r.timestamp("timestamp"),
	};
}

function parseEmail(r: RecordReader): EmailMessage {
	return {
		threadId: r.required("thread_id"),
		sender: r.required("sender"),
		recipients: r.stringList("recipients"),
		subject: r.text("subject"),
		body: r.text("body"),
		timestamp: r.timestamp("timestamp"),
	};
}

// ── Public API ───────────────────────────────────────────

/**
 * Validate a parsed JSON document and convert it into typed records.
 *
 * Expected shape: `{ jira: [...], git: [...], emails: [...] }` with the
 * snake_case wire fields. Record order is preserved.
 */
export function parseSnapshot(raw: unknown): Snapshot {
	if (!isRecord(raw)) {
		throw new SnapshotValidationError("snapshot must be a JSON object");
	}
	const snapshot: Snapshot = {
		tickets: readCollection(raw, "jira", parseTicket),
		commits: readCollection(raw, "git", parseCommit),
		emails: readCollection(raw, "emails", parseEmail),
	};
	debug(
		`loaded ${snapshot.tickets.length} tickets, ${snapshot.commits.length} commits, ${snapshot.emails.length} emails`,
	);
	return snapshot;
}

export function loadSnapshot(path: string): Snapshot {
	const text = readFileSync(path, "utf-8");
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (e) {
		const msg = e instanceof Error ? e.message : String(e);
		throw new SnapshotValidationError(`${path} is not valid JSON: ${msg}`);
	}
	return parseSnapshot(raw);
}
