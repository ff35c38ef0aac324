import { createHash } from "crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import initSqlJs, { type SqlJsStatic } from "sql.js";
import * as log from "../log";
import type { ActivityChunk, ClusterKind, EmbeddedChunk } from "../types";
import { type EmbeddingConfig, isNumberArray, VectorIndex } from "./embeddings";

// ── SQLite via sql.js (WebAssembly) ──────────────
// The whole store is one in-memory database, exported to a single file on
// save and read back in full on load. No native binaries.

let _sql: Promise<SqlJsStatic> | undefined;

function sqlJs(): Promise<SqlJsStatic> {
	if (!_sql) {
		_sql = initSqlJs().catch((e: unknown) => {
			_sql = undefined;
			throw e;
		});
	}
	return _sql;
}

export interface StoredIndex {
	/** Hash of the chunk texts and embedding model the vectors were built from. */
	fingerprint: string;
	model: string;
	chunks: EmbeddedChunk[];
}

function isClusterKind(value: unknown): value is ClusterKind {
	return value === "task" || value === "employee";
}

/** Changes whenever a chunk, its order, or the embedding model changes. */
export function fingerprintChunks(chunks: readonly ActivityChunk[], model: string): string {
	const hash = createHash("sha256");
	hash.update(model);
	for (const c of chunks) {
		hash.update("\u0000");
		hash.update(c.id);
		hash.update("\u0000");
		hash.update(c.text);
	}
	return hash.digest("hex");
}

export async function saveVectorStore(path: string, index: StoredIndex): Promise<void> {
	const SQL = await sqlJs();
	const db = new SQL.Database();
	try {
		db.run("CREATE TABLE meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)");
		db.run(
			"CREATE TABLE chunks (position INTEGER PRIMARY KEY, id TEXT NOT NULL, kind TEXT NOT NULL, key TEXT NOT NULL, text TEXT NOT NULL, embedding TEXT NOT NULL)",
		);
		db.run("INSERT INTO meta (key, value) VALUES (?, ?), (?, ?)", [
			"fingerprint", index.fingerprint,
			"model", index.model,
		]);
		const stmt = db.prepare(
			"INSERT INTO chunks (position, id, kind, key, text, embedding) VALUES (?, ?, ?, ?, ?, ?)",
		);
		index.chunks.forEach((c, i) => {
			stmt.run([i, c.id, c.kind, c.key, c.text, JSON.stringify(c.embedding)]);
		});
		stmt.free();

		mkdirSync(dirname(path), { recursive: true });
		writeFileSync(path, db.export());
	} finally {
		db.close();
	}
}

/** Returns null when the file is missing or cannot be read as a store. */
export async function loadVectorStore(path: string): Promise<StoredIndex | null> {
	if (!existsSync(path)) return null;
	try {
		const SQL = await sqlJs();
		const db = new SQL.Database(readFileSync(path));
		try {
			const meta = new Map<string, string>();
			const metaStmt = db.prepare("SELECT key, value FROM meta");
			while (metaStmt.step()) {
				const [k, v] = metaStmt.get();
				if (typeof k === "string" && typeof v === "string") meta.set(k, v);
			}
			metaStmt.free();

			const chunks: EmbeddedChunk[] = [];
			const stmt = db.prepare("SELECT id, kind, key, text, embedding FROM chunks ORDER BY position");
			while (stmt.step()) {
				const [id, kind, key, text, embedding] = stmt.get();
				const vector: unknown = typeof embedding === "string" ? JSON.parse(embedding) : null;
				if (
					typeof id !== "string" ||
					!isClusterKind(kind) ||
					typeof key !== "string" ||
					typeof text !== "string" ||
					!isNumberArray(vector)
				) {
					throw new Error(`corrupt chunk row at position ${chunks.length}`);
				}
				chunks.push({ id, kind, key, text, embedding: vector });
			}
			stmt.free();

			return {
				fingerprint: meta.get("fingerprint") ?? "",
				model: meta.get("model") ?? "",
				chunks,
			};
		} finally {
			db.close();
		}
	} catch (e) {
		log.warn(`vector store ${path} is unreadable and will be rebuilt:`, e instanceof Error ? e.message : e);
		return null;
	}
}

/**
 * Reuse a persisted index when it is non-empty and was built from exactly
 * these chunks; otherwise embed from scratch and persist the result.
 * Embedding failures propagate to the caller.
 */
export async function openVectorIndex(
	chunks: ActivityChunk[],
	config: EmbeddingConfig,
	storePath?: string,
): Promise<VectorIndex> {
	const fingerprint = fingerprintChunks(chunks, config.model);

	if (storePath) {
		const stored = await loadVectorStore(storePath);
		if (stored && stored.chunks.length > 0 && stored.fingerprint === fingerprint) {
			log.debug(`Loaded ${stored.chunks.length} chunks from ${storePath}`);
			return new VectorIndex(stored.chunks, config);
		}
		log.debug(`Creating new vector store at ${storePath}`);
	}

	const index = await VectorIndex.build(chunks, config);

	if (storePath && index.size > 0) {
		try {
			await saveVectorStore(storePath, {
				fingerprint,
				model: config.model,
				chunks: [...index.entries],
			});
		} catch (e) {
			log.warn(`could not persist vector store to ${storePath}:`, e instanceof Error ? e.message : e);
		}
	}

	return index;
}
