/**
 * Entity-linking extractors.
 *
 * Records from the three sources share no reliable foreign keys beyond the
 * optional `ticket` field on commits, so the correlators mine free text for
 * references. The patterns live behind `TaskReferenceExtractor` so they can
 * be swapped per project (task key prefix) or tested on their own.
 *
 * No network. No external libraries.
 */

export interface TaskReferenceExtractor {
	/** Task keys mentioned in the text, in order of first appearance. */
	extractTaskIds(text: string): Set<string>;
	/** UUID-shaped commit ids mentioned in the text, duplicates included. */
	extractCommitRefs(text: string): string[];
	/** Person credited by a resolution note, or null when the note names nobody. */
	extractResolver(text: string): string | null;
}

export interface ExtractorOptions {
	/** Used to build the task id pattern `<prefix>-<digits>` when `taskIdPattern` is absent. */
	taskKeyPrefix?: string;
	taskIdPattern?: RegExp;
	commitRefPattern?: RegExp;
	/** The first capture group is taken as the resolver's name. */
	resolverPattern?: RegExp;
}

export const DEFAULT_TASK_KEY_PREFIX = "PROJ";

export const COMMIT_REF_RE =
	/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/g;

export const RESOLVER_RE = /Resolved by (\w+)/;

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function taskIdPatternFor(prefix: string): RegExp {
	return new RegExp(`${escapeRegExp(prefix)}-\\d+`, "g");
}

/** matchAll requires the global flag; add it when a caller's pattern lacks it. */
function withGlobalFlag(re: RegExp): RegExp {
	return re.flags.includes("g") ? re : new RegExp(re.source, re.flags + "g");
}

export function createRegexExtractor(options: ExtractorOptions = {}): TaskReferenceExtractor {
	const taskIdRe = withGlobalFlag(
		options.taskIdPattern ?? taskIdPatternFor(options.taskKeyPrefix ?? DEFAULT_TASK_KEY_PREFIX),
	);
	const commitRefRe = withGlobalFlag(options.commitRefPattern ?? COMMIT_REF_RE);
	const resolverRe = options.resolverPattern ?? RESOLVER_RE;

	return {
		extractTaskIds(text: string): Set<string> {
			const ids = new Set<string>();
			for (const m of text.matchAll(taskIdRe)) ids.add(m[0]);
			return ids;
		},
		extractCommitRefs(text: string): string[] {
			return [...text.matchAll(commitRefRe)].map((m) => m[0]);
		},
		extractResolver(text: string): string | null {
			const m = resolverRe.exec(text);
			return m?.[1] ?? null;
		},
	};
}

export const DEFAULT_EXTRACTOR: TaskReferenceExtractor = createRegexExtractor();
