// Console output for the loader, correlators, retrieval layer and CLI. Every
// line carries the "Activity Profiles:" tag so it can be told apart from
// sql.js or test-runner output.

const PREFIX = "Activity Profiles";

let _debugEnabled = false;

/** Set from `settings.debugMode` or the CLI's `--debug` flag. */
export function setDebugEnabled(enabled: boolean): void {
	_debugEnabled = enabled;
}

/** Progress detail: chunk counts, store reuse, prompt sizes. Silent unless enabled. */
export function debug(...args: unknown[]): void {
	if (!_debugEnabled) return;
	console.debug(`${PREFIX}:`, ...args);
}

/** A degraded but recoverable step, e.g. a failed search or an unreadable store. */
export function warn(...args: unknown[]): void {
	console.warn(`${PREFIX}:`, ...args);
}

export function error(...args: unknown[]): void {
	console.error(`${PREFIX}:`, ...args);
}
