import { readFileSync } from "fs";
import { type ChatProvider, DEFAULT_SETTINGS, type ProfilerSettings } from "./types";

type EnvLike = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isProvider(value: unknown): value is ChatProvider {
	return value === "openai" || value === "anthropic";
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
	const v = raw[key];
	return typeof v === "string" ? v : undefined;
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
	const v = raw[key];
	return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
	const v = raw[key];
	return typeof v === "boolean" ? v : undefined;
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	const lower = value.trim().toLowerCase();
	if (lower === "true" || lower === "1") return true;
	if (lower === "false" || lower === "0") return false;
	return undefined;
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

/**
 * Force numeric settings into their supported ranges. Overlap must stay
 * below chunk size or the splitter could never make progress.
 */
export function clampSettings(settings: ProfilerSettings): ProfilerSettings {
	const chunkSize = clamp(Math.round(settings.chunkSize), 50, 8000);
	const prefix = settings.taskKeyPrefix.trim();
	return {
		...settings,
		taskKeyPrefix: prefix || DEFAULT_SETTINGS.taskKeyPrefix,
		chunkSize,
		chunkOverlap: clamp(Math.round(settings.chunkOverlap), 0, chunkSize - 1),
		topK: clamp(Math.round(settings.topK), 1, 50),
		temperature: clamp(settings.temperature, 0, 2),
		maxTokens: clamp(Math.round(settings.maxTokens), 1, 32768),
		requestTimeoutMs: clamp(Math.round(settings.requestTimeoutMs), 1000, 600000),
	};
}

/**
 * Merge settings in precedence order: environment, then the settings file,
 * then DEFAULT_SETTINGS. Unknown keys and values of the wrong type in the
 * file are ignored.
 */
export function resolveSettings(fileSettings: unknown = {}, env: EnvLike = {}): ProfilerSettings {
	const file: Record<string, unknown> = isRecord(fileSettings) ? fileSettings : {};
	const d = DEFAULT_SETTINGS;
	const provider = env.PROFILES_PROVIDER ?? file.provider;

	return clampSettings({
		taskKeyPrefix: readString(file, "taskKeyPrefix") ?? d.taskKeyPrefix,
		chunkSize: readNumber(file, "chunkSize") ?? d.chunkSize,
		chunkOverlap: readNumber(file, "chunkOverlap") ?? d.chunkOverlap,
		embeddingEndpoint:
			env.PROFILES_EMBEDDING_ENDPOINT ?? readString(file, "embeddingEndpoint") ?? d.embeddingEndpoint,
		embeddingModel:
			env.PROFILES_EMBEDDING_MODEL ?? readString(file, "embeddingModel") ?? d.embeddingModel,
		topK: readNumber(file, "topK") ?? d.topK,
		provider: isProvider(provider) ? provider : d.provider,
		chatEndpoint: env.PROFILES_CHAT_ENDPOINT ?? readString(file, "chatEndpoint") ?? d.chatEndpoint,
		chatModel: env.PROFILES_CHAT_MODEL ?? readString(file, "chatModel") ?? d.chatModel,
		apiKey: env.PROFILES_API_KEY ?? readString(file, "apiKey") ?? d.apiKey,
		temperature: readNumber(file, "temperature") ?? d.temperature,
		maxTokens: readNumber(file, "maxTokens") ?? d.maxTokens,
		requestTimeoutMs: readNumber(file, "requestTimeoutMs") ?? d.requestTimeoutMs,
		vectorStoreDir: readString(file, "vectorStoreDir") ?? d.vectorStoreDir,
		promptsDir: readString(file, "promptsDir") ?? d.promptsDir,
		debugMode: parseEnvBoolean(env.PROFILES_DEBUG) ?? readBoolean(file, "debugMode") ?? d.debugMode,
	});
}

/** Read a JSON settings file. A missing or invalid file is an error for the caller to report. */
export function loadSettingsFile(path: string): unknown {
	return JSON.parse(readFileSync(path, "utf-8"));
}
