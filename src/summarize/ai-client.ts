import * as log from "../log";
import type { ChatProvider } from "../settings/types";

export interface TokenUsage {
	promptTokens: number;
	completionTokens: number;
	totalTokens: number;
}

export type ChatFailureKind = "http" | "network" | "timeout" | "shape" | "config";

/**
 * Result of one chat call. Failures are values, never thrown, so callers can
 * tell an unreachable model apart from an empty answer.
 */
export type ChatResult =
	| { ok: true; text: string; usage: TokenUsage }
	| { ok: false; kind: ChatFailureKind; error: string };

export interface ChatCallConfig {
	provider: ChatProvider;
	endpoint: string;
	model: string;
	apiKey: string;
	temperature: number;
	maxTokens: number;
	timeoutMs: number;
}

// ── Shared helpers ──────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(value: unknown): number {
	return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function failure(kind: ChatFailureKind, error: string): ChatResult {
	return { ok: false, kind, error };
}

function isTimeout(e: unknown): boolean {
	return isRecord(e) && (e.name === "TimeoutError" || e.name === "AbortError");
}

async function postJson(
	url: string,
	headers: Record<string, string>,
	body: Record<string, unknown>,
	timeoutMs: number,
): Promise<{ status: number; data: unknown } | ChatResult> {
	try {
		const resp = await fetch(url, {
			method: "POST",
			headers: { "Content-Type": "application/json", Accept: "application/json", ...headers },
			body: JSON.stringify(body),
			signal: AbortSignal.timeout(timeoutMs),
		});
		if (!resp.ok) {
			const text = await resp.text().catch(() => "");
			return failure("http", `HTTP ${resp.status}${text ? `: ${text.slice(0, 200)}` : ""}`);
		}
		return { status: resp.status, data: await resp.json() };
	} catch (e) {
		if (isTimeout(e)) {
			return failure("timeout", `no response within ${timeoutMs}ms`);
		}
		if (e instanceof SyntaxError) {
			return failure("shape", `response is not JSON: ${e.message}`);
		}
		return failure("network", e instanceof Error ? e.message : String(e));
	}
}

function isChatResult(value: { status: number; data: unknown } | ChatResult): value is ChatResult {
	return "ok" in value;
}

// ── Response parsing ────────────────────────────────────

/** `{ choices: [{ message: { content } }], usage: { prompt_tokens, ... } }` */
export function parseChatCompletion(data: unknown): { text: string; usage: TokenUsage } | null {
	if (!isRecord(data)) return null;
	const choices = data.choices;
	if (!Array.isArray(choices)) return null;
	const first: unknown = choices[0];
	if (!isRecord(first)) return null;
	const message = first.message;
	if (!isRecord(message)) return null;
	const content = message.content;
	if (typeof content !== "string") return null;

	const rawUsage = data.usage;
	const usage: Record<string, unknown> = isRecord(rawUsage) ? rawUsage : {};
	const promptTokens = num(usage.prompt_tokens);
	const completionTokens = num(usage.completion_tokens);
	return {
		text: content.trim(),
		usage: {
			promptTokens,
			completionTokens,
			totalTokens: num(usage.total_tokens) || promptTokens + completionTokens,
		},
	};
}

/** `{ content: [{ text }], usage: { input_tokens, output_tokens } }` */
export function parseAnthropicMessage(data: unknown): { text: string; usage: TokenUsage } | null {
	if (!isRecord(data)) return null;
	const blocks = data.content;
	if (!Array.isArray(blocks)) return null;
	const first: unknown = blocks[0];
	if (!isRecord(first)) return null;
	const text = first.text;
	if (typeof text !== "string") return null;

	const rawUsage = data.usage;
	const usage: Record<string, unknown> = isRecord(rawUsage) ? rawUsage : {};
	const promptTokens = num(usage.input_tokens);
	const completionTokens = num(usage.output_tokens);
	return {
		text: text.trim(),
		usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
	};
}

// ── OpenAI-compatible caller (Groq, OpenAI, Ollama, LM Studio) ──

export async function callOpenAICompatible(
	prompt: string,
	config: ChatCallConfig,
	systemPrompt?: string,
): Promise<ChatResult> {
	const baseUrl = config.endpoint.replace(/\/+$/, "");
	const messages: { role: string; content: string }[] = [];
	if (systemPrompt) messages.push({ role: "system", content: systemPrompt });
	messages.push({ role: "user", content: prompt });

	const headers: Record<string, string> = {};
	if (config.apiKey) headers.Authorization = `Bearer ${config.apiKey}`;

	const resp = await postJson(
		`${baseUrl}/v1/chat/completions`,
		headers,
		{
			model: config.model,
			messages,
			temperature: config.temperature,
			max_tokens: config.maxTokens,
		},
		config.timeoutMs,
	);
	if (isChatResult(resp)) return resp;

	const parsed = parseChatCompletion(resp.data);
	if (!parsed) return failure("shape", "unexpected response shape");
	return { ok: true, ...parsed };
}

// ── Anthropic caller ────────────────────────────────────

export async function callAnthropic(
	prompt: string,
	config: ChatCallConfig,
	systemPrompt?: string,
): Promise<ChatResult> {
	if (!config.apiKey) return failure("config", "no Anthropic API key configured");
	const baseUrl = config.endpoint.replace(/\/+$/, "");

	const body: Record<string, unknown> = {
		model: config.model,
		max_tokens: config.maxTokens,
		temperature: config.temperature,
		messages: [{ role: "user", content: prompt }],
	};
	if (systemPrompt) body.system = systemPrompt;

	const resp = await postJson(
		`${baseUrl}/v1/messages`,
		{ "x-api-key": config.apiKey, "anthropic-version": "2023-06-01" },
		body,
		config.timeoutMs,
	);
	if (isChatResult(resp)) return resp;

	const parsed = parseAnthropicMessage(resp.data);
	if (!parsed) return failure("shape", "unexpected response shape");
	return { ok: true, ...parsed };
}

// ── Provider router ─────────────────────────────────────

export async function callChat(
	prompt: string,
	config: ChatCallConfig,
	systemPrompt?: string,
): Promise<ChatResult> {
	if (!config.model) return failure("config", "no chat model configured");
	const result =
		config.provider === "anthropic"
			? await callAnthropic(prompt, config, systemPrompt)
			: await callOpenAICompatible(prompt, config, systemPrompt);
	if (!result.ok) {
		log.warn(`chat completion failed (${result.kind}): ${result.error}`);
	}
	return result;
}
