import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { clampSettings, loadSettingsFile, resolveSettings } from "../../../src/settings/resolve";
import { DEFAULT_SETTINGS } from "../../../src/settings/types";

describe("resolveSettings", () => {
	it("returns the defaults with no file and no environment", () => {
		expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
	});

	it("reads file values and ignores values of the wrong type", () => {
		const settings = resolveSettings({
			chunkSize: 800,
			topK: "5",
			provider: "anthropic",
			debugMode: true,
			unknownKey: 1,
		});
		expect(settings.chunkSize).toBe(800);
		expect(settings.topK).toBe(DEFAULT_SETTINGS.topK);
		expect(settings.provider).toBe("anthropic");
		expect(settings.debugMode).toBe(true);
		expect(settings).not.toHaveProperty("unknownKey");
	});

	it("lets the environment override the file", () => {
		const settings = resolveSettings(
			{ apiKey: "file-key", chatModel: "file-model", provider: "anthropic", debugMode: true },
			{
				PROFILES_API_KEY: "test-secret",
				PROFILES_CHAT_MODEL: "env-model",
				PROFILES_PROVIDER: "openai",
				PROFILES_DEBUG: "0",
				PROFILES_EMBEDDING_ENDPOINT: "http://embed.test",
			},
		);
		expect(settings.apiKey).toBe("test-secret");
		expect(settings.chatModel).toBe("env-model");
		expect(settings.provider).toBe("openai");
		expect(settings.debugMode).toBe(false);
		expect(settings.embeddingEndpoint).toBe("http://embed.test");
	});

	it("falls back past an unrecognised provider or debug flag", () => {
		const settings = resolveSettings({ debugMode: true }, { PROFILES_PROVIDER: "mistral", PROFILES_DEBUG: "yes" });
		expect(settings.provider).toBe("openai");
		expect(settings.debugMode).toBe(true);
	});

	it("treats a non-object file as empty", () => {
		expect(resolveSettings(["chunkSize", 10])).toEqual(DEFAULT_SETTINGS);
	});
});

describe("clampSettings", () => {
	it("keeps overlap below the chunk size", () => {
		const settings = clampSettings({ ...DEFAULT_SETTINGS, chunkSize: 100, chunkOverlap: 400 });
		expect(settings.chunkSize).toBe(100);
		expect(settings.chunkOverlap).toBe(99);
	});

	it("clamps numbers into range and restores an empty prefix", () => {
		const settings = clampSettings({
			...DEFAULT_SETTINGS,
			taskKeyPrefix: "  ",
			chunkSize: 10,
			chunkOverlap: -5,
			topK: 0,
			temperature: 3,
			maxTokens: 0.4,
			requestTimeoutMs: 10,
		});
		expect(settings).toMatchObject({
			taskKeyPrefix: "PROJ",
			chunkSize: 50,
			chunkOverlap: 0,
			topK: 1,
			temperature: 2,
			maxTokens: 1,
			requestTimeoutMs: 1000,
		});
	});
});

describe("loadSettingsFile", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "profiles-settings-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("parses a JSON settings file", () => {
		const path = join(dir, "settings.json");
		writeFileSync(path, JSON.stringify({ topK: 5, vectorStoreDir: ".profiles" }), "utf-8");
		expect(resolveSettings(loadSettingsFile(path))).toMatchObject({ topK: 5, vectorStoreDir: ".profiles" });
	});

	it("throws on invalid JSON", () => {
		const path = join(dir, "settings.json");
		writeFileSync(path, "{", "utf-8");
		expect(() => loadSettingsFile(path)).toThrow(SyntaxError);
	});
});
