export type ChatProvider = "openai" | "anthropic";

export interface ProfilerSettings {
	/** Prefix of task keys mined from email text, e.g. "PROJ" for PROJ-123. */
	taskKeyPrefix: string;
	chunkSize: number;
	chunkOverlap: number;
	/** Base URL of an OpenAI-compatible embeddings server (Ollama, LM Studio, OpenAI). */
	embeddingEndpoint: string;
	embeddingModel: string;
	topK: number;
	provider: ChatProvider;
	/** Base URL; "/v1/chat/completions" or "/v1/messages" is appended per provider. */
	chatEndpoint: string;
	chatModel: string;
	apiKey: string;
	temperature: number;
	maxTokens: number;
	/** Applied to every embedding and chat request. */
	requestTimeoutMs: number;
	/** Directory holding the SQLite vector stores. Empty disables persistence. */
	vectorStoreDir: string;
	/** Directory of `<prompt-name>.txt` overrides. Empty uses the built-ins. */
	promptsDir: string;
	debugMode: boolean;
}

export const DEFAULT_SETTINGS: ProfilerSettings = {
	taskKeyPrefix: "PROJ",
	chunkSize: 500,
	chunkOverlap: 200,
	embeddingEndpoint: "http://localhost:11434",
	embeddingModel: "all-minilm",
	topK: 3,
	provider: "openai",
	chatEndpoint: "https://api.groq.com/openai",
	chatModel: "llama-3.3-70b-versatile",
	apiKey: "",
	temperature: 0,
	maxTokens: 1024,
	requestTimeoutMs: 30000,
	vectorStoreDir: "",
	promptsDir: "",
	debugMode: false,
};
