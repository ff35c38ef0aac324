import * as log from "../log";
import { callChat, type ChatCallConfig, type ChatResult } from "./ai-client";
import { estimateTokens } from "./chunker";
import { buildAnswerPrompt } from "./prompt-templates";

/** Fill the template with the query and retrieved fragments, then make exactly one chat call. */
export async function generateAnswer(
	query: string,
	fragments: readonly string[],
	template: string,
	config: ChatCallConfig,
): Promise<ChatResult> {
	const prompt = buildAnswerPrompt(template, query, fragments);
	log.debug(`Sending prompt (~${estimateTokens(prompt)} tokens, ${fragments.length} fragments) to ${config.model}`);
	return callChat(prompt, config);
}
