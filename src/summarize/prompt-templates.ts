import { existsSync, readFileSync } from "fs";
import { join } from "path";
import * as log from "../log";

export type PromptName = "hr-analytics" | "technical-history";

/**
 * Built-in prompt defaults. A `<name>.txt` file in settings.promptsDir takes
 * precedence when present.
 */
export const BUILT_IN_PROMPTS: Record<PromptName, string> = {
	"hr-analytics": `You are an HR Analytics Assistant that helps analyze employee performance data. When responding to queries:

1. Provide concise, insightful analysis based only on the context
2. Include relevant details like ticket IDs, commit IDs, or email references when directly relevant to the query
3. Present performance metrics and trends clearly
4. Maintain a professional tone while highlighting achievements and areas for improvement
5. Use bullet points for clarity when appropriate
6. Keep sensitive personnel matters confidential

Query: {{query}}

Context:
{{context}}
`,

	"technical-history": `You are a technical documentation assistant. Focus exclusively on explaining the code changes and technical solutions from the provided context.

When answering:
1. Only describe the technical issue and how it was resolved
2. Exclude all employee names, commit IDs, ticket IDs, and email conversations
3. Concentrate solely on what code was modified and why
4. Explain the technical impact of these changes

Query: {{query}}

Context:
{{context}}
`,
};

export function loadPromptTemplate(name: PromptName, promptsDir?: string): string {
	if (promptsDir) {
		const path = join(promptsDir, `${name}.txt`);
		if (existsSync(path)) {
			try {
				return readFileSync(path, "utf-8");
			} catch (e) {
				log.warn(`could not read prompt override ${path}, using built-in:`, e instanceof Error ? e.message : e);
			}
		}
	}
	return BUILT_IN_PROMPTS[name];
}

/** Replace `{{key}}` placeholders; unknown placeholders are left as-is. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
	return template.replace(/\{\{(\w+)\}\}/g, (whole, key: string) =>
		Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : whole,
	);
}

export function formatContext(fragments: readonly string[]): string {
	if (fragments.length === 0) return "(no matching records)";
	return fragments.map((f, i) => `[${i + 1}]\n${f}`).join("\n\n");
}

export function buildAnswerPrompt(template: string, query: string, fragments: readonly string[]): string {
	return fillTemplate(template, { query, context: formatContext(fragments) });
}
