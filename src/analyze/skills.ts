import type { EmployeeCluster, SkillTag } from "../types";

export interface SkillVocabulary {
	technologies: string[];
	actions: string[];
}

export const DEFAULT_SKILL_VOCABULARY: SkillVocabulary = {
	technologies: [
		"python", "javascript", "react", "node", "api", "database",
		"sql", "aws", "docker", "kubernetes", "frontend", "backend",
	],
	actions: ["fix", "implement", "refactor", "optimize", "test", "deploy"],
};

/** Non-overlapping substring occurrences; "nodes and node" has two of "node". */
export function countOccurrences(haystack: string, needle: string): number {
	if (!needle) return 0;
	let count = 0;
	let from = haystack.indexOf(needle);
	while (from !== -1) {
		count++;
		from = haystack.indexOf(needle, from + needle.length);
	}
	return count;
}

/**
 * Count vocabulary mentions across one person's commit messages and the
 * summaries of their assigned and resolved tickets. Matching is a
 * case-insensitive substring scan, so "api" also hits "rapid"; tags are
 * hints, not verified skills.
 */
export function extractEmployeeSkills(
	cluster: EmployeeCluster,
	vocabulary: SkillVocabulary = DEFAULT_SKILL_VOCABULARY,
): SkillTag[] {
	const texts = [
		...cluster.commits.map((c) => c.message),
		...cluster.assigned.map((t) => t.summary),
		...cluster.resolved.map((t) => t.summary),
	].map((t) => t.toLowerCase());

	const tags: SkillTag[] = [];
	const seen = new Set<string>();
	for (const raw of [...vocabulary.technologies, ...vocabulary.actions]) {
		const term = raw.toLowerCase();
		if (seen.has(term)) continue;
		seen.add(term);
		const mentions = texts.reduce((sum, text) => sum + countOccurrences(text, term), 0);
		if (mentions > 0) tags.push({ skill: term, mentions });
	}

	// Stable: ties keep vocabulary order
	return tags.sort((a, b) => b.mentions - a.mentions);
}

export function extractSkills(
	clusters: readonly EmployeeCluster[],
	vocabulary: SkillVocabulary = DEFAULT_SKILL_VOCABULARY,
): Record<string, SkillTag[]> {
	const skills: Record<string, SkillTag[]> = {};
	for (const cluster of clusters) {
		skills[cluster.employee] = extractEmployeeSkills(cluster, vocabulary);
	}
	return skills;
}
