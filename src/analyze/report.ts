import type { EmailMessage, EmployeeReport, GitCommit, JiraTicket } from "../types";
import { buildCollaborationNetworks } from "./collaboration";
import { correlateEmployees } from "./employee-clusters";
import { DEFAULT_EXTRACTOR, type TaskReferenceExtractor } from "./extractors";
import { DEFAULT_SKILL_VOCABULARY, extractSkills, type SkillVocabulary } from "./skills";
import { analyzeEmployeeClusters } from "./team-stats";

/** Employee path of the batch job: correlate, then run every analysis over the clusters. */
export function processAllEmployeeData(
	tickets: readonly JiraTicket[],
	commits: readonly GitCommit[],
	emails: readonly EmailMessage[],
	extractor: TaskReferenceExtractor = DEFAULT_EXTRACTOR,
	vocabulary: SkillVocabulary = DEFAULT_SKILL_VOCABULARY,
): EmployeeReport {
	const clusters = correlateEmployees(tickets, commits, emails, extractor);
	return {
		clusters,
		analysis: analyzeEmployeeClusters(clusters),
		collaboration: buildCollaborationNetworks(clusters),
		skills: extractSkills(clusters, vocabulary),
	};
}
