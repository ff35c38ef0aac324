import type { ActivityTotals, EmployeeCluster, RoleCandidates, TeamAnalysis } from "../types";

const TOP_N = 3;

/**
 * Heuristic role tags. Each test is independent, so a person can carry any
 * number of tags (usually zero or one). Manager is only considered for
 * communicators: mostly email, some assigned tickets, no commits.
 */
export function classifyRoles(clusters: readonly EmployeeCluster[]): RoleCandidates {
	const roles: RoleCandidates = { developers: [], communicators: [], managers: [] };

	for (const c of clusters) {
		const s = c.summary;
		if (s.commits > s.sent + s.received) {
			roles.developers.push(c.employee);
		}
		if (s.sent > s.commits * 2) {
			roles.communicators.push(c.employee);
			if (s.assigned > 0 && s.commits === 0) {
				roles.managers.push(c.employee);
			}
		}
	}

	return roles;
}

function topBy(
	clusters: readonly EmployeeCluster[],
	key: keyof ActivityTotals,
): string[] {
	return [...clusters]
		.sort((a, b) => b.summary[key] - a.summary[key])
		.slice(0, TOP_N)
		.map((c) => c.employee);
}

export function analyzeEmployeeClusters(clusters: readonly EmployeeCluster[]): TeamAnalysis {
	const totals: ActivityTotals = { assigned: 0, resolved: 0, commits: 0, sent: 0, received: 0 };
	for (const c of clusters) {
		totals.assigned += c.summary.assigned;
		totals.resolved += c.summary.resolved;
		totals.commits += c.summary.commits;
		totals.sent += c.summary.sent;
		totals.received += c.summary.received;
	}

	return {
		totalEmployees: clusters.length,
		totals,
		roles: classifyRoles(clusters),
		topCodeContributors: topBy(clusters, "commits"),
		topIssueResolvers: topBy(clusters, "resolved"),
	};
}
