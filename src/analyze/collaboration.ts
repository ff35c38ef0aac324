/**
 * Collaboration Graph — who works with whom.
 *
 * Builds an undirected weighted graph over people from two signals:
 *   - email: +1 for every sender/recipient pair on a message (self-mail skipped)
 *   - shared tickets: +1 for every pair of distinct commit authors who both
 *     committed against the same ticket id
 *
 * Every increment is applied to both directions, so strength(a, b) always
 * equals strength(b, a).
 */

import type { CollaborationNetwork, EmployeeCluster } from "../types";

type Graph = Map<string, Map<string, number>>;

function addEdge(graph: Graph, a: string, b: string): void {
	for (const [from, to] of [[a, b], [b, a]]) {
		let row = graph.get(from);
		if (!row) {
			row = new Map<string, number>();
			graph.set(from, row);
		}
		row.set(to, (row.get(to) ?? 0) + 1);
	}
}

export function buildCollaborationGraph(clusters: readonly EmployeeCluster[]): Graph {
	const graph: Graph = new Map();

	// Each email sits in exactly one `sent` list, so it is counted once
	for (const cluster of clusters) {
		for (const email of cluster.sent) {
			for (const recipient of email.recipients) {
				if (recipient && recipient !== email.sender) {
					addEdge(graph, email.sender, recipient);
				}
			}
		}
	}

	const contributors = new Map<string, Set<string>>();
	for (const cluster of clusters) {
		for (const commit of cluster.commits) {
			if (!commit.ticket) continue;
			const authors = contributors.get(commit.ticket) ?? new Set<string>();
			authors.add(commit.author);
			contributors.set(commit.ticket, authors);
		}
	}

	for (const authors of contributors.values()) {
		const list = [...authors];
		for (let i = 0; i < list.length; i++) {
			for (let j = i + 1; j < list.length; j++) {
				addEdge(graph, list[i], list[j]);
			}
		}
	}

	return graph;
}

/**
 * Per-person collaborator lists, strongest first, and the overall list
 * ordered by total collaboration strength. Ties keep first-seen order.
 */
export function buildCollaborationNetworks(
	clusters: readonly EmployeeCluster[],
): CollaborationNetwork[] {
	const graph = buildCollaborationGraph(clusters);
	const networks: CollaborationNetwork[] = [];

	for (const [employee, row] of graph) {
		const collaborators = [...row.entries()]
			.map(([colleague, strength]) => ({ colleague, strength }))
			.sort((a, b) => b.strength - a.strength);
		networks.push({
			employee,
			totalCollaborations: collaborators.reduce((sum, c) => sum + c.strength, 0),
			collaborators,
		});
	}

	return networks.sort((a, b) => b.totalCollaborations - a.totalCollaborations);
}

/** Edge weight between two people, 0 when they never interacted. */
export function collaborationStrength(
	networks: readonly CollaborationNetwork[],
	a: string,
	b: string,
): number {
	const network = networks.find((n) => n.employee === a);
	return network?.collaborators.find((c) => c.colleague === b)?.strength ?? 0;
}
