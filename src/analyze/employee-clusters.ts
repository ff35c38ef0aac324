/**
 * Employee Correlation — builds one activity profile per person.
 *
 * A person is linked to a record through:
 *   - ticket assignee           → assigned (event at ticket creation)
 *   - "Resolved by <name>" note → resolved (event at ticket update)
 *   - commit author             → commits
 *   - email sender              → sent
 *   - each email recipient      → received
 *
 * One email can therefore appear in several profiles. People with no records
 * are never emitted. Output is sorted by total activity, most active first.
 */

import type {
	ActivitySummary,
	EmailMessage,
	EmployeeCluster,
	EmployeeTimelineEvent,
	GitCommit,
	JiraTicket,
} from "../types";
import { DEFAULT_EXTRACTOR, type TaskReferenceExtractor } from "./extractors";
import { sortTimeline } from "./timeline";

interface EmployeeDraft {
	assigned: JiraTicket[];
	resolved: JiraTicket[];
	commits: GitCommit[];
	sent: EmailMessage[];
	received: EmailMessage[];
	timeline: EmployeeTimelineEvent[];
}

function emptyDraft(): EmployeeDraft {
	return { assigned: [], resolved: [], commits: [], sent: [], received: [], timeline: [] };
}

export function summarizeActivity(draft: Omit<EmployeeDraft, "timeline">): ActivitySummary {
	const assigned = draft.assigned.length;
	const resolved = draft.resolved.length;
	const commits = draft.commits.length;
	const sent = draft.sent.length;
	const received = draft.received.length;
	return {
		assigned,
		resolved,
		commits,
		sent,
		received,
		total: assigned + resolved + commits + sent + received,
	};
}

export function correlateEmployees(
	tickets: readonly JiraTicket[],
	commits: readonly GitCommit[],
	emails: readonly EmailMessage[],
	extractor: TaskReferenceExtractor = DEFAULT_EXTRACTOR,
): EmployeeCluster[] {
	const drafts = new Map<string, EmployeeDraft>();
	const draftFor = (person: string): EmployeeDraft => {
		let draft = drafts.get(person);
		if (!draft) {
			draft = emptyDraft();
			drafts.set(person, draft);
		}
		return draft;
	};

	for (const ticket of tickets) {
		if (ticket.assignee) {
			const draft = draftFor(ticket.assignee);
			draft.assigned.push(ticket);
			draft.timeline.push({
				type: "ticket-assigned",
				id: ticket.id,
				timestamp: ticket.createdAt,
				record: ticket,
			});
		}

		const resolver = ticket.resolution ? extractor.extractResolver(ticket.resolution) : null;
		if (resolver) {
			const draft = draftFor(resolver);
			draft.resolved.push(ticket);
			draft.timeline.push({
				type: "ticket-resolved",
				id: ticket.id,
				timestamp: ticket.updatedAt,
				record: ticket,
			});
		}
	}

	for (const commit of commits) {
		const draft = draftFor(commit.author);
		draft.commits.push(commit);
		draft.timeline.push({
			type: "commit",
			id: commit.commitId,
			timestamp: commit.timestamp,
			record: commit,
		});
	}

	for (const email of emails) {
		const sender = draftFor(email.sender);
		sender.sent.push(email);
		sender.timeline.push({
			type: "email-sent",
			id: email.threadId,
			timestamp: email.timestamp,
			record: email,
		});

		for (const recipient of email.recipients) {
			const draft = draftFor(recipient);
			draft.received.push(email);
			draft.timeline.push({
				type: "email-received",
				id: email.threadId,
				timestamp: email.timestamp,
				record: email,
			});
		}
	}

	const clusters: EmployeeCluster[] = [];
	for (const [employee, draft] of drafts) {
		const summary = summarizeActivity(draft);
		if (summary.total === 0) continue;
		clusters.push({
			employee,
			summary,
			assigned: draft.assigned,
			resolved: draft.resolved,
			commits: draft.commits,
			sent: draft.sent,
			received: draft.received,
			timeline: sortTimeline(draft.timeline),
		});
	}

	// Stable: equal totals keep first-encounter order
	return clusters.sort((a, b) => b.summary.total - a.summary.total);
}
