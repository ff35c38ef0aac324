/**
 * Task Correlation — groups tickets, commits and emails around a task id.
 *
 * Linking keys, strongest first:
 * 1. Every ticket seeds one cluster keyed by its id
 * 2. A commit joins the cluster named by its `ticket` field
 * 3. An email joins every cluster whose task id appears in its subject or body
 * 4. An email with no task id at all falls back to UUID-shaped commit ids in
 *    its body and joins the cluster(s) holding those commits
 *
 * References to unknown tickets are dropped; a cluster is never created
 * without a seeding ticket.
 *
 * No LLM calls. No network. No external libraries.
 */

import type { EmailMessage, GitCommit, JiraTicket, TaskCluster, TaskTimelineEvent } from "../types";
import { DEFAULT_EXTRACTOR, type TaskReferenceExtractor } from "./extractors";
import { sortTimeline } from "./timeline";

interface TaskClusterDraft {
	ticket: JiraTicket;
	commits: GitCommit[];
	emails: EmailMessage[];
	timeline: TaskTimelineEvent[];
}

function emailEvent(email: EmailMessage): TaskTimelineEvent {
	return { type: "email", id: email.threadId, timestamp: email.timestamp, record: email };
}

export function correlateTasks(
	tickets: readonly JiraTicket[],
	commits: readonly GitCommit[],
	emails: readonly EmailMessage[],
	extractor: TaskReferenceExtractor = DEFAULT_EXTRACTOR,
): TaskCluster[] {
	// Phase 1: accumulate into drafts keyed by task id (Map keeps first-seen order)
	const drafts = new Map<string, TaskClusterDraft>();

	for (const ticket of tickets) {
		const event: TaskTimelineEvent = {
			type: "ticket",
			id: ticket.id,
			timestamp: ticket.createdAt,
			record: ticket,
		};
		const existing = drafts.get(ticket.id);
		if (existing) {
			// Duplicate id: the later ticket wins, both creations stay on the timeline
			existing.ticket = ticket;
			existing.timeline.push(event);
		} else {
			drafts.set(ticket.id, { ticket, commits: [], emails: [], timeline: [event] });
		}
	}

	// commit id → task ids holding that commit, for the email fallback below
	const commitOwners = new Map<string, string[]>();

	for (const commit of commits) {
		if (!commit.ticket) continue;
		const draft = drafts.get(commit.ticket);
		if (!draft) continue;
		draft.commits.push(commit);
		draft.timeline.push({
			type: "commit",
			id: commit.commitId,
			timestamp: commit.timestamp,
			record: commit,
		});
		const owners = commitOwners.get(commit.commitId) ?? [];
		if (!owners.includes(commit.ticket)) owners.push(commit.ticket);
		commitOwners.set(commit.commitId, owners);
	}

	for (const email of emails) {
		const taskIds = extractor.extractTaskIds(`${email.subject}\n${email.body}`);

		for (const taskId of taskIds) {
			const draft = drafts.get(taskId);
			if (!draft) continue;
			draft.emails.push(email);
			draft.timeline.push(emailEvent(email));
		}

		// Fallback only when the email names no task id, known or not
		if (taskIds.size > 0) continue;

		for (const commitId of extractor.extractCommitRefs(email.body)) {
			for (const taskId of commitOwners.get(commitId) ?? []) {
				const draft = drafts.get(taskId);
				if (!draft || draft.emails.includes(email)) continue;
				draft.emails.push(email);
				draft.timeline.push(emailEvent(email));
			}
		}
	}

	// Phase 2: finalize
	return [...drafts.entries()].map(([taskId, draft]) => ({
		taskId,
		ticket: draft.ticket,
		commits: draft.commits,
		emails: draft.emails,
		timeline: sortTimeline(draft.timeline),
	}));
}
