// ── Source Records ───────────────────────────────────────

export interface JiraTicket {
	readonly id: string;
	readonly summary: string;
	readonly status: string;
	readonly assignee?: string;
	readonly createdAt: Date;
	readonly updatedAt: Date;
	/** Free-text resolution note, e.g. "Resolved by bob: cache invalidated". */
	readonly resolution?: string;
}

export interface GitCommit {
	readonly commitId: string;
	readonly author: string;
	/** Ticket id the commit was made against, when the author recorded one. */
	readonly ticket?: string;
	readonly message: string;
	readonly timestamp: Date;
}

export interface EmailMessage {
	readonly threadId: string;
	readonly sender: string;
	readonly recipients: readonly string[];
	readonly subject: string;
	readonly body: string;
	readonly timestamp: Date;
}

/** One batch of records, as loaded from a single JSON snapshot. */
export interface Snapshot {
	tickets: JiraTicket[];
	commits: GitCommit[];
	emails: EmailMessage[];
}

// ── Timelines ────────────────────────────────────────────

interface TimelineEventBase {
	/** Id of the originating record (ticket id, commit id or thread id). */
	id: string;
	timestamp: Date;
}

export type TaskTimelineEvent =
	| (TimelineEventBase & { type: "ticket"; record: JiraTicket })
	| (TimelineEventBase & { type: "commit"; record: GitCommit })
	| (TimelineEventBase & { type: "email"; record: EmailMessage });

export type EmployeeTimelineEvent =
	| (TimelineEventBase & { type: "ticket-assigned" | "ticket-resolved"; record: JiraTicket })
	| (TimelineEventBase & { type: "commit"; record: GitCommit })
	| (TimelineEventBase & { type: "email-sent" | "email-received"; record: EmailMessage });

// ── Clusters ─────────────────────────────────────────────

/**
 * All records that belong to one task, seeded by its ticket.
 *
 * Produced by `correlateTasks()` in `src/analyze/task-clusters.ts`.
 */
export interface TaskCluster {
	taskId: string;
	ticket: JiraTicket;
	commits: GitCommit[];
	emails: EmailMessage[];
	timeline: TaskTimelineEvent[];
}

export interface ActivitySummary {
	assigned: number;
	resolved: number;
	commits: number;
	sent: number;
	received: number;
	/** Sum of the five counts above. */
	total: number;
}

/**
 * Everything one person touched across the three sources.
 *
 * Produced by `correlateEmployees()` in `src/analyze/employee-clusters.ts`.
 */
export interface EmployeeCluster {
	employee: string;
	summary: ActivitySummary;
	assigned: JiraTicket[];
	resolved: JiraTicket[];
	commits: GitCommit[];
	sent: EmailMessage[];
	received: EmailMessage[];
	timeline: EmployeeTimelineEvent[];
}

// ── Analytics ────────────────────────────────────────────

export type ActivityTotals = Omit<ActivitySummary, "total">;

/** Heuristic role tags. Lists overlap freely and are not authoritative. */
export interface RoleCandidates {
	developers: string[];
	communicators: string[];
	managers: string[];
}

export interface TeamAnalysis {
	totalEmployees: number;
	totals: ActivityTotals;
	roles: RoleCandidates;
	topCodeContributors: string[];
	topIssueResolvers: string[];
}

export interface Collaborator {
	colleague: string;
	strength: number;
}

export interface CollaborationNetwork {
	employee: string;
	totalCollaborations: number;
	collaborators: Collaborator[];
}

export interface SkillTag {
	skill: string;
	mentions: number;
}

export interface EmployeeReport {
	clusters: EmployeeCluster[];
	analysis: TeamAnalysis;
	collaboration: CollaborationNetwork[];
	skills: Record<string, SkillTag[]>;
}

// ── Retrieval ────────────────────────────────────────────

export type ClusterKind = "task" | "employee";

export interface ActivityChunk {
	/** `<kind>:<key>:<n>`, stable for an unchanged snapshot. */
	id: string;
	kind: ClusterKind;
	/** Task id or employee name of the source cluster. */
	key: string;
	text: string;
}

export interface EmbeddedChunk extends ActivityChunk {
	embedding: number[];
}
