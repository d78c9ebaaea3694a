export type IssueState = "open" | "closed";

/** State filter accepted by the issues endpoint */
export type IssueStateFilter = IssueState | "all";

export const ISSUE_STATE_FILTERS: readonly IssueStateFilter[] = [
	"all",
	"open",
	"closed"
];

// ---------------------------------------------------------------------------
// Upstream payloads (subset of the GitHub REST responses we read)
// ---------------------------------------------------------------------------

export interface UpstreamCommitAuthor {
	name?: string | null;
	email?: string | null;
	date?: string | null;
}

export interface UpstreamCommit {
	sha: string;
	commit: {
		author: UpstreamCommitAuthor | null;
		message?: string | null;
	};
}

export interface UpstreamIssue {
	id: number;
	number: number;
	title: string;
	user: { login: string } | null;
	state: IssueState;
	created_at?: string | null;
	closed_at?: string | null;
	comments: number;
	/** Present on items that are really pull requests */
	pull_request?: Record<string, unknown> | null;
}

// ---------------------------------------------------------------------------
// Normalized rows
// ---------------------------------------------------------------------------

export interface CommitRecord {
	sha: string;
	author: string | null;
	email: string | null;
	/** Commit author date as returned upstream (ISO-8601) */
	date: string | null;
	/** First line of the commit message, never containing a line break */
	message: string;
}

export interface IssueRecord {
	id: number;
	number: number;
	title: string;
	user: string | null;
	state: IssueState;
	created_at: string | null;
	closed_at: string | null;
	comments: number;
	/** Whole days between creation and closure, floored */
	open_duration_days: number | null;
}

export interface Table<Row> {
	columns: ReadonlyArray<keyof Row & string>;
	rows: Row[];
}

export const COMMIT_COLUMNS = [
	"sha",
	"author",
	"email",
	"date",
	"message"
] as const satisfies ReadonlyArray<keyof CommitRecord>;

export const ISSUE_COLUMNS = [
	"id",
	"number",
	"title",
	"user",
	"state",
	"created_at",
	"closed_at",
	"comments",
	"open_duration_days"
] as const satisfies ReadonlyArray<keyof IssueRecord>;

export interface RateLimitInfo {
	/** Total requests allowed per hour (from x-ratelimit-limit header) */
	limit: number;
	/** Requests still available according to GitHub */
	remaining: number;
	/** Requests this tool keeps reserved and won't consume */
	reserved: number;
	/** Requests available for the tool to use (remaining - reserved) */
	availableForTool: number;
	/** Unix timestamp when the rate limit window resets */
	reset: number;
}
