import { resolveToken } from "./credentials.js";
import { type ClientFactory, GitHubClient } from "./github-client.js";
import {
	assertIssueState,
	assertMaxCount,
	assertRepoId,
	formatTimestamp,
	wholeDaysBetween
} from "./normalize.js";
import {
	ISSUE_COLUMNS,
	type IssueRecord,
	type IssueStateFilter,
	type Table,
	type UpstreamIssue
} from "./types.js";

export interface FetchIssuesOptions {
	/** Repository in `owner/name` form */
	repo: string;
	/** Passed through to the API; defaults to "all" */
	state?: IssueStateFilter;
	/** Stop after this many issues (pull requests don't count) */
	max?: number;
	/** Access token; falls back to `GITHUB_TOKEN` in `env` */
	token?: string;
	env?: NodeJS.ProcessEnv;
	createClient?: ClientFactory;
	/** Called with the number of rows collected so far */
	onProgress?: (count: number) => void;
}

/** The issues endpoint returns pull requests too; they carry `pull_request` */
export function isPullRequest(item: UpstreamIssue): boolean {
	return item.pull_request !== undefined && item.pull_request !== null;
}

export function toIssueRecord(item: UpstreamIssue): IssueRecord {
	const createdAt = formatTimestamp(item.created_at);
	const closedAt = formatTimestamp(item.closed_at);
	return {
		id: item.id,
		number: item.number,
		title: item.title,
		user: item.user?.login ?? null,
		state: item.state,
		created_at: createdAt,
		closed_at: closedAt,
		comments: item.comments,
		open_duration_days: wholeDaysBetween(createdAt, closedAt)
	};
}

/**
 * Fetch issues for a repository, skipping pull requests. The cap counts
 * issues kept, so a run of pull requests never shortens the result.
 */
export async function fetchIssues(
	options: FetchIssuesOptions
): Promise<Table<IssueRecord>> {
	const { repo, state = "all", max, env, onProgress } = options;
	assertRepoId(repo);
	assertIssueState(state);
	assertMaxCount(max);

	const token = resolveToken(options.token, env);
	const rows: IssueRecord[] = [];
	if (max === 0) return { columns: ISSUE_COLUMNS, rows };

	const createClient =
		options.createClient ?? ((t: string) => new GitHubClient(t));
	const client = createClient(token);

	// Pull requests share the endpoint, so the cap says nothing about how many
	// items are needed: keep full pages
	for await (const item of client.listIssues(repo, state)) {
		if (isPullRequest(item)) continue;
		rows.push(toIssueRecord(item));
		onProgress?.(rows.length);
		if (max !== undefined && rows.length >= max) break;
	}

	return { columns: ISSUE_COLUMNS, rows };
}
