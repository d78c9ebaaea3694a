import { resolveToken } from "./credentials.js";
import { type ClientFactory, GitHubClient } from "./github-client.js";
import { assertMaxCount, assertRepoId, firstLine, formatTimestamp } from "./normalize.js";
import {
	COMMIT_COLUMNS,
	type CommitRecord,
	type Table,
	type UpstreamCommit
} from "./types.js";

export interface FetchCommitsOptions {
	/** Repository in `owner/name` form */
	repo: string;
	/** Stop after this many commits; all commits when omitted */
	max?: number;
	/** Access token; falls back to `GITHUB_TOKEN` in `env` */
	token?: string;
	env?: NodeJS.ProcessEnv;
	createClient?: ClientFactory;
	/** Called with the number of rows collected so far */
	onProgress?: (count: number) => void;
}

export function toCommitRecord(item: UpstreamCommit): CommitRecord {
	const author = item.commit.author;
	return {
		sha: item.sha,
		author: author ? (author.name ?? null) : null,
		email: author ? (author.email ?? null) : null,
		date: author ? formatTimestamp(author.date) : null,
		message: firstLine(item.commit.message)
	};
}

/**
 * Fetch up to `max` commits (newest first) and return them as a table with
 * the columns sha, author, email, date, message.
 */
export async function fetchCommits(
	options: FetchCommitsOptions
): Promise<Table<CommitRecord>> {
	const { repo, max, env, onProgress } = options;
	assertRepoId(repo);
	assertMaxCount(max);

	const token = resolveToken(options.token, env);
	const rows: CommitRecord[] = [];
	if (max === 0) return { columns: COMMIT_COLUMNS, rows };

	const createClient =
		options.createClient ?? ((t: string) => new GitHubClient(t));
	const client = createClient(token);

	for await (const item of client.listCommits(repo, { perPage: max })) {
		rows.push(toCommitRecord(item));
		onProgress?.(rows.length);
		if (max !== undefined && rows.length >= max) break;
	}

	return { columns: COMMIT_COLUMNS, rows };
}
