/**
 * Programmatic API for repo-miner.
 *
 * @example
 * ```ts
 * import { fetchIssues, writeTable } from "repo-miner";
 *
 * const issues = await fetchIssues({ repo: "octocat/hello-world", state: "closed", max: 50 });
 * writeTable(issues, "issues.csv");
 * ```
 */
export type {
	CommitRecord,
	IssueRecord,
	IssueState,
	IssueStateFilter,
	RateLimitInfo,
	Table,
	UpstreamCommit,
	UpstreamIssue
} from "./types.js";
export { COMMIT_COLUMNS, ISSUE_COLUMNS, ISSUE_STATE_FILTERS } from "./types.js";

export type {
	ClientFactory,
	FetchLike,
	GitHubClientOptions,
	ListOptions,
	RepositoryClient
} from "./github-client.js";
export { GitHubClient } from "./github-client.js";

export {
	InvalidInputError,
	MissingCredentialError,
	RepoMinerError,
	UpstreamError
} from "./errors.js";
export { TOKEN_ENV_VAR, resolveToken } from "./credentials.js";

export type { FetchCommitsOptions } from "./commits.js";
export { fetchCommits } from "./commits.js";
export type { FetchIssuesOptions } from "./issues.js";
export { fetchIssues } from "./issues.js";
export { toCsv, writeTable } from "./csv-writer.js";
export { runCli } from "./cli.js";
