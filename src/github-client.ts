import { UpstreamError } from "./errors.js";
import { MAX_PAGE_SIZE } from "./normalize.js";
import type {
	IssueStateFilter,
	RateLimitInfo,
	UpstreamCommit,
	UpstreamIssue
} from "./types.js";

const GH_REST = "https://api.github.com";

/** Number of requests always kept in reserve so the user still has a buffer after the run */
const RATE_LIMIT_RESERVE = 100;

export interface ListOptions {
	/** Page size hint; clamped to 1..100 */
	perPage?: number;
}

/**
 * Read-only view of a hosted repository. Sequences are lazy: a page is only
 * requested once the consumer iterates past the previous one.
 */
export interface RepositoryClient {
	listCommits(repo: string, options?: ListOptions): AsyncIterable<UpstreamCommit>;
	listIssues(
		repo: string,
		state: IssueStateFilter,
		options?: ListOptions
	): AsyncIterable<UpstreamIssue>;
}

export type ClientFactory = (token: string) => RepositoryClient;

export type FetchLike = (
	url: string,
	init: { headers: Record<string, string> }
) => Promise<Response>;

export interface GitHubClientOptions {
	baseUrl?: string;
	fetch?: FetchLike;
	userAgent?: string;
}

export class GitHubClient implements RepositoryClient {
	private token: string;
	private baseUrl: string;
	private fetchImpl: FetchLike;
	private userAgent: string;
	private rateLimitTotal = 5000;
	private rateLimitRemaining = 5000;
	private rateLimitReset = 0;

	constructor(token: string, options: GitHubClientOptions = {}) {
		this.token = token;
		this.baseUrl = options.baseUrl ?? GH_REST;
		this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
		this.userAgent = options.userAgent ?? "repo-miner-cli/1.0";
	}

	private headers(): Record<string, string> {
		return {
			Authorization: `Bearer ${this.token}`,
			"User-Agent": this.userAgent,
			Accept: "application/vnd.github+json",
			"X-GitHub-Api-Version": "2022-11-28"
		};
	}

	private updateRateLimitFromHeaders(headers: Headers): void {
		const limit = headers.get("x-ratelimit-limit");
		const remaining = headers.get("x-ratelimit-remaining");
		const reset = headers.get("x-ratelimit-reset");
		if (limit !== null) this.rateLimitTotal = parseInt(limit, 10);
		if (remaining !== null) this.rateLimitRemaining = parseInt(remaining, 10);
		if (reset !== null) this.rateLimitReset = parseInt(reset, 10);
	}

	/** Wait if remaining requests would dip into the reserve */
	private async throttle(): Promise<void> {
		if (this.rateLimitRemaining <= RATE_LIMIT_RESERVE) {
			const now = Math.floor(Date.now() / 1000);
			const waitSeconds = Math.max(this.rateLimitReset - now + 5, 5);
			const resetAt = new Date(this.rateLimitReset * 1000).toLocaleTimeString();
			process.stderr.write(
				`\nRate limit reserve reached (${this.rateLimitRemaining} remaining, ${RATE_LIMIT_RESERVE} reserved). ` +
					`Waiting ${waitSeconds}s until reset at ${resetAt}...\n`
			);
			await sleep(waitSeconds * 1000);
		}
	}

	getRateLimitInfo(): RateLimitInfo {
		return {
			limit: this.rateLimitTotal,
			remaining: this.rateLimitRemaining,
			reserved: RATE_LIMIT_RESERVE,
			availableForTool: Math.max(
				0,
				this.rateLimitRemaining - RATE_LIMIT_RESERVE
			),
			reset: this.rateLimitReset
		};
	}

	// ---------------------------------------------------------------------------
	// REST request with rate-limit bookkeeping
	// ---------------------------------------------------------------------------

	private async request<T>(path: string, retried = false): Promise<T> {
		await this.throttle();
		const url = `${this.baseUrl}${path}`;

		let res: Response;
		try {
			res = await this.fetchImpl(url, { headers: this.headers() });
		} catch (err) {
			throw new UpstreamError(
				`Request to ${url} failed: ${String(err)}`,
				undefined,
				{ cause: err }
			);
		}
		this.updateRateLimitFromHeaders(res.headers);

		if (!res.ok) {
			const retryAfter = res.headers.get("retry-after");
			const secondaryLimit =
				res.status === 429 || (res.status === 403 && retryAfter !== null);
			if (secondaryLimit && !retried) {
				// Secondary rate limit — wait and retry once
				const waitSeconds = retryAfterSeconds(retryAfter);
				process.stderr.write(
					`\nSecondary rate limit hit. Waiting ${waitSeconds}s...\n`
				);
				await sleep(waitSeconds * 1000);
				return this.request<T>(path, true);
			}
			throw new UpstreamError(
				`GitHub request failed (${res.status}) for ${path}: ${await errorMessage(res)}`,
				res.status
			);
		}

		try {
			return (await res.json()) as T;
		} catch (err) {
			throw new UpstreamError(
				`Unreadable response (${res.status}) for ${path}: ${String(err)}`,
				res.status,
				{ cause: err }
			);
		}
	}

	/** Page-number pagination; a short page is the last one */
	private async *paginate<T>(
		path: string,
		params: Record<string, string>,
		perPage: number
	): AsyncGenerator<T> {
		let page = 1;

		while (true) {
			const query = new URLSearchParams({
				...params,
				per_page: String(perPage),
				page: String(page)
			});
			const pagePath = `${path}?${query.toString()}`;
			const items = await this.request<unknown>(pagePath);
			if (!Array.isArray(items)) {
				throw new UpstreamError(`Expected a list in the response for ${pagePath}`);
			}
			yield* items;

			if (items.length < perPage) break;
			page++;
		}
	}

	// ---------------------------------------------------------------------------
	// Commits on the default branch, newest first
	// ---------------------------------------------------------------------------

	listCommits(repo: string, options: ListOptions = {}): AsyncIterable<UpstreamCommit> {
		return this.paginate<UpstreamCommit>(
			`/repos/${repoPath(repo)}/commits`,
			{},
			clampPageSize(options.perPage)
		);
	}

	// ---------------------------------------------------------------------------
	// Issues (the endpoint also returns pull requests; callers filter them)
	// ---------------------------------------------------------------------------

	listIssues(
		repo: string,
		state: IssueStateFilter,
		options: ListOptions = {}
	): AsyncIterable<UpstreamIssue> {
		return this.paginate<UpstreamIssue>(
			`/repos/${repoPath(repo)}/issues`,
			{ state },
			clampPageSize(options.perPage)
		);
	}
}

function repoPath(repo: string): string {
	return repo.split("/").map(encodeURIComponent).join("/");
}

function clampPageSize(perPage: number | undefined): number {
	if (perPage === undefined || !Number.isFinite(perPage)) return MAX_PAGE_SIZE;
	return Math.min(Math.max(Math.floor(perPage), 1), MAX_PAGE_SIZE);
}

/** `retry-after` is either delay-seconds or an HTTP date; 60s when unreadable */
function retryAfterSeconds(value: string | null): number {
	if (value === null || value.trim() === "") return 60;
	const seconds = Number(value);
	if (Number.isFinite(seconds) && seconds >= 0) return Math.ceil(seconds);
	const until = Date.parse(value);
	if (Number.isNaN(until)) return 60;
	return Math.max(Math.ceil((until - Date.now()) / 1000), 0);
}

async function errorMessage(res: Response): Promise<string> {
	let text: string;
	try {
		text = await res.text();
	} catch {
		return res.statusText;
	}
	try {
		const json = JSON.parse(text) as { message?: unknown };
		if (typeof json.message === "string") return json.message;
		return text;
	} catch {
		return text || res.statusText;
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
