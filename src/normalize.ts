import { InvalidInputError, UpstreamError } from "./errors.js";
import { ISSUE_STATE_FILTERS, type IssueStateFilter } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Every separator a "split lines" pass treats as a line boundary */
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

/** Zone designator at the end of an ISO-8601 date-time */
const ZONE_SUFFIX = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

const REPO_ID = /^[^/\s]+\/[^/\s]+$/;

/** Upper bound GitHub accepts for `per_page` */
export const MAX_PAGE_SIZE = 100;

export function firstLine(message: string | null | undefined): string {
	if (!message) return "";
	return message.split(LINE_BREAK, 1)[0] ?? "";
}

/**
 * Timestamps are kept exactly as the API sent them: no zone conversion and
 * no reformatting. Empty values become `null`.
 */
export function formatTimestamp(value: string | null | undefined): string | null {
	return value ? value : null;
}

function toEpochMs(value: string): number {
	// Naive date-times are read as UTC so a pair never straddles a DST change
	const zoned = value.includes("T") && !ZONE_SUFFIX.test(value) ? `${value}Z` : value;
	return Date.parse(zoned);
}

/**
 * Whole days from `start` to `end`, floored (23h → 0, 5d 3h → 5).
 * Returns `null` when either side is missing; a value that is not a
 * timestamp is an `UpstreamError`.
 */
export function wholeDaysBetween(
	start: string | null,
	end: string | null
): number | null {
	if (!start || !end) return null;
	const from = toEpochMs(start);
	const to = toEpochMs(end);
	for (const [value, ms] of [[start, from], [end, to]] as const) {
		if (Number.isNaN(ms)) {
			throw new UpstreamError(`Unreadable timestamp in upstream data: "${value}"`);
		}
	}
	return Math.floor((to - from) / MS_PER_DAY);
}

// ---------------------------------------------------------------------------
// Input checks shared by the fetchers
// ---------------------------------------------------------------------------

export function assertRepoId(repo: string): void {
	if (!REPO_ID.test(repo)) {
		throw new InvalidInputError(
			`Repository must be in owner/name form (got "${repo}")`
		);
	}
}

export function assertMaxCount(max: number | undefined): void {
	if (max === undefined) return;
	if (!Number.isInteger(max) || max < 0) {
		throw new InvalidInputError(
			`Maximum count must be a non-negative integer (got ${max})`
		);
	}
}

export function isIssueStateFilter(value: string): value is IssueStateFilter {
	return ISSUE_STATE_FILTERS.some((state) => state === value);
}

export function assertIssueState(state: string): asserts state is IssueStateFilter {
	if (!isIssueStateFilter(state)) {
		throw new InvalidInputError(
			`State must be one of ${ISSUE_STATE_FILTERS.join(", ")} (got "${state}")`
		);
	}
}
