import { fetchCommits, toCommitRecord } from "../commits.js";
import { InvalidInputError, MissingCredentialError, UpstreamError } from "../errors.js";
import type { RepositoryClient } from "../github-client.js";
import { COMMIT_COLUMNS } from "../types.js";
import { FakeRepositoryClient, makeCommit } from "./fake-client.js";

const env = { GITHUB_TOKEN: "test-token" };

const author = (name: string, date = "2025-09-25T12:30:45Z") => ({
	name,
	email: `${name.toLowerCase()}@example.com`,
	date
});

describe("fetchCommits", () => {
	it("returns one row per commit with the fixed columns", async () => {
		const client = new FakeRepositoryClient([
			makeCommit("sha1", author("Alice"), "Initial commit\nDetails"),
			makeCommit("sha2", author("Bob", "2025-09-24T08:00:00+02:00"), "Bug fix")
		]);

		const table = await fetchCommits({
			repo: "any/repo",
			env,
			createClient: () => client
		});

		expect(table.columns).toEqual(["sha", "author", "email", "date", "message"]);
		expect(table.rows).toEqual([
			{
				sha: "sha1",
				author: "Alice",
				email: "alice@example.com",
				date: "2025-09-25T12:30:45Z",
				message: "Initial commit"
			},
			{
				sha: "sha2",
				author: "Bob",
				email: "bob@example.com",
				date: "2025-09-24T08:00:00+02:00",
				message: "Bug fix"
			}
		]);
	});

	it("caps the row count and stops pulling from the source", async () => {
		const commits = Array.from({ length: 22 }, (_, i) =>
			makeCommit(`sha${i}`, author(`Author${i}`), `Commit ${i}`)
		);
		const client = new FakeRepositoryClient(commits);

		const table = await fetchCommits({
			repo: "any/repo",
			max: 10,
			env,
			createClient: () => client
		});

		expect(table.rows).toHaveLength(10);
		expect(table.rows.map((r) => r.sha)).toEqual(
			commits.slice(0, 10).map((c) => c.sha)
		);
		expect(table.columns).toEqual(COMMIT_COLUMNS);
		expect(client.pulled).toBe(10);
		expect(client.calls[0]?.options).toEqual({ perPage: 10 });
	});

	it("returns everything when the cap exceeds what is available", async () => {
		const client = new FakeRepositoryClient([
			makeCommit("a", author("A"), "one"),
			makeCommit("b", author("B"), "two")
		]);
		const table = await fetchCommits({
			repo: "any/repo",
			max: 5,
			env,
			createClient: () => client
		});
		expect(table.rows).toHaveLength(2);
	});

	it("yields an empty table with the header columns for an empty repository", async () => {
		const table = await fetchCommits({
			repo: "any/repo",
			env,
			createClient: () => new FakeRepositoryClient([])
		});
		expect(table.rows).toEqual([]);
		expect(table.columns).toEqual(["sha", "author", "email", "date", "message"]);
	});

	it("does not contact the source when max is zero", async () => {
		const createClient = jest.fn(() => new FakeRepositoryClient([]));
		const table = await fetchCommits({
			repo: "any/repo",
			max: 0,
			env,
			createClient
		});
		expect(table.rows).toEqual([]);
		expect(createClient).not.toHaveBeenCalled();
	});

	it("fails with MissingCredentialError before creating a client", async () => {
		const createClient = jest.fn(() => new FakeRepositoryClient([]));
		await expect(
			fetchCommits({ repo: "any/repo", env: {}, createClient })
		).rejects.toBeInstanceOf(MissingCredentialError);
		expect(createClient).not.toHaveBeenCalled();
	});

	it("prefers an explicit token over the environment", async () => {
		const createClient = jest.fn(() => new FakeRepositoryClient([]));
		await fetchCommits({
			repo: "any/repo",
			token: "explicit-token",
			env,
			createClient
		});
		expect(createClient).toHaveBeenCalledWith("explicit-token");
	});

	it("rejects malformed repository ids and caps", async () => {
		const createClient = jest.fn(() => new FakeRepositoryClient([]));
		await expect(
			fetchCommits({ repo: "", env, createClient })
		).rejects.toBeInstanceOf(InvalidInputError);
		await expect(
			fetchCommits({ repo: "just-a-name", env, createClient })
		).rejects.toBeInstanceOf(InvalidInputError);
		await expect(
			fetchCommits({ repo: "any/repo", max: -1, env, createClient })
		).rejects.toBeInstanceOf(InvalidInputError);
		await expect(
			fetchCommits({ repo: "any/repo", max: 2.5, env, createClient })
		).rejects.toBeInstanceOf(InvalidInputError);
		expect(createClient).not.toHaveBeenCalled();
	});

	it("propagates upstream failures unchanged", async () => {
		const failure = new UpstreamError("Not Found", 404);
		const client: RepositoryClient = {
			listCommits: () => ({
				[Symbol.asyncIterator]: () => ({
					next: () => Promise.reject(failure)
				})
			}),
			listIssues: () => new FakeRepositoryClient().listIssues("x/y", "all")
		};

		await expect(
			fetchCommits({ repo: "any/repo", env, createClient: () => client })
		).rejects.toBe(failure);
	});

	it("reports progress as rows are collected", async () => {
		const seen: number[] = [];
		await fetchCommits({
			repo: "any/repo",
			env,
			createClient: () =>
				new FakeRepositoryClient([
					makeCommit("a", author("A"), "one"),
					makeCommit("b", author("B"), "two")
				]),
			onProgress: (count) => seen.push(count)
		});
		expect(seen).toEqual([1, 2]);
	});
});

describe("toCommitRecord", () => {
	it("nulls author, email and date together when authorship is missing", () => {
		expect(toCommitRecord(makeCommit("sha9", null, "Orphan"))).toEqual({
			sha: "sha9",
			author: null,
			email: null,
			date: null,
			message: "Orphan"
		});
	});

	it("uses an empty string for a missing or empty message", () => {
		expect(toCommitRecord(makeCommit("s", author("A"), null)).message).toBe("");
		expect(toCommitRecord(makeCommit("s", author("A"), "")).message).toBe("");
	});

	it("keeps only the first line whatever the line ending", () => {
		const messages = [
			"Fix parser\r\n\r\nLonger body",
			"Fix parser\rold mac ending",
			"Fix parser separator"
		];
		for (const message of messages) {
			expect(toCommitRecord(makeCommit("s", author("A"), message)).message).toBe(
				"Fix parser"
			);
		}
	});

	it("keeps a naive timestamp exactly as given", () => {
		const record = toCommitRecord(
			makeCommit("s", author("A", "2025-09-25T12:30:45"), "x")
		);
		expect(record.date).toBe("2025-09-25T12:30:45");
	});
});
