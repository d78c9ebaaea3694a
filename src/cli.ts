import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import ora from "ora";
import { fetchCommits } from "./commits.js";
import { TOKEN_ENV_VAR } from "./credentials.js";
import { writeTable } from "./csv-writer.js";
import {
	type ClientFactory,
	GitHubClient,
	type RepositoryClient
} from "./github-client.js";
import { fetchIssues } from "./issues.js";
import { ISSUE_STATE_FILTERS, type IssueStateFilter } from "./types.js";

export interface CliDeps {
	env?: NodeJS.ProcessEnv;
	createClient?: ClientFactory;
}

interface GlobalOptions {
	token?: string;
	quiet: boolean;
}

interface CommitsCommandOptions {
	repo: string;
	max?: number;
	out: string;
}

interface IssuesCommandOptions extends CommitsCommandOptions {
	state: IssueStateFilter;
}

function parseMaxCount(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Must be a non-negative integer.");
	}
	return parseInt(value, 10);
}

/**
 * Parse `argv` (without the node and script entries), run the selected
 * sub-command and resolve with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
	const env = deps.env ?? process.env;

	// Remember the client the fetcher created so we can report its rate limit
	const used: { client?: RepositoryClient } = {};
	const createClient: ClientFactory = (token) => {
		const client = deps.createClient
			? deps.createClient(token)
			: new GitHubClient(token);
		used.client = client;
		return client;
	};

	const program = new Command();

	program
		.name("repo-miner")
		.description(
			"Fetch commit and issue metadata for a GitHub repository and save it as CSV.\n" +
				`Authenticates with --token or the ${TOKEN_ENV_VAR} environment variable.`
		)
		.version("1.0.0")
		.option("-t, --token <pat>", `GitHub Personal Access Token (default: $${TOKEN_ENV_VAR})`)
		.option("-q, --quiet", "Hide the progress spinner", false)
		.exitOverride();

	const spinnerFor = (text: string) =>
		ora({ text, isSilent: program.opts<GlobalOptions>().quiet }).start();

	program
		.command("fetch-commits")
		.description("Fetch commits and save to CSV")
		.requiredOption("--repo <owner/name>", "Repository in owner/repo format")
		.option("--max <n>", "Max number of commits to fetch", parseMaxCount)
		.requiredOption("--out <path>", "Path to output commits CSV")
		.action(async (opts: CommitsCommandOptions) => {
			const spinner = spinnerFor(`Fetching commits from ${opts.repo}…`);
			try {
				const table = await fetchCommits({
					repo: opts.repo,
					max: opts.max,
					token: program.opts<GlobalOptions>().token,
					env,
					createClient,
					onProgress: (count) => {
						spinner.text = `Fetching commits from ${opts.repo} — ${count} so far…`;
					}
				});
				writeTable(table, opts.out);
				spinner.stop();
				console.log(
					`${chalk.green("✓")} Saved ${table.rows.length} commits to ${opts.out}`
				);
			} catch (err) {
				spinner.fail(`Fetching commits from ${opts.repo} failed`);
				throw err;
			}
			if (!program.opts<GlobalOptions>().quiet) reportRateLimit(used.client);
		});

	program
		.command("fetch-issues")
		.description("Fetch issues (excluding pull requests) and save to CSV")
		.requiredOption("--repo <owner/name>", "Repository in owner/repo format")
		.addOption(
			new Option("--state <state>", "Issue state to fetch")
				.choices(ISSUE_STATE_FILTERS)
				.default("all")
		)
		.option("--max <n>", "Max number of issues to fetch", parseMaxCount)
		.requiredOption("--out <path>", "Path to output issues CSV")
		.action(async (opts: IssuesCommandOptions) => {
			const spinner = spinnerFor(`Fetching ${opts.state} issues from ${opts.repo}…`);
			try {
				const table = await fetchIssues({
					repo: opts.repo,
					state: opts.state,
					max: opts.max,
					token: program.opts<GlobalOptions>().token,
					env,
					createClient,
					onProgress: (count) => {
						spinner.text = `Fetching ${opts.state} issues from ${opts.repo} — ${count} so far…`;
					}
				});
				writeTable(table, opts.out);
				spinner.stop();
				console.log(
					`${chalk.green("✓")} Saved ${table.rows.length} issues to ${opts.out}`
				);
			} catch (err) {
				spinner.fail(`Fetching issues from ${opts.repo} failed`);
				throw err;
			}
			if (!program.opts<GlobalOptions>().quiet) reportRateLimit(used.client);
		});

	try {
		await program.parseAsync(argv, { from: "user" });
		return 0;
	} catch (err) {
		// Commander has already printed usage errors, help and the version
		if (err instanceof CommanderError) return err.exitCode;
		const message = err instanceof Error ? err.message : String(err);
		console.error(chalk.red(`Error: ${message}`));
		return 1;
	}
}

/** Goes to stderr so stdout carries only the one-line summary */
function reportRateLimit(client: RepositoryClient | undefined): void {
	if (!(client instanceof GitHubClient)) return;
	const rl = client.getRateLimitInfo();
	console.error(
		chalk.gray(
			`  Rate limit: ${rl.availableForTool} / ${rl.limit - rl.reserved} req remaining (${rl.reserved} reserved)`
		)
	);
}
