/**
 * Tool definition and executor for the git tool.
 * Runs a small set of git subcommands inside a configured repository checkout.
 */

import { requireRepoPath } from "../sandbox";
import { ToolError } from "./ToolError";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

export const ALLOWED_GIT_SUBCOMMANDS = ["status", "log", "diff", "pull", "branch", "fetch"] as const;

type GitSubcommand = (typeof ALLOWED_GIT_SUBCOMMANDS)[number];

/**
 * The only options each subcommand accepts, matched exactly. Git also takes abbreviated long
 * options, so anything not listed here is refused.
 */
const GIT_OPTIONS: Record<GitSubcommand, ReadonlySet<string>> = {
	status: new Set(["-s", "--short", "-b", "--branch", "--porcelain"]),
	log: new Set(),
	diff: new Set(),
	pull: new Set(["--ff-only", "--rebase", "--no-rebase", "--prune", "-v"]),
	branch: new Set(["-a", "--all", "-r", "--remotes", "-v", "-vv", "--list"]),
	fetch: new Set(["--all", "--prune", "-p", "--tags", "--dry-run", "-v"]),
};

/** Remote and branch names. No leading dot or slash, so no path can name a local remote. */
const GIT_NAME = /^[A-Za-z0-9_][\w./-]*$/;

/** Zod schema for git arguments. */
export const gitArgsSchema = z.object({
	repo: z.string().describe("Repository name"),
	command: z.string().min(1).describe("Git command: status, log, diff, pull, branch or fetch"),
});

export interface GitResult {
	repo: string;
	command: string;
	success: boolean;
	output: string;
}

function isAllowedSubcommand(word: string): word is GitSubcommand {
	return ALLOWED_GIT_SUBCOMMANDS.some(subcommand => subcommand === word);
}

/**
 * Turns the command text into git arguments. `log` and `diff` expand to fixed forms;
 * the other subcommands keep their extra words.
 * @throws ToolError for a subcommand outside the allowlist, an unlisted option or a malformed name
 */
export function buildGitArguments(command: string): Array<string> {
	const [subcommand = "", ...rest] = command.trim().split(/\s+/);
	if (!isAllowedSubcommand(subcommand)) {
		throw new ToolError("invalid_arguments", `Command not allowed. Allowed: ${ALLOWED_GIT_SUBCOMMANDS.join(", ")}`);
	}
	if (subcommand === "log") {
		return ["log", "--oneline", "-20"];
	}
	if (subcommand === "diff") {
		return ["diff", "HEAD~1"];
	}
	const options = GIT_OPTIONS[subcommand];
	for (const word of rest) {
		if (word.startsWith("-")) {
			if (!options.has(word)) {
				throw new ToolError("access_denied", `Option not allowed: ${word}`);
			}
		} else if (!GIT_NAME.test(word) || word.split("/").includes("..")) {
			throw new ToolError("access_denied", `Argument not allowed: ${word}`);
		}
	}
	return [subcommand, ...rest];
}

/** Executes the git tool. */
export async function executeGitTool(deps: ToolDeps, args: z.infer<typeof gitArgsSchema>): Promise<GitResult> {
	const repoPath = requireRepoPath(args.repo, deps.settings);
	const gitArgs = buildGitArguments(args.command);
	const result = await deps.runner.run(["git", ...gitArgs], { cwd: repoPath, timeoutMs: 60_000 });
	return {
		repo: args.repo,
		command: args.command,
		success: result.success,
		output: result.stdout + result.stderr,
	};
}

/** Returns the tool definition for git. */
export function createGitToolDefinition(): RegisteredTool {
	return defineTool({
		name: "git",
		description: "Run a git command (status, log, diff, pull, branch, fetch) in a repository.",
		schema: gitArgsSchema,
		execute: executeGitTool,
	});
}
