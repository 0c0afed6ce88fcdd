/**
 * Tool definition and executor for the grep tool.
 * Searches file contents recursively and parses `file:line:text` output.
 */

import { isBlockedPath, requireAllowedPath } from "../sandbox";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** Zod schema for grep arguments. */
export const grepArgsSchema = z.object({
	pattern: z.string().min(1).describe("Extended regex pattern to search for"),
	path: z.string().min(1).describe("Directory or file to search"),
	file_pattern: z.string().min(1).optional().describe("File glob to include (e.g. '*.ts')"),
	max_results: z.number().int().min(1).max(10000).default(50).describe("Maximum number of matches"),
});

export interface GrepMatch {
	file: string;
	line: number;
	content: string;
}

export interface GrepResult {
	pattern: string;
	path: string;
	file_pattern: string | null;
	matches: Array<GrepMatch>;
	count: number;
}

/**
 * Splits one `grep -n` output line on its first two colons.
 * A line number that is not an integer becomes 0.
 */
export function parseGrepLine(line: string): GrepMatch | undefined {
	const first = line.indexOf(":");
	if (first < 0) {
		return;
	}
	const second = line.indexOf(":", first + 1);
	if (second < 0) {
		return;
	}
	const lineText = line.slice(first + 1, second);
	return {
		file: line.slice(0, first),
		line: /^\d+$/.test(lineText) ? Number.parseInt(lineText, 10) : 0,
		content: line.slice(second + 1),
	};
}

/** Executes the grep tool. Matches in files under a blocked pattern are dropped. */
export async function executeGrepTool(deps: ToolDeps, args: z.infer<typeof grepArgsSchema>): Promise<GrepResult> {
	const path = await requireAllowedPath(args.path, deps.settings);
	const command = ["grep", "-rn"];
	if (args.file_pattern) {
		command.push(`--include=${args.file_pattern}`);
	}
	command.push("-E", "-e", args.pattern, "--", path);

	// Exit code 1 means no match; the output is parsed either way
	const result = await deps.runner.run(command, { timeoutMs: 60_000 });
	const matches: Array<GrepMatch> = [];
	for (const line of result.stdout.split("\n")) {
		if (matches.length >= args.max_results) {
			break;
		}
		const match = parseGrepLine(line);
		if (match && !isBlockedPath(match.file, deps.settings)) {
			matches.push(match);
		}
	}

	return {
		pattern: args.pattern,
		path,
		file_pattern: args.file_pattern ?? null,
		matches,
		count: matches.length,
	};
}

/** Returns the tool definition for grep. */
export function createGrepToolDefinition(): RegisteredTool {
	return defineTool({
		name: "grep",
		description: "Search file contents with a regex pattern in an allowed directory.",
		schema: grepArgsSchema,
		execute: executeGrepTool,
	});
}
