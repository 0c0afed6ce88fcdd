/**
 * Tool definition and executor for the search_files tool.
 * Finds files by name pattern under an allowed directory.
 */

import { isBlockedPath, requireAllowedPath } from "../sandbox";
import { ToolError } from "./ToolError";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** Zod schema for search_files arguments. */
export const searchFilesArgsSchema = z.object({
	pattern: z.string().min(1).describe("Glob pattern for file names (e.g. '*.ts', 'config*')"),
	path: z.string().min(1).optional().describe("Directory to search in (defaults to the first allowed directory)"),
	max_results: z.number().int().min(1).max(10000).default(100).describe("Maximum number of files to return"),
});

export interface SearchFilesResult {
	pattern: string;
	path: string;
	files: Array<string>;
	count: number;
}

/**
 * Resolves an optional directory argument, falling back to the first allowed directory.
 */
export function defaultSearchRoot(deps: ToolDeps, path: string | undefined): string {
	const root = path ?? deps.settings.allowedPaths[0];
	if (root === undefined) {
		throw new ToolError("invalid_arguments", "No path given and no allowed directories configured");
	}
	return root;
}

/** Executes the search_files tool. Files under a blocked pattern are left out. */
export async function executeSearchFilesTool(
	deps: ToolDeps,
	args: z.infer<typeof searchFilesArgsSchema>,
): Promise<SearchFilesResult> {
	const path = await requireAllowedPath(defaultSearchRoot(deps, args.path), deps.settings);
	const result = await deps.runner.run(["find", path, "-name", args.pattern, "-type", "f"], { timeoutMs: 30_000 });

	// find exits non-zero on unreadable subdirectories but still lists what it could reach
	const files = result.stdout
		.split("\n")
		.filter(line => line.length > 0 && !isBlockedPath(line, deps.settings))
		.slice(0, args.max_results);
	return { pattern: args.pattern, path, files, count: files.length };
}

/** Returns the tool definition for search_files. */
export function createSearchFilesToolDefinition(): RegisteredTool {
	return defineTool({
		name: "search_files",
		description: "Find files by name pattern in an allowed directory.",
		schema: searchFilesArgsSchema,
		execute: executeSearchFilesTool,
	});
}
