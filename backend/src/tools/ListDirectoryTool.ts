/**
 * Tool definition and executor for the list_directory tool.
 */

import { requireAllowedPath } from "../sandbox";
import { hasErrorCode } from "./FileSystemErrors";
import { ToolError } from "./ToolError";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

export const RECURSIVE_LISTING_LIMIT = 500;

/** Zod schema for list_directory arguments. */
export const listDirectoryArgsSchema = z.object({
	path: z.string().min(1).describe("Directory path"),
	recursive: z.boolean().default(false).describe("List recursively"),
	max_depth: z.number().int().min(1).max(10).default(2).describe("Max depth when recursive"),
});

export interface DirectoryEntry {
	name: string;
	type: "dir" | "file";
	size: number;
	path: string;
}

export interface ListDirectoryResult {
	path: string;
	items: Array<string> | Array<DirectoryEntry>;
	count: number;
}

async function describeEntry(directory: string, name: string): Promise<DirectoryEntry> {
	const path = join(directory, name);
	try {
		const stats = await stat(path);
		return stats.isDirectory() ? { name, type: "dir", size: 0, path } : { name, type: "file", size: stats.size, path };
	} catch (error) {
		// A dangling symlink is listed as an empty file
		if (hasErrorCode(error, "ENOENT", "ELOOP")) {
			return { name, type: "file", size: 0, path };
		}
		throw error;
	}
}

/** Executes the list_directory tool. */
export async function executeListDirectoryTool(
	deps: ToolDeps,
	args: z.infer<typeof listDirectoryArgsSchema>,
): Promise<ListDirectoryResult> {
	const path = await requireAllowedPath(args.path, deps.settings);

	const stats = await stat(path).catch((error: unknown) => {
		if (hasErrorCode(error, "ENOENT", "ENOTDIR")) {
			throw new ToolError("not_found", `Directory not found: ${path}`);
		}
		throw error;
	});
	if (!stats.isDirectory()) {
		throw new ToolError("invalid_arguments", `Not a directory: ${path}`);
	}

	if (args.recursive) {
		const result = await deps.runner.run(
			["find", path, "-maxdepth", String(args.max_depth), "(", "-type", "f", "-o", "-type", "d", ")"],
			{ timeoutMs: 30_000 },
		);
		const items = result.stdout
			.split("\n")
			.filter(line => line.length > 0)
			.slice(0, RECURSIVE_LISTING_LIMIT);
		return { path, items, count: items.length };
	}

	const names = (await readdir(path)).sort();
	const items = await Promise.all(names.map(name => describeEntry(path, name)));
	return { path, items, count: items.length };
}

/** Returns the tool definition for list_directory. */
export function createListDirectoryToolDefinition(): RegisteredTool {
	return defineTool({
		name: "list_directory",
		description: "List the contents of an allowed directory, optionally recursively.",
		schema: listDirectoryArgsSchema,
		execute: executeListDirectoryTool,
	});
}
