/**
 * Tool definition and executor for the read_file tool.
 * Reads a text file inside the allowed directories, optionally a window of its lines.
 */

import { requireAllowedPath } from "../sandbox";
import { hasErrorCode } from "./FileSystemErrors";
import { ToolError } from "./ToolError";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { readFile, stat } from "node:fs/promises";
import { z } from "zod";

/** Zod schema for read_file arguments. */
export const readFileArgsSchema = z.object({
	path: z.string().min(1).describe("Absolute path to the file"),
	lines: z.number().int().positive().optional().describe("Max lines to read"),
	offset: z.number().int().nonnegative().optional().describe("Lines to skip from the start"),
});

export interface ReadFileResult {
	path: string;
	content: string;
	truncated: boolean;
	size: number;
}

/**
 * Returns `count` lines starting after `offset`, each keeping its line terminator.
 */
export function sliceLines(content: string, offset = 0, count?: number): string {
	if (offset === 0 && count === undefined) {
		return content;
	}
	const lines = content.split(/(?<=\n)/);
	return lines.slice(offset, count === undefined ? undefined : offset + count).join("");
}

/** Executes the read_file tool. */
export async function executeReadFileTool(
	deps: ToolDeps,
	args: z.infer<typeof readFileArgsSchema>,
): Promise<ReadFileResult> {
	const path = await requireAllowedPath(args.path, deps.settings);

	const stats = await stat(path).catch((error: unknown) => {
		if (hasErrorCode(error, "ENOENT", "ENOTDIR")) {
			throw new ToolError("not_found", `File not found: ${path}`);
		}
		throw error;
	});
	if (!stats.isFile()) {
		throw new ToolError("invalid_arguments", `Not a file: ${path}`);
	}

	const content = sliceLines(await readFile(path, "utf8"), args.offset, args.lines);
	const max = deps.settings.fileReadMaxChars;
	return {
		path,
		content: content.slice(0, max),
		truncated: content.length > max,
		size: stats.size,
	};
}

/** Returns the tool definition for read_file. */
export function createReadFileToolDefinition(): RegisteredTool {
	return defineTool({
		name: "read_file",
		description: "Read a file from an allowed directory. Supports line offset and limit.",
		schema: readFileArgsSchema,
		execute: executeReadFileTool,
	});
}
