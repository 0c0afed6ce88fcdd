/**
 * Tool definition and executor for the search_logs tool.
 * Filters recent container logs by an extended regular expression, across one or all allowed services.
 * Matching runs in grep under the runner's timeout, never on the gateway's event loop.
 */

import { isAllowedService } from "../sandbox";
import { ToolError } from "./ToolError";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** grep exits with 2 when the expression does not compile. */
const GREP_ERROR_EXIT_CODE = 2;

/**
 * Fixed pipeline; caller values arrive only as positional parameters and are never parsed by the shell.
 * Both docker streams are merged so the kept lines stay in time order.
 */
export const LOG_FILTER_SCRIPT = 'docker logs --since "$1" "$2" 2>&1 | grep -E -e "$3" | tail -n "$4"';

/** Zod schema for search_logs arguments. */
export const searchLogsArgsSchema = z.object({
	pattern: z.string().min(1).describe("Extended regex pattern to search for"),
	service: z.string().optional().describe("Limit to a specific service"),
	since: z.string().min(1).default("1h").describe("How far back to search"),
	lines: z.number().int().min(1).max(10000).default(500).describe("Maximum matching lines kept per service"),
});

export interface SearchLogsResult {
	pattern: string;
	since: string;
	matches: Record<string, Array<string>>;
	total_matches: number;
}

/** Builds the argument vector that filters one service's logs. */
export function buildLogFilterCommand(service: string, args: z.infer<typeof searchLogsArgsSchema>): Array<string> {
	return ["sh", "-c", LOG_FILTER_SCRIPT, "search_logs", args.since, service, args.pattern, String(args.lines)];
}

/**
 * Compiles the pattern in grep against empty input.
 * @throws ToolError with kind `invalid_arguments` when grep rejects the expression
 */
async function requireValidPattern(deps: ToolDeps, pattern: string): Promise<void> {
	const result = await deps.runner.run(["grep", "-E", "-e", pattern], { timeoutMs: 5_000 });
	if (result.exitCode === GREP_ERROR_EXIT_CODE) {
		throw new ToolError("invalid_arguments", `Invalid pattern: ${result.stderr.trim()}`);
	}
}

/** Executes the search_logs tool. Services outside the allowlist are skipped. */
export async function executeSearchLogsTool(
	deps: ToolDeps,
	args: z.infer<typeof searchLogsArgsSchema>,
): Promise<SearchLogsResult> {
	const candidates = args.service ? [args.service] : deps.settings.allowedServices;
	const services = candidates.filter(service => isAllowedService(service, deps.settings));
	if (services.length > 0) {
		await requireValidPattern(deps, args.pattern);
	}

	const found = await Promise.all(
		services.map(async service => {
			const result = await deps.runner.run(buildLogFilterCommand(service, args), { timeoutMs: 30_000 });
			const lines = result.stdout.split("\n").filter(line => line.trim());
			return [service, lines.slice(-args.lines)] as const;
		}),
	);

	const matches: Record<string, Array<string>> = {};
	let total = 0;
	for (const [service, lines] of found) {
		if (lines.length > 0) {
			matches[service] = lines;
			total += lines.length;
		}
	}

	return {
		pattern: args.pattern,
		since: args.since,
		matches,
		total_matches: total,
	};
}

/** Returns the tool definition for search_logs. */
export function createSearchLogsToolDefinition(): RegisteredTool {
	return defineTool({
		name: "search_logs",
		description: "Search recent logs for an extended regex pattern across services.",
		schema: searchLogsArgsSchema,
		execute: executeSearchLogsTool,
	});
}
