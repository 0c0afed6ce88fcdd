/**
 * Tool definition and executor for the tail_logs tool, used for polling.
 */

import { requireAllowedService } from "../sandbox";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** Zod schema for tail_logs arguments. */
export const tailLogsArgsSchema = z.object({
	service: z.string().describe("Docker service name"),
	lines: z.number().int().min(1).max(10000).default(50).describe("Number of lines to return"),
});

export interface TailLogsResult {
	service: string;
	lines: number;
	logs: string;
	timestamp: string;
}

/** Executes the tail_logs tool. */
export async function executeTailLogsTool(
	deps: ToolDeps,
	args: z.infer<typeof tailLogsArgsSchema>,
): Promise<TailLogsResult> {
	const service = requireAllowedService(args.service, deps.settings);
	const result = await deps.runner.run(["docker", "logs", "--tail", String(args.lines), service], {
		timeoutMs: 10_000,
	});
	return {
		service,
		lines: args.lines,
		logs: result.stdout,
		timestamp: new Date().toISOString(),
	};
}

/** Returns the tool definition for tail_logs. */
export function createTailLogsToolDefinition(): RegisteredTool {
	return defineTool({
		name: "tail_logs",
		description: "Get the most recent logs from a service (for polling).",
		schema: tailLogsArgsSchema,
		execute: executeTailLogsTool,
	});
}
