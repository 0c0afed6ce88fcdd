/**
 * Tool definition and executor for the read_log tool.
 * Reads the most recent log lines of one container.
 */

import { requireAllowedService } from "../sandbox";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** Zod schema for read_log arguments. */
export const readLogArgsSchema = z.object({
	service: z.string().describe("Docker service name (e.g. 'worker-main', 'apis')"),
	lines: z.number().int().min(1).max(10000).default(100).describe("Number of lines to return"),
	since: z.string().min(1).optional().describe("Show logs since (e.g. '1h', '30m', '2024-01-01')"),
});

export interface ReadLogResult {
	service: string;
	lines_requested: number;
	logs: string;
	stderr: string;
	success: boolean;
}

/** Executes the read_log tool. */
export async function executeReadLogTool(
	deps: ToolDeps,
	args: z.infer<typeof readLogArgsSchema>,
): Promise<ReadLogResult> {
	const service = requireAllowedService(args.service, deps.settings);
	const command = ["docker", "logs", "--tail", String(args.lines)];
	if (args.since) {
		command.push("--since", args.since);
	}
	command.push(service);

	const result = await deps.runner.run(command, { timeoutMs: 30_000 });
	return {
		service,
		lines_requested: args.lines,
		logs: result.stdout,
		stderr: result.stderr,
		success: result.success,
	};
}

/** Returns the tool definition for read_log. */
export function createReadLogToolDefinition(): RegisteredTool {
	return defineTool({
		name: "read_log",
		description: "Read the most recent log lines from a Docker service.",
		schema: readLogArgsSchema,
		execute: executeReadLogTool,
	});
}
