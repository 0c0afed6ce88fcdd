/**
 * Tool definition and executor for the run_command tool.
 * The only tool whose input the shell parses; the command must start with a configured prefix.
 */

import { requireAllowedCommand } from "../sandbox";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** Zod schema for run_command arguments. */
export const runCommandArgsSchema = z.object({
	command: z.string().min(1).describe("Command to run (must start with an allowed prefix)"),
});

export interface RunCommandResult {
	command: string;
	success: boolean;
	stdout: string;
	stderr: string;
}

/** Executes the run_command tool. */
export async function executeRunCommandTool(
	deps: ToolDeps,
	args: z.infer<typeof runCommandArgsSchema>,
): Promise<RunCommandResult> {
	const command = requireAllowedCommand(args.command, deps.settings);
	const result = await deps.runner.run(command, { timeoutMs: 30_000 });
	return { command, success: result.success, stdout: result.stdout, stderr: result.stderr };
}

/** Returns the tool definition for run_command. */
export function createRunCommandToolDefinition(): RegisteredTool {
	return defineTool({
		name: "run_command",
		description: "Run an allowed shell command (uptime, df, free, docker ps, ls, cat, ...).",
		schema: runCommandArgsSchema,
		execute: executeRunCommandTool,
	});
}
