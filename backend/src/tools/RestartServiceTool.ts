/**
 * Tool definition and executor for the restart_service tool.
 */

import { requireAllowedService } from "../sandbox";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** Zod schema for restart_service arguments. */
export const restartServiceArgsSchema = z.object({
	service: z.string().describe("Service to restart"),
	confirm: z.boolean().default(false).describe("Must be true to execute"),
});

export interface RestartServiceResult {
	service: string;
	success: boolean;
	output: string;
}

/** Executes the restart_service tool and records an audit event. */
export async function executeRestartServiceTool(
	deps: ToolDeps,
	args: z.infer<typeof restartServiceArgsSchema>,
): Promise<RestartServiceResult> {
	const service = requireAllowedService(args.service, deps.settings);
	const result = await deps.runner.run(["docker", "compose", "restart", service], {
		cwd: deps.settings.composeDirectory,
		timeoutMs: 120_000,
	});

	await deps.audit.log({
		action: "service.restart",
		tool: "restart_service",
		target: service,
		outcome: result.success ? "success" : "failure",
		metadata: { exitCode: result.exitCode, timedOut: result.timedOut },
	});

	return { service, success: result.success, output: result.stdout + result.stderr };
}

/** Returns the tool definition for restart_service. */
export function createRestartServiceToolDefinition(): RegisteredTool {
	return defineTool({
		name: "restart_service",
		description: "Restart a Docker service. Requires confirm=true.",
		schema: restartServiceArgsSchema,
		destructive: { action: "restart a service" },
		execute: executeRestartServiceTool,
	});
}
