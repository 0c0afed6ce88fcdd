/**
 * Tool definition and executor for the docker_status tool.
 */

import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

/** docker_status takes no arguments. */
export const dockerStatusArgsSchema = z.object({});

export interface ServiceStatus {
	status: string;
	started_at: string;
}

export interface DockerStatusResult {
	containers: Array<Record<string, unknown>>;
	services: Record<string, ServiceStatus>;
}

const UNKNOWN_STATUS: ServiceStatus = { status: "unknown", started_at: "unknown" };

function parseContainerLine(line: string): Record<string, unknown> | undefined {
	let value: unknown;
	try {
		value = JSON.parse(line);
	} catch {
		return;
	}
	if (typeof value === "object" && value !== null && !Array.isArray(value)) {
		return Object.fromEntries(Object.entries(value));
	}
	return;
}

/**
 * Inspects every allowed service. A service docker does not know is reported as "unknown".
 */
export async function collectServiceStatus(deps: ToolDeps): Promise<Record<string, ServiceStatus>> {
	const entries = await Promise.all(
		deps.settings.allowedServices.map(async service => {
			const result = await deps.runner.run(
				["docker", "inspect", service, "--format", "{{.State.Status}} {{.State.StartedAt}}"],
				{ timeoutMs: 5_000 },
			);
			if (!result.success) {
				return [service, UNKNOWN_STATUS] as const;
			}
			const [status, startedAt] = result.stdout.trim().split(" ");
			return [service, { status: status || "unknown", started_at: startedAt || "unknown" }] as const;
		}),
	);
	return Object.fromEntries(entries);
}

/** Executes the docker_status tool. */
export async function executeDockerStatusTool(deps: ToolDeps): Promise<DockerStatusResult> {
	const [ps, services] = await Promise.all([
		deps.runner.run(["docker", "ps", "-a", "--format", "{{json .}}"], { timeoutMs: 10_000 }),
		collectServiceStatus(deps),
	]);

	const containers: Array<Record<string, unknown>> = [];
	for (const line of ps.stdout.split("\n")) {
		const container = line.trim() ? parseContainerLine(line) : undefined;
		if (container) {
			containers.push(container);
		}
	}

	return { containers, services };
}

/** Returns the tool definition for docker_status. */
export function createDockerStatusToolDefinition(): RegisteredTool {
	return defineTool({
		name: "docker_status",
		description: "Get the status of all Docker containers and allowed services.",
		schema: dockerStatusArgsSchema,
		execute: deps => executeDockerStatusTool(deps),
	});
}
