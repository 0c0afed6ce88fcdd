/**
 * Tool definition and executor for the system_health tool.
 * Collects load average, memory, root disk usage and the state of the allowed services.
 */

import { collectServiceStatus, type ServiceStatus } from "./DockerStatusTool";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

const UNKNOWN = "unknown";

/** system_health takes no arguments. */
export const systemHealthArgsSchema = z.object({});

export interface MemoryUsage {
	total: string;
	used: string;
	free: string;
}

export interface DiskUsage {
	total: string;
	used: string;
	available: string;
	use_percent: string;
}

export interface SystemHealthResult {
	cpu_load: Array<string>;
	memory: MemoryUsage;
	disk: DiskUsage;
	docker_services: Record<string, ServiceStatus>;
	timestamp: string;
}

function fields(line: string): Array<string> {
	return line.trim().split(/\s+/);
}

/** The 1, 5 and 15 minute load averages from /proc/loadavg. */
export function parseLoadAverage(output: string): Array<string> {
	const load = fields(output).slice(0, 3);
	return load.length === 3 && load.every(value => value.length > 0) ? load : [UNKNOWN];
}

/** Reads the "Mem:" row of `free -h`. */
export function parseMemory(output: string): MemoryUsage {
	const row = output.split("\n").find(line => line.startsWith("Mem:"));
	const [, total = UNKNOWN, used = UNKNOWN, free = UNKNOWN] = row ? fields(row) : [];
	return { total, used, free };
}

/** Reads the last row of `df -h /`. */
export function parseDisk(output: string): DiskUsage {
	const rows = output.split("\n").filter(line => line.trim().length > 0);
	const row = rows.length > 1 ? rows[rows.length - 1] : undefined;
	const [, total = UNKNOWN, used = UNKNOWN, available = UNKNOWN, usePercent = UNKNOWN] = row ? fields(row) : [];
	return { total, used, available, use_percent: usePercent };
}

/** Executes the system_health tool. */
export async function executeSystemHealthTool(deps: ToolDeps): Promise<SystemHealthResult> {
	const { runner } = deps;
	const [load, memory, disk, services] = await Promise.all([
		runner.run(["cat", "/proc/loadavg"], { timeoutMs: 5_000 }),
		runner.run(["free", "-h"], { timeoutMs: 5_000 }),
		runner.run(["df", "-h", "/"], { timeoutMs: 5_000 }),
		collectServiceStatus(deps),
	]);

	return {
		cpu_load: load.success ? parseLoadAverage(load.stdout) : [UNKNOWN],
		memory: parseMemory(memory.success ? memory.stdout : ""),
		disk: parseDisk(disk.success ? disk.stdout : ""),
		docker_services: services,
		timestamp: new Date().toISOString(),
	};
}

/** Returns the tool definition for system_health. */
export function createSystemHealthToolDefinition(): RegisteredTool {
	return defineTool({
		name: "system_health",
		description: "Get system health: CPU load, memory, disk and Docker service status.",
		schema: systemHealthArgsSchema,
		execute: deps => executeSystemHealthTool(deps),
	});
}
