/**
 * Tool definition and executor for the daily_stats tool.
 */

import { getLog } from "../util/Logger";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

const log = getLog(import.meta);

/** daily_stats takes no arguments. */
export const dailyStatsArgsSchema = z.object({});

/**
 * Executes the daily_stats tool. Returns the backend's parsed body (or `{ raw }`) on success
 * and `{ error }` otherwise.
 */
export async function executeDailyStatsTool(deps: ToolDeps): Promise<unknown> {
	try {
		const response = await deps.backend.getStats();
		if (!response.ok) {
			return { error: `Backend returned status ${response.status}` };
		}
		return response.body;
	} catch (error) {
		log.warn(error, "Stats request failed");
		return { error: error instanceof Error ? error.message : String(error) };
	}
}

/** Returns the tool definition for daily_stats. */
export function createDailyStatsToolDefinition(): RegisteredTool {
	return defineTool({
		name: "daily_stats",
		description: "Get today's processing statistics from the backend.",
		schema: dailyStatsArgsSchema,
		execute: deps => executeDailyStatsTool(deps),
	});
}
