/**
 * Tool definition and executor for the trigger_reanalysis tool.
 */

import { getLog } from "../util/Logger";
import { type RecordActionResult, toRecordActionResult } from "./RecordActionResult";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

const log = getLog(import.meta);

/** Zod schema for trigger_reanalysis arguments. */
export const triggerReanalysisArgsSchema = z.object({
	record_id: z.string().min(1).describe("Record ID to reanalyze"),
	confirm: z.boolean().default(false).describe("Must be true to execute"),
});

/** Executes the trigger_reanalysis tool and records an audit event. */
export async function executeTriggerReanalysisTool(
	deps: ToolDeps,
	args: z.infer<typeof triggerReanalysisArgsSchema>,
): Promise<RecordActionResult> {
	const recordId = args.record_id;
	const outcome = await deps.backend.triggerReanalysis(recordId).catch((error: unknown) => {
		log.warn(error, "Reanalysis request for %s failed", recordId);
		return error instanceof Error ? error : new Error(String(error));
	});
	const result = toRecordActionResult(recordId, outcome);

	await deps.audit.log({
		action: "record.reanalyze",
		tool: "trigger_reanalysis",
		target: recordId,
		outcome: result.success ? "success" : "failure",
		metadata: "status" in result ? { status: result.status } : { error: result.error },
	});

	return result;
}

/** Returns the tool definition for trigger_reanalysis. */
export function createTriggerReanalysisToolDefinition(): RegisteredTool {
	return defineTool({
		name: "trigger_reanalysis",
		description: "Trigger reanalysis of a record. Requires confirm=true.",
		schema: triggerReanalysisArgsSchema,
		destructive: { action: "trigger reanalysis" },
		execute: executeTriggerReanalysisTool,
	});
}
