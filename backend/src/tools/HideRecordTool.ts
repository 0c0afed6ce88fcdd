/**
 * Tool definition and executor for the hide_record tool.
 */

import { getLog } from "../util/Logger";
import { type RecordActionResult, toRecordActionResult } from "./RecordActionResult";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

const log = getLog(import.meta);

/** Zod schema for hide_record arguments. */
export const hideRecordArgsSchema = z.object({
	record_id: z.string().min(1).describe("Record ID to hide"),
	reason: z.string().optional().describe("Reason for hiding"),
	confirm: z.boolean().default(false).describe("Must be true to execute"),
});

/** Executes the hide_record tool and records an audit event. */
export async function executeHideRecordTool(
	deps: ToolDeps,
	args: z.infer<typeof hideRecordArgsSchema>,
): Promise<RecordActionResult> {
	const { record_id: recordId, reason } = args;
	const outcome = await deps.backend.hideRecord(recordId, reason).catch((error: unknown) => {
		log.warn(error, "Hide request for %s failed", recordId);
		return error instanceof Error ? error : new Error(String(error));
	});
	const result = toRecordActionResult(recordId, outcome);

	await deps.audit.log({
		action: "record.hide",
		tool: "hide_record",
		target: recordId,
		outcome: result.success ? "success" : "failure",
		metadata: "status" in result ? { status: result.status, reason } : { error: result.error, reason },
	});

	return result;
}

/** Returns the tool definition for hide_record. */
export function createHideRecordToolDefinition(): RegisteredTool {
	return defineTool({
		name: "hide_record",
		description: "Hide a record from users. Requires confirm=true.",
		schema: hideRecordArgsSchema,
		destructive: { action: "hide a record" },
		execute: executeHideRecordTool,
	});
}
