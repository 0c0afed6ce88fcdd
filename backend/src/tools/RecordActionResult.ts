import type { BackendResponse } from "../services/BackendApiClient";

export type RecordActionResult =
	| { record_id: string; success: boolean; status: number; response: unknown }
	| { record_id: string; success: false; error: string };

/**
 * Shapes a backend response, or the error that prevented one, for the record tools.
 */
export function toRecordActionResult(recordId: string, outcome: BackendResponse | Error): RecordActionResult {
	if (outcome instanceof Error) {
		return { record_id: recordId, success: false, error: outcome.message };
	}
	return { record_id: recordId, success: outcome.ok, status: outcome.status, response: outcome.body };
}
