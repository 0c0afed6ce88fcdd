/**
 * Tool definition and executor for the query_database tool.
 * Runs a read-only graph query; the parameter map goes to the driver as-is.
 */

import { requireReadOnlyQuery } from "../sandbox";
import type { GraphRow } from "../services/GraphQueryClient";
import { getLog } from "../util/Logger";
import { defineTool, type RegisteredTool, type ToolDeps } from "./ToolTypes";
import { z } from "zod";

const log = getLog(import.meta);

/** Zod schema for query_database arguments. */
export const queryDatabaseArgsSchema = z.object({
	query: z.string().min(1).describe("Read-only Cypher query"),
	params: z.record(z.unknown()).default({}).describe("Query parameters"),
});

export type QueryDatabaseResult =
	| { query: string; rows: Array<GraphRow>; count: number; success: true }
	| { query: string; error: string; success: false };

/**
 * Executes the query_database tool. Driver failures are reported in the result, not thrown.
 */
export async function executeQueryDatabaseTool(
	deps: ToolDeps,
	args: z.infer<typeof queryDatabaseArgsSchema>,
): Promise<QueryDatabaseResult> {
	const query = requireReadOnlyQuery(args.query);
	try {
		const rows = await deps.graph.runReadQuery(query, args.params);
		return { query, rows, count: rows.length, success: true };
	} catch (error) {
		log.warn(error, "Graph query failed");
		return { query, error: error instanceof Error ? error.message : String(error), success: false };
	}
}

/** Returns the tool definition for query_database. */
export function createQueryDatabaseToolDefinition(): RegisteredTool {
	return defineTool({
		name: "query_database",
		description: "Run a read-only Cypher query against the graph database.",
		schema: queryDatabaseArgsSchema,
		execute: executeQueryDatabaseTool,
	});
}
