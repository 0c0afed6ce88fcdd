import { ToolError } from "../tools/ToolError";

export const WRITE_KEYWORDS = ["CREATE", "MERGE", "DELETE", "SET", "REMOVE", "DROP"] as const;

export const WRITE_QUERY_MESSAGE = "Write queries not allowed via MCP. Use read-only queries.";

/**
 * Returns the first mutation keyword found anywhere in the upper-cased query, if any.
 * A substring match: `OFFSET` or a property named `created` also trip it.
 */
export function findWriteKeyword(query: string): string | undefined {
	const upper = query.toUpperCase();
	return WRITE_KEYWORDS.find(keyword => upper.includes(keyword));
}

export function isReadOnlyQuery(query: string): boolean {
	return findWriteKeyword(query) === undefined;
}

/**
 * @throws ToolError with kind `invalid_arguments` for a query containing a mutation keyword
 */
export function requireReadOnlyQuery(query: string): string {
	if (!isReadOnlyQuery(query)) {
		throw new ToolError("invalid_arguments", WRITE_QUERY_MESSAGE);
	}
	return query;
}
