import { ToolError } from "../tools/ToolError";
import { findWriteKeyword, isReadOnlyQuery, requireReadOnlyQuery, WRITE_QUERY_MESSAGE } from "./QueryValidator";
import { describe, expect, it } from "vitest";

describe("QueryValidator", () => {
	it("accepts a read query", () => {
		expect(isReadOnlyQuery("MATCH (t:Topic) RETURN t LIMIT 5")).toBe(true);
	});

	it.each([
		["CREATE (n:Topic {name: 'x'})", "CREATE"],
		["merge (n:Topic {id: 1})", "MERGE"],
		["MATCH (n) DETACH DELETE n", "DELETE"],
		["MATCH (n) Set n.hidden = true", "SET"],
		["MATCH (n) REMOVE n.flag", "REMOVE"],
		["DROP INDEX topic_name", "DROP"],
	])("rejects %s", (query, keyword) => {
		expect(findWriteKeyword(query)).toBe(keyword);
		expect(isReadOnlyQuery(query)).toBe(false);
	});

	it("matches keywords inside identifiers", () => {
		expect(findWriteKeyword("MATCH (n) RETURN n.created_at")).toBe("CREATE");
		expect(findWriteKeyword("MATCH (n) RETURN n SKIP 10")).toBeUndefined();
	});

	it("throws invalid_arguments for a write query", () => {
		expect(() => requireReadOnlyQuery("create (n)")).toThrow(new ToolError("invalid_arguments", WRITE_QUERY_MESSAGE));
	});

	it("returns a read query unchanged", () => {
		expect(requireReadOnlyQuery("MATCH (n) RETURN count(n)")).toBe("MATCH (n) RETURN count(n)");
	});
});
