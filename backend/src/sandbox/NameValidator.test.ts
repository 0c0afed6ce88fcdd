import { ToolError } from "../tools/ToolError";
import { isAllowedService, requireAllowedService, requireRepoPath } from "./NameValidator";
import { describe, expect, it } from "vitest";

const settings = {
	allowedServices: ["apis", "nginx"],
	repoPaths: new Map([
		["api", "/opt/stack/api"],
		["web", "/opt/stack/web"],
	]),
};

describe("NameValidator", () => {
	it("accepts only exact service names", () => {
		expect(isAllowedService("apis", settings)).toBe(true);
		expect(isAllowedService("APIS", settings)).toBe(false);
		expect(isAllowedService("apis ", settings)).toBe(false);
	});

	it("returns an allowed service", () => {
		expect(requireAllowedService("nginx", settings)).toBe("nginx");
	});

	it("rejects an unknown service", () => {
		expect(() => requireAllowedService("postgres", settings)).toThrow(
			new ToolError("invalid_arguments", "Unknown service: postgres. Allowed: apis, nginx"),
		);
	});

	it("resolves a repository to its path", () => {
		expect(requireRepoPath("web", settings)).toBe("/opt/stack/web");
	});

	it("rejects an unknown repository", () => {
		expect(() => requireRepoPath("../etc", settings)).toThrow("Unknown repo: ../etc. Allowed: api, web");
	});
});
