import { buildGitArguments, createGitToolDefinition, executeGitTool } from "./GitTool";
import { createMockDeps, executionResult } from "./ToolTestUtils";
import type { ToolDeps } from "./ToolTypes";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("GitTool", () => {
	let deps: ToolDeps;
	let mockRunner: ReturnType<typeof createMockDeps>["mockRunner"];

	beforeEach(() => {
		vi.clearAllMocks();
		const mocks = createMockDeps();
		deps = mocks.deps;
		mockRunner = mocks.mockRunner;
	});

	it("returns a valid tool definition", () => {
		expect(createGitToolDefinition().name).toBe("git");
	});

	describe("buildGitArguments", () => {
		it("expands log and diff to fixed forms", () => {
			expect(buildGitArguments("log --all")).toEqual(["log", "--oneline", "-20"]);
			expect(buildGitArguments("diff")).toEqual(["diff", "HEAD~1"]);
		});

		it("keeps extra words for other subcommands", () => {
			expect(buildGitArguments("  branch   -a ")).toEqual(["branch", "-a"]);
			expect(buildGitArguments("fetch origin")).toEqual(["fetch", "origin"]);
			expect(buildGitArguments("pull --ff-only origin feature/login-v2")).toEqual([
				"pull",
				"--ff-only",
				"origin",
				"feature/login-v2",
			]);
			expect(buildGitArguments("fetch --all --prune")).toEqual(["fetch", "--all", "--prune"]);
		});

		it("rejects subcommands outside the allowlist", () => {
			expect(() => buildGitArguments("push --force")).toThrow(
				"Command not allowed. Allowed: status, log, diff, pull, branch, fetch",
			);
			expect(() => buildGitArguments("")).toThrow("Command not allowed");
		});

		it("rejects options that run another program", () => {
			expect(() => buildGitArguments("fetch --upload-pack=touch /tmp/x origin")).toThrow(
				"Option not allowed: --upload-pack=touch",
			);
		});

		it.each([
			["fetch --upload=x .", "Option not allowed: --upload=x"],
			["fetch --upload-pac=touch${IFS}/tmp/marker;false .", "Option not allowed: --upload-pac=touch${IFS}/tmp/marker;false"],
			["pull -s ours origin", "Option not allowed: -s"],
			["pull --strategy=ours", "Option not allowed: --strategy=ours"],
			["branch -D main", "Option not allowed: -D"],
			["status --porcelain=v2", "Option not allowed: --porcelain=v2"],
		])("refuses the unlisted option in %s", (command, message) => {
			expect(() => buildGitArguments(command)).toThrow(message);
		});

		it.each([
			["fetch .", "Argument not allowed: ."],
			["fetch /srv/other-repo", "Argument not allowed: /srv/other-repo"],
			["fetch ext::sh", "Argument not allowed: ext::sh"],
			["pull origin ../main", "Argument not allowed: ../main"],
			["fetch origin/../../x", "Argument not allowed: origin/../../x"],
		])("refuses the remote or branch name in %s", (command, message) => {
			expect(() => buildGitArguments(command)).toThrow(message);
		});
	});

	describe("executeGitTool", () => {
		it("runs git in the repository checkout", async () => {
			mockRunner.run.mockResolvedValue(executionResult({ stdout: "On branch main\n" }));

			const result = await executeGitTool(deps, { repo: "api", command: "status" });

			expect(mockRunner.run).toHaveBeenCalledWith(["git", "status"], { cwd: "/srv/app/api", timeoutMs: 60_000 });
			expect(result).toEqual({ repo: "api", command: "status", success: true, output: "On branch main\n" });
		});

		it("refuses an abbreviated upload option without running git", async () => {
			await expect(executeGitTool(deps, { repo: "api", command: "fetch --upload=x ." })).rejects.toMatchObject({
				kind: "access_denied",
				message: "Option not allowed: --upload=x",
			});
			expect(mockRunner.run).not.toHaveBeenCalled();
		});

		it("rejects an unknown repository", async () => {
			await expect(executeGitTool(deps, { repo: "secret", command: "status" })).rejects.toMatchObject({
				kind: "invalid_arguments",
				message: "Unknown repo: secret. Allowed: api, workers",
			});
			expect(mockRunner.run).not.toHaveBeenCalled();
		});
	});
});
