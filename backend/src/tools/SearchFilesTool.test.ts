import { createSearchFilesToolDefinition, executeSearchFilesTool, searchFilesArgsSchema } from "./SearchFilesTool";
import { createMockDeps, createTestSettings, executionResult } from "./ToolTestUtils";
import type { ToolDeps } from "./ToolTypes";
import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../util/Logger", () => ({
	getLog: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

describe("SearchFilesTool", () => {
	let root: string;
	let deps: ToolDeps;
	let mockRunner: ReturnType<typeof createMockDeps>["mockRunner"];

	beforeEach(async () => {
		vi.clearAllMocks();
		root = await realpath(await mkdtemp(join(tmpdir(), "search-files-")));
		const mocks = createMockDeps(createTestSettings({ allowedPaths: [root] }));
		deps = mocks.deps;
		mockRunner = mocks.mockRunner;
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("returns a valid tool definition", () => {
		expect(createSearchFilesToolDefinition().name).toBe("search_files");
		expect(searchFilesArgsSchema.parse({ pattern: "*.ts" }).max_results).toBe(100);
	});

	it("runs find in the first allowed directory by default", async () => {
		mockRunner.run.mockResolvedValue(executionResult({ stdout: `${root}/a.ts\n${root}/b.ts\n` }));

		const result = await executeSearchFilesTool(deps, { pattern: "*.ts", max_results: 100 });

		expect(mockRunner.run).toHaveBeenCalledWith(["find", root, "-name", "*.ts", "-type", "f"], { timeoutMs: 30_000 });
		expect(result).toEqual({ pattern: "*.ts", path: root, files: [`${root}/a.ts`, `${root}/b.ts`], count: 2 });
	});

	it("caps the file list", async () => {
		mockRunner.run.mockResolvedValue(executionResult({ stdout: "/x/1\n/x/2\n/x/3\n" }));

		const result = await executeSearchFilesTool(deps, { pattern: "*", path: root, max_results: 2 });

		expect(result.files).toEqual(["/x/1", "/x/2"]);
		expect(result.count).toBe(2);
	});

	it("leaves out files under a blocked pattern", async () => {
		mockRunner.run.mockResolvedValue(
			executionResult({ stdout: `${root}/app/.env\n${root}/secrets/db.yaml\n${root}/app/config.ts\n${root}/tls/server.KEY\n` }),
		);

		const result = await executeSearchFilesTool(deps, { pattern: "*", path: root, max_results: 10 });

		expect(result.files).toEqual([`${root}/app/config.ts`]);
		expect(result.count).toBe(1);
	});

	it("keeps partial output when find reports unreadable directories", async () => {
		mockRunner.run.mockResolvedValue(
			executionResult({ stdout: "/x/1\n", stderr: "find: '/x/private': Permission denied\n", exitCode: 1 }),
		);

		const result = await executeSearchFilesTool(deps, { pattern: "*", path: root, max_results: 10 });

		expect(result.files).toEqual(["/x/1"]);
	});

	it("refuses a directory outside the allowlist", async () => {
		await expect(
			executeSearchFilesTool(deps, { pattern: "*", path: "/etc", max_results: 10 }),
		).rejects.toMatchObject({ kind: "access_denied" });
		expect(mockRunner.run).not.toHaveBeenCalled();
	});

	it("fails when no directory is given or configured", async () => {
		const empty = createMockDeps(createTestSettings({ allowedPaths: [] })).deps;

		await expect(executeSearchFilesTool(empty, { pattern: "*", max_results: 10 })).rejects.toMatchObject({
			kind: "invalid_arguments",
		});
	});
});
