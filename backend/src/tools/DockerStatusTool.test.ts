import { collectServiceStatus, createDockerStatusToolDefinition, executeDockerStatusTool } from "./DockerStatusTool";
import { createMockDeps, createTestSettings, executionResult } from "./ToolTestUtils";
import type { ToolDeps } from "./ToolTypes";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("DockerStatusTool", () => {
	let deps: ToolDeps;
	let mockRunner: ReturnType<typeof createMockDeps>["mockRunner"];

	beforeEach(() => {
		vi.clearAllMocks();
		const mocks = createMockDeps(createTestSettings({ allowedServices: ["apis", "nginx"] }));
		deps = mocks.deps;
		mockRunner = mocks.mockRunner;
	});

	it("returns a valid tool definition", () => {
		expect(createDockerStatusToolDefinition().name).toBe("docker_status");
	});

	it("parses container lines and skips malformed ones", async () => {
		mockRunner.run.mockImplementation(command => {
			if (command[1] === "ps") {
				return Promise.resolve(
					executionResult({
						stdout: '{"Names":"apis","State":"running"}\nWARNING: not json\n\n["array"]\n{"Names":"nginx","State":"exited"}\n',
					}),
				);
			}
			return Promise.resolve(executionResult({ stdout: "running 2026-03-01T10:00:00Z\n" }));
		});

		const result = await executeDockerStatusTool(deps);

		expect(mockRunner.run).toHaveBeenCalledWith(["docker", "ps", "-a", "--format", "{{json .}}"], {
			timeoutMs: 10_000,
		});
		expect(result.containers).toEqual([
			{ Names: "apis", State: "running" },
			{ Names: "nginx", State: "exited" },
		]);
		expect(result.services).toEqual({
			apis: { status: "running", started_at: "2026-03-01T10:00:00Z" },
			nginx: { status: "running", started_at: "2026-03-01T10:00:00Z" },
		});
	});

	describe("collectServiceStatus", () => {
		it("inspects each allowed service", async () => {
			mockRunner.run.mockResolvedValue(executionResult({ stdout: "exited 2026-02-28T08:00:00Z" }));

			await collectServiceStatus(deps);

			expect(mockRunner.run).toHaveBeenCalledWith(
				["docker", "inspect", "nginx", "--format", "{{.State.Status}} {{.State.StartedAt}}"],
				{ timeoutMs: 5_000 },
			);
		});

		it("reports unknown when inspect fails or prints nothing", async () => {
			mockRunner.run
				.mockResolvedValueOnce(executionResult({ exitCode: 1, stderr: "No such object: apis" }))
				.mockResolvedValueOnce(executionResult({ stdout: "" }));

			const services = await collectServiceStatus(deps);

			expect(services).toEqual({
				apis: { status: "unknown", started_at: "unknown" },
				nginx: { status: "unknown", started_at: "unknown" },
			});
		});
	});
});
