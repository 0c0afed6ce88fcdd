import {
	createSystemHealthToolDefinition,
	executeSystemHealthTool,
	parseDisk,
	parseLoadAverage,
	parseMemory,
} from "./SystemHealthTool";
import { createMockDeps, createTestSettings, executionResult } from "./ToolTestUtils";
import type { ToolDeps } from "./ToolTypes";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const FREE_OUTPUT = `               total        used        free      shared  buff/cache   available
Mem:            15Gi       6.1Gi       2.3Gi       312Mi       7.2Gi       8.9Gi
Swap:          2.0Gi          0B       2.0Gi
`;

const DF_OUTPUT = `Filesystem      Size  Used Avail Use% Mounted on
/dev/nvme0n1p2  468G  201G  244G  46% /
`;

describe("SystemHealthTool", () => {
	let deps: ToolDeps;
	let mockRunner: ReturnType<typeof createMockDeps>["mockRunner"];

	beforeEach(() => {
		vi.clearAllMocks();
		vi.useFakeTimers({ toFake: ["Date"] });
		vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"));
		const mocks = createMockDeps(createTestSettings({ allowedServices: ["apis"] }));
		deps = mocks.deps;
		mockRunner = mocks.mockRunner;
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("returns a valid tool definition", () => {
		expect(createSystemHealthToolDefinition().name).toBe("system_health");
	});

	describe("parsers", () => {
		it("takes the first three load averages", () => {
			expect(parseLoadAverage("0.52 0.48 0.40 2/311 12345\n")).toEqual(["0.52", "0.48", "0.40"]);
			expect(parseLoadAverage("")).toEqual(["unknown"]);
		});

		it("reads the Mem row", () => {
			expect(parseMemory(FREE_OUTPUT)).toEqual({ total: "15Gi", used: "6.1Gi", free: "2.3Gi" });
			expect(parseMemory("")).toEqual({ total: "unknown", used: "unknown", free: "unknown" });
		});

		it("reads the last df row", () => {
			expect(parseDisk(DF_OUTPUT)).toEqual({ total: "468G", used: "201G", available: "244G", use_percent: "46%" });
			expect(parseDisk("Filesystem Size Used Avail Use% Mounted on\n")).toEqual({
				total: "unknown",
				used: "unknown",
				available: "unknown",
				use_percent: "unknown",
			});
		});
	});

	it("combines the probes", async () => {
		mockRunner.run.mockImplementation(command => {
			switch (command[0]) {
				case "cat":
					return Promise.resolve(executionResult({ stdout: "1.00 0.50 0.25 1/100 42\n" }));
				case "free":
					return Promise.resolve(executionResult({ stdout: FREE_OUTPUT }));
				case "df":
					return Promise.resolve(executionResult({ stdout: DF_OUTPUT }));
				default:
					return Promise.resolve(executionResult({ stdout: "running 2026-03-01T09:00:00Z\n" }));
			}
		});

		const result = await executeSystemHealthTool(deps);

		expect(mockRunner.run).toHaveBeenCalledWith(["cat", "/proc/loadavg"], { timeoutMs: 5_000 });
		expect(mockRunner.run).toHaveBeenCalledWith(["free", "-h"], { timeoutMs: 5_000 });
		expect(mockRunner.run).toHaveBeenCalledWith(["df", "-h", "/"], { timeoutMs: 5_000 });
		expect(result).toEqual({
			cpu_load: ["1.00", "0.50", "0.25"],
			memory: { total: "15Gi", used: "6.1Gi", free: "2.3Gi" },
			disk: { total: "468G", used: "201G", available: "244G", use_percent: "46%" },
			docker_services: { apis: { status: "running", started_at: "2026-03-01T09:00:00Z" } },
			timestamp: "2026-03-01T12:00:00.000Z",
		});
	});

	it("falls back to unknown when the probes fail", async () => {
		mockRunner.run.mockResolvedValue(executionResult({ exitCode: 127, stdout: "ignored", stderr: "not found" }));

		const result = await executeSystemHealthTool(deps);

		expect(result.cpu_load).toEqual(["unknown"]);
		expect(result.memory).toEqual({ total: "unknown", used: "unknown", free: "unknown" });
		expect(result.disk.use_percent).toBe("unknown");
		expect(result.docker_services).toEqual({ apis: { status: "unknown", started_at: "unknown" } });
	});
});
