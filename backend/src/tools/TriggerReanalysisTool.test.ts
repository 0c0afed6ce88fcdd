import { createMockDeps } from "./ToolTestUtils";
import type { ToolDeps } from "./ToolTypes";
import { createTriggerReanalysisToolDefinition, executeTriggerReanalysisTool } from "./TriggerReanalysisTool";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../util/Logger", () => ({
	getLog: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

describe("TriggerReanalysisTool", () => {
	let deps: ToolDeps;
	let mockBackend: ReturnType<typeof createMockDeps>["mockBackend"];
	let mockAudit: ReturnType<typeof createMockDeps>["mockAudit"];

	beforeEach(() => {
		vi.clearAllMocks();
		const mocks = createMockDeps();
		deps = mocks.deps;
		mockBackend = mocks.mockBackend;
		mockAudit = mocks.mockAudit;
	});

	it("is declared destructive", () => {
		expect(createTriggerReanalysisToolDefinition().destructive).toEqual({ action: "trigger reanalysis" });
	});

	it("posts the reanalysis request and audits it", async () => {
		mockBackend.triggerReanalysis.mockResolvedValue({ ok: true, status: 202, body: { queued: true } });

		const result = await executeTriggerReanalysisTool(deps, { record_id: "rec-42", confirm: true });

		expect(mockBackend.triggerReanalysis).toHaveBeenCalledWith("rec-42");
		expect(result).toEqual({ record_id: "rec-42", success: true, status: 202, response: { queued: true } });
		expect(mockAudit.log).toHaveBeenCalledWith({
			action: "record.reanalyze",
			tool: "trigger_reanalysis",
			target: "rec-42",
			outcome: "success",
			metadata: { status: 202 },
		});
	});

	it("reports and audits a rejected request", async () => {
		mockBackend.triggerReanalysis.mockResolvedValue({ ok: false, status: 404, body: { detail: "not found" } });

		const result = await executeTriggerReanalysisTool(deps, { record_id: "rec-0", confirm: true });

		expect(result).toEqual({ record_id: "rec-0", success: false, status: 404, response: { detail: "not found" } });
		expect(mockAudit.log).toHaveBeenCalledWith(expect.objectContaining({ outcome: "failure" }));
	});

	it("reports a network failure", async () => {
		mockBackend.triggerReanalysis.mockRejectedValue(new Error("connect ECONNREFUSED"));

		const result = await executeTriggerReanalysisTool(deps, { record_id: "rec-1", confirm: true });

		expect(result).toEqual({ record_id: "rec-1", success: false, error: "connect ECONNREFUSED" });
		expect(mockAudit.log).toHaveBeenCalledWith(
			expect.objectContaining({ outcome: "failure", metadata: { error: "connect ECONNREFUSED" } }),
		);
	});
});
