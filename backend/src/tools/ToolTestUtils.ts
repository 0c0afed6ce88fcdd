/**
 * Shared test utilities for tool tests.
 * Provides mock factories and helpers used across individual tool test files.
 */

import type { AuditService } from "../audit";
import type { GatewaySettings } from "../config/GatewaySettings";
import type { BackendApiClient } from "../services/BackendApiClient";
import type { GraphQueryClient } from "../services/GraphQueryClient";
import type { ProcessRunner } from "../util/ProcessRunner";
import type { ToolDeps } from "./ToolTypes";
import type { ExecutionResult } from "opsgate-common";
import { vi } from "vitest";

/** Creates settings with small, predictable allowlists. */
export function createTestSettings(overrides: Partial<GatewaySettings> = {}): GatewaySettings {
	return {
		apiKeys: new Set(["test-key-1"]),
		allowedPaths: ["/srv/app", "/var/log"],
		blockedPatterns: [/\.env$/, /secrets/, /\.key$/],
		allowedServices: ["apis", "nginx", "worker-main"],
		repoPaths: new Map([
			["api", "/srv/app/api"],
			["workers", "/srv/app/workers"],
		]),
		serviceRepos: new Map([
			["apis", "api"],
			["worker-main", "workers"],
		]),
		commandPrefixes: ["uptime", "df -h", "ls "],
		composeDirectory: "/srv/app/deploy",
		fileReadMaxChars: 100000,
		...overrides,
	};
}

/** Builds an ExecutionResult for a successful run unless overridden. */
export function executionResult(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
	const exitCode = overrides.exitCode ?? 0;
	return {
		stdout: "",
		stderr: "",
		exitCode,
		success: exitCode === 0,
		timedOut: false,
		...overrides,
	};
}

/** Creates all mocks and the deps object that bundles them. */
export function createMockDeps(settings: GatewaySettings = createTestSettings()) {
	const mockRunner = {
		run: vi.fn<ProcessRunner["run"]>().mockResolvedValue(executionResult()),
	};
	const mockGraph = {
		runReadQuery: vi.fn<GraphQueryClient["runReadQuery"]>().mockResolvedValue([]),
		close: vi.fn<GraphQueryClient["close"]>().mockResolvedValue(undefined),
	};
	const mockBackend = {
		getStats: vi.fn<BackendApiClient["getStats"]>(),
		triggerReanalysis: vi.fn<BackendApiClient["triggerReanalysis"]>(),
		hideRecord: vi.fn<BackendApiClient["hideRecord"]>(),
	};
	const mockAudit = {
		log: vi.fn<AuditService["log"]>().mockResolvedValue(undefined),
	};
	const deps: ToolDeps = {
		settings,
		runner: mockRunner,
		graph: mockGraph,
		backend: mockBackend,
		audit: mockAudit,
	};
	return { deps, mockRunner, mockGraph, mockBackend, mockAudit };
}
