import { afterEach, beforeAll, beforeEach, vi } from "vitest";

/**
 * Global environment cleanup to ensure tests have isolated process.env state.
 *
 * This captures the initial process.env state before all tests and restores it
 * before each test, so variables set by one test never leak into the next.
 */
let originalEnvSnapshot: Record<string, string | undefined>;

beforeAll(() => {
	originalEnvSnapshot = { ...process.env };
});

beforeEach(() => {
	// Delete any keys that were added after the snapshot, then restore original values
	for (const key of Object.keys(process.env)) {
		if (!(key in originalEnvSnapshot)) {
			delete process.env[key];
		}
	}
	for (const [key, value] of Object.entries(originalEnvSnapshot)) {
		if (value !== undefined) {
			process.env[key] = value;
		}
	}
});

afterEach(() => {
	vi.unstubAllEnvs();
});
