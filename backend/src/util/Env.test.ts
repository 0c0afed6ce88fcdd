import { loadEnvFiles } from "./Env";
import { config as dotenvConfig } from "dotenv";
import { describe, expect, it, vi } from "vitest";

vi.mock("dotenv", () => ({
	config: vi.fn(),
}));

describe("Env", () => {
	describe("loadEnvFiles", () => {
		it("should load .env.local before .env without overriding", () => {
			vi.mocked(dotenvConfig).mockClear();

			loadEnvFiles();

			expect(dotenvConfig).toHaveBeenNthCalledWith(1, { path: ".env.local", quiet: true });
			expect(dotenvConfig).toHaveBeenNthCalledWith(2, { path: ".env", quiet: true });
		});
	});
});
