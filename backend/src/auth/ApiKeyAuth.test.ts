import { type CredentialSource, extractCredential, isAuthorized } from "./ApiKeyAuth";
import { describe, expect, it } from "vitest";

function request(headers: Record<string, string>, query: CredentialSource["query"] = {}): CredentialSource {
	const lowered = new Map(Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]));
	return {
		header: name => lowered.get(name.toLowerCase()),
		query,
	};
}

describe("ApiKeyAuth", () => {
	const settings = { apiKeys: new Set(["test-key-1", "test-key-2"]) };

	describe("extractCredential", () => {
		it("reads the X-API-Key header", () => {
			expect(extractCredential(request({ "X-API-Key": "test-key-1" }))).toBe("test-key-1");
		});

		it("prefers the header over the query parameter", () => {
			expect(extractCredential(request({ "x-api-key": "test-key-1" }, { key: "test-key-2" }))).toBe("test-key-1");
		});

		it("falls back to the key query parameter", () => {
			expect(extractCredential(request({}, { key: "test-key-2" }))).toBe("test-key-2");
		});

		it("ignores a repeated or empty query parameter", () => {
			expect(extractCredential(request({}, { key: ["a", "b"] }))).toBeUndefined();
			expect(extractCredential(request({}, { key: "" }))).toBeUndefined();
		});

		it("returns undefined when no credential is present", () => {
			expect(extractCredential(request({}))).toBeUndefined();
		});
	});

	describe("isAuthorized", () => {
		it("accepts a configured key", () => {
			expect(isAuthorized("test-key-2", settings)).toBe(true);
		});

		it("rejects an unknown, near-miss or missing key", () => {
			expect(isAuthorized("test-key-3", settings)).toBe(false);
			expect(isAuthorized("test-key-1 ", settings)).toBe(false);
			expect(isAuthorized(undefined, settings)).toBe(false);
		});
	});
});
