import { createExpressApp, createToolDeps, errorHandler } from "./AppFactory";
import { getConfig, resetConfig } from "./config/Config";
import { createMockDeps, executionResult } from "./tools/ToolTestUtils";
import express, { type Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("./util/Logger", () => ({
	getLog: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

describe("AppFactory", () => {
	let app: Express;
	let mocks: ReturnType<typeof createMockDeps>;

	beforeEach(() => {
		vi.clearAllMocks();
		mocks = createMockDeps();
		app = createExpressApp({ deps: mocks.deps, corsOrigins: ["*"] });
	});

	it("serves the health check without credentials", async () => {
		const response = await request(app).get("/health");

		expect(response.status).toBe(200);
		expect(response.body).toMatchObject({ status: "healthy", service: "opsgate" });
	});

	it("requires credentials after an unauthenticated initialize", async () => {
		const init = await request(app).post("/mcp").send({ jsonrpc: "2.0", id: 1, method: "initialize" });
		const list = await request(app).post("/mcp").send({ jsonrpc: "2.0", id: 2, method: "tools/list" });

		expect(init.body.result.serverInfo.name).toBe("opsgate");
		expect(list.body.error.code).toBe(-32001);
	});

	it("lists all tools to an authenticated client", async () => {
		const response = await request(app)
			.post("/mcp")
			.set("X-API-Key", "test-key-1")
			.send({ jsonrpc: "2.0", id: 3, method: "tools/list" });

		expect(response.body.result.tools).toHaveLength(17);
	});

	it("routes REST calls through the same dispatcher", async () => {
		mocks.mockRunner.run.mockResolvedValue(executionResult({ stdout: "up\n" }));

		const response = await request(app).post("/mcp/tools/run_command").set("X-API-Key", "test-key-1").send({
			command: "uptime",
		});

		expect(response.status).toBe(200);
		expect(response.body).toEqual({ command: "uptime", success: true, stdout: "up\n", stderr: "" });
	});

	it("answers a malformed protocol body with a parse error", async () => {
		const response = await request(app).post("/mcp").set("Content-Type", "application/json").send("{not json");

		expect(response.status).toBe(200);
		expect(response.body).toEqual({ jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } });
	});

	it("answers a malformed REST body with a 400", async () => {
		const response = await request(app)
			.post("/mcp/tools/git")
			.set("X-API-Key", "test-key-1")
			.set("Content-Type", "application/json")
			.send("{not json");

		expect(response.status).toBe(400);
		expect(response.body).toEqual({ error: "Malformed JSON body" });
	});

	it("allows cross-origin requests from the configured origins", async () => {
		const restricted = createExpressApp({ deps: mocks.deps, corsOrigins: ["https://ops.example.com"] });

		const response = await request(restricted).get("/health").set("Origin", "https://ops.example.com");

		expect(response.headers["access-control-allow-origin"]).toBe("https://ops.example.com");
	});

	it("does not advertise the framework", async () => {
		const response = await request(app).get("/health");

		expect(response.headers["x-powered-by"]).toBeUndefined();
	});

	describe("errorHandler", () => {
		function appThrowing(error: unknown): Express {
			const failing = express();
			failing.get("/fail", () => {
				throw error;
			});
			failing.use(errorHandler);
			return failing;
		}

		it("hides unexpected errors behind a 500", async () => {
			const response = await request(appThrowing(new Error("database password is test-secret"))).get("/fail");

			expect(response.status).toBe(500);
			expect(response.body).toEqual({ error: "Internal server error" });
		});

		it("keeps a client error status", async () => {
			const tooLarge = Object.assign(new Error("request entity too large"), { status: 413 });

			const response = await request(appThrowing(tooLarge)).get("/fail");

			expect(response.status).toBe(413);
			expect(response.body).toEqual({ error: "Request rejected" });
		});
	});

	describe("createToolDeps", () => {
		beforeEach(() => {
			resetConfig();
		});

		it("builds settings and clients from the config", () => {
			vi.stubEnv("ALLOWED_SERVICES", "apis,nginx");

			const deps = createToolDeps(getConfig());

			expect(deps.settings.allowedServices).toEqual(["apis", "nginx"]);
			expect(deps.settings.apiKeys.has("test-key-1")).toBe(true);
			expect(typeof deps.runner.run).toBe("function");
			expect(typeof deps.graph.runReadQuery).toBe("function");
			expect(typeof deps.backend.getStats).toBe("function");
			expect(typeof deps.audit.log).toBe("function");
		});
	});
});
