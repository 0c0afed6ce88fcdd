import type { GatewaySettings } from "../config/GatewaySettings";
import { requireApiKey } from "../middleware/ApiKeyMiddleware";
import type { ToolRegistry } from "../tools/ToolRegistry";
import express, { type Router } from "express";
import type { HealthResponse } from "opsgate-common";

export interface StatusRouterOptions {
	registry: ToolRegistry;
	settings: Pick<GatewaySettings, "apiKeys" | "allowedServices" | "repoPaths">;
	/** Name reported by the health check */
	serviceName: string;
	version: string;
}

export interface GatewayStatus {
	status: "running";
	version: string;
	tools: ReadonlyArray<string>;
	allowed_services: ReadonlyArray<string>;
	allowed_repos: ReadonlyArray<string>;
}

export function createStatusRouter(options: StatusRouterOptions): Router {
	const { registry, settings, serviceName, version } = options;
	const router = express.Router();

	/**
	 * Liveness endpoint for load balancers and container health checks. No authentication.
	 */
	router.get("/health", (_req, res) => {
		const body: HealthResponse = { status: "healthy", service: serviceName, timestamp: new Date().toISOString() };
		res.json(body);
	});

	router.get("/mcp/status", requireApiKey(settings), (_req, res) => {
		const body: GatewayStatus = {
			status: "running",
			version,
			tools: registry.names(),
			allowed_services: settings.allowedServices,
			allowed_repos: [...settings.repoPaths.keys()],
		};
		res.json(body);
	});

	return router;
}
