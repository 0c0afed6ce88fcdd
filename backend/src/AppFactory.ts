import "./util/Env";
import { version } from "../package.json";
import { createAuditService } from "./audit";
import { type Config, getConfig } from "./config/Config";
import { createGatewaySettings, type GatewaySettings } from "./config/GatewaySettings";
import type { ExitHandler } from "./index";
import { createMcpRouter, protocolError } from "./router/McpRouter";
import { createStatusRouter } from "./router/StatusRouter";
import { createToolRouter } from "./router/ToolRouter";
import { createBackendApiClient } from "./services/BackendApiClient";
import { createGraphQueryClient } from "./services/GraphQueryClient";
import { createDefaultTools, createToolDispatcher, createToolRegistry, type RegisteredTool, type ToolDeps } from "./tools";
import { getLog } from "./util/Logger";
import { createProcessRunner } from "./util/ProcessRunner";
import cors from "cors";
import type { ErrorRequestHandler, Express } from "express";
import express from "express";
import morgan from "morgan";
import { API_KEY_HEADER, ProtocolErrorCode } from "opsgate-common";

const log = getLog(import.meta);

export const SERVICE_NAME = "opsgate";

export interface ExpressAppOptions {
	deps: ToolDeps;
	corsOrigins: ReadonlyArray<string>;
	/** Defaults to the full gateway catalog */
	tools?: ReadonlyArray<RegisteredTool>;
}

function isMalformedJson(error: unknown): boolean {
	return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

/** Status set by the body parser for a request it refuses, such as an oversized body. */
function clientErrorStatus(error: unknown): number | undefined {
	if (error instanceof Error && "status" in error && typeof error.status === "number") {
		return error.status >= 400 && error.status < 500 ? error.status : undefined;
	}
	return;
}

/**
 * The protocol route answers a malformed body with a JSON-RPC parse error; every other route with a 400.
 * Anything else becomes a bare 500 with no stack trace.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
	if (isMalformedJson(error)) {
		const path = req.path.replace(/\/+$/, "");
		if (path === "/mcp") {
			res.json(protocolError(null, ProtocolErrorCode.PARSE_ERROR, "Parse error"));
		} else {
			res.status(400).json({ error: "Malformed JSON body" });
		}
		return;
	}
	const status = clientErrorStatus(error);
	if (status !== undefined) {
		res.status(status).json({ error: "Request rejected" });
		return;
	}
	log.error(error, "Unhandled error for %s %s", req.method, req.path);
	res.status(500).json({ error: "Internal server error" });
};

/**
 * Builds the dependencies shared by every tool from the validated config.
 */
export function createToolDeps(config: Config, settings: GatewaySettings = createGatewaySettings(config)): ToolDeps {
	return {
		settings,
		runner: createProcessRunner(),
		graph: createGraphQueryClient({
			uri: config.NEO4J_URI,
			username: config.NEO4J_USERNAME,
			password: config.NEO4J_PASSWORD,
			database: config.NEO4J_DATABASE,
			timeoutMs: config.NEO4J_QUERY_TIMEOUT_MS,
		}),
		backend: createBackendApiClient({
			baseUrl: config.BACKEND_API_URL,
			apiKey: config.BACKEND_API_KEY,
			timeoutMs: config.BACKEND_API_TIMEOUT_MS,
		}),
		audit: createAuditService({ enabled: config.AUDIT_ENABLED, filePath: config.AUDIT_LOG_PATH }),
	};
}

/**
 * Creates the Express app without starting the server.
 */
export function createExpressApp(options: ExpressAppOptions): Express {
	const { deps, corsOrigins, tools = createDefaultTools() } = options;
	const registry = createToolRegistry(tools);
	const dispatcher = createToolDispatcher(registry, deps);
	const { settings } = deps;

	log.info("Registered %d tools: %s", registry.names().length, registry.names().join(", "));

	const app = express();
	app.disable("x-powered-by");

	app.use(
		morgan(":method :url :status :res[content-length] - :response-time ms", {
			stream: {
				write: (message: string) => {
					// the key may travel in the query string
					log.debug(message.trim().replace(/([?&]key=)[^&\s]*/g, "$1[REDACTED]"));
				},
			},
		}),
	);

	app.use(
		cors({
			origin: corsOrigins.includes("*") ? "*" : [...corsOrigins],
			allowedHeaders: ["Content-Type", API_KEY_HEADER],
		}),
	);

	app.use(express.json({ limit: "1mb" }));

	app.use(createStatusRouter({ registry, settings, serviceName: SERVICE_NAME, version }));
	app.use("/mcp/tools", createToolRouter({ registry, dispatcher, settings }));
	app.use("/mcp", createMcpRouter({ registry, dispatcher, settings, serverInfo: { name: SERVICE_NAME, version } }));

	app.use(errorHandler);

	return app;
}

/**
 * Loads the config, builds the app and starts listening.
 */
export function createAndStartServer(): Express {
	log.info(`Opsgate v${version} starting up on Node ${process.version}`);

	const config = getConfig();
	const settings = createGatewaySettings(config);
	log.info(
		{ services: settings.allowedServices, paths: settings.allowedPaths, repos: [...settings.repoPaths.keys()] },
		"Gateway settings loaded",
	);

	const deps = createToolDeps(config, settings);
	const app = createExpressApp({ deps, corsOrigins: config.CORS_ORIGINS });

	const server = app.listen(config.PORT, config.HOST, () => log.info("ready on %s:%d", config.HOST, config.PORT));

	const shutdownHandlers: Array<ExitHandler> = [
		{ stop: () => deps.graph.close() },
		{
			stop: () =>
				new Promise<void>(resolve => {
					server.close(() => resolve());
				}),
		},
	];

	const signalListener = (signal: NodeJS.Signals) => {
		log.info("Exiting due to signal: %s", signal);
		Promise.allSettled(shutdownHandlers.map(handler => handler.stop(0))).then(
			() => process.exit(0),
			() => process.exit(1),
		);
	};

	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.once(signal, signalListener);
	}

	return app;
}
