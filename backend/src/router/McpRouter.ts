import { extractCredential, isAuthorized } from "../auth/ApiKeyAuth";
import type { GatewaySettings } from "../config/GatewaySettings";
import type { ToolDispatcher } from "../tools/ToolDispatcher";
import type { ToolRegistry } from "../tools/ToolRegistry";
import { formatIssues } from "../tools/ToolTypes";
import { getLog } from "../util/Logger";
import express, { type Router } from "express";
import {
	type CallToolResult,
	type InitializeResult,
	JSON_RPC_VERSION,
	type ListToolsResult,
	PROTOCOL_VERSION,
	ProtocolErrorCode,
	type ProtocolId,
	type ProtocolResponse,
} from "opsgate-common";
import { z } from "zod";

const log = getLog(import.meta);

export const AUTHENTICATION_REQUIRED_MESSAGE = "Authentication required: invalid or missing API key";

const requestSchema = z.object({
	jsonrpc: z.literal(JSON_RPC_VERSION),
	id: z.union([z.string(), z.number(), z.null()]).optional(),
	method: z.string().min(1),
	params: z.record(z.unknown()).optional(),
});

const callParamsSchema = z.object({
	name: z.string().min(1),
	arguments: z.record(z.unknown()).default({}),
});

const idSchema = z.object({ id: z.union([z.string(), z.number()]) });

export interface McpRouterOptions {
	registry: ToolRegistry;
	dispatcher: ToolDispatcher;
	settings: Pick<GatewaySettings, "apiKeys">;
	serverInfo: { name: string; version: string };
}

export type ProtocolHandler = (body: unknown, credential: string | undefined) => Promise<ProtocolResponse>;

function success(id: ProtocolId, result: unknown): ProtocolResponse {
	return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function protocolError(id: ProtocolId, code: ProtocolErrorCode, message: string): ProtocolResponse {
	return { jsonrpc: JSON_RPC_VERSION, id, error: { code, message } };
}

function textResult(value: unknown, isError: boolean): CallToolResult {
	const content = [{ type: "text" as const, text: JSON.stringify(value ?? null, null, 2) }];
	return isError ? { content, isError } : { content };
}

/**
 * Handles one protocol request. Stateless: every call carries its own credential.
 * Never rejects; failures become JSON-RPC error responses that echo the caller's id.
 */
export function createProtocolHandler(options: McpRouterOptions): ProtocolHandler {
	const { registry, dispatcher, settings, serverInfo } = options;

	return async (body, credential) => {
		const parsed = requestSchema.safeParse(body);
		if (!parsed.success) {
			const recovered = idSchema.safeParse(body);
			return protocolError(
				recovered.success ? recovered.data.id : null,
				ProtocolErrorCode.INVALID_REQUEST,
				"Invalid request",
			);
		}

		const { method, params = {} } = parsed.data;
		const id = parsed.data.id ?? null;

		if (method !== "initialize" && !isAuthorized(credential, settings)) {
			log.warn("Rejected unauthenticated protocol call: %s", method);
			return protocolError(id, ProtocolErrorCode.AUTHENTICATION_REQUIRED, AUTHENTICATION_REQUIRED_MESSAGE);
		}

		try {
			switch (method) {
				case "initialize": {
					const result: InitializeResult = {
						protocolVersion: PROTOCOL_VERSION,
						capabilities: { tools: {} },
						serverInfo,
					};
					return success(id, result);
				}
				case "notifications/initialized":
					return success(id, {});
				case "tools/list": {
					const result: ListToolsResult = { tools: registry.list() };
					return success(id, result);
				}
				case "tools/call": {
					const call = callParamsSchema.safeParse(params);
					if (!call.success) {
						return protocolError(
							id,
							ProtocolErrorCode.INVALID_PARAMS,
							`Invalid params for tools/call: ${formatIssues(call.error)}`,
						);
					}
					const outcome = await dispatcher.dispatch(call.data.name, call.data.arguments);
					return success(
						id,
						outcome.ok ? textResult(outcome.value, false) : textResult({ error: outcome.error.message }, true),
					);
				}
				default:
					return protocolError(id, ProtocolErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`);
			}
		} catch (error) {
			log.error(error, "Protocol method %s failed", method);
			return protocolError(id, ProtocolErrorCode.INTERNAL_ERROR, "Internal error");
		}
	};
}

/**
 * Protocol surface mounted at `/mcp`. Errors are carried in the JSON-RPC body with HTTP 200.
 */
export function createMcpRouter(options: McpRouterOptions): Router {
	const router = express.Router();
	const handle = createProtocolHandler(options);

	router.post("/", async (req, res) => {
		res.json(await handle(req.body, extractCredential(req)));
	});

	return router;
}
