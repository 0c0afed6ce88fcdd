import { API_KEY_QUERY_PARAM } from "../auth/ApiKeyAuth";
import type { GatewaySettings } from "../config/GatewaySettings";
import { requireApiKey } from "../middleware/ApiKeyMiddleware";
import type { DispatchErrorKind, ToolDispatcher } from "../tools/ToolDispatcher";
import type { ToolRegistry } from "../tools/ToolRegistry";
import express, { type Request, type Response, type Router } from "express";
import { z } from "zod";

export interface ToolRouterOptions {
	registry: ToolRegistry;
	dispatcher: ToolDispatcher;
	settings: Pick<GatewaySettings, "apiKeys">;
}

const STATUS_BY_KIND: Record<DispatchErrorKind, number> = {
	unknown_tool: 400,
	invalid_arguments: 400,
	access_denied: 403,
	not_found: 404,
	internal: 500,
};

const propertyTypesSchema = z.object({
	properties: z.record(z.object({ type: z.union([z.string(), z.array(z.string())]).optional() })).default({}),
});

const bodySchema = z.record(z.unknown());

function coerceValue(value: string, types: ReadonlyArray<string>): unknown {
	if ((types.includes("integer") || types.includes("number")) && value.trim() !== "") {
		const number = Number(value);
		if (!Number.isNaN(number)) {
			return number;
		}
	}
	if (types.includes("boolean") && (value === "true" || value === "false")) {
		return value === "true";
	}
	if (types.includes("object") || types.includes("array")) {
		try {
			const parsed: unknown = JSON.parse(value);
			return parsed;
		} catch {
			return value;
		}
	}
	return value;
}

/**
 * Converts query-string values to the primitive types the tool's input schema declares.
 * Values that do not convert stay strings, so schema validation reports them. The API key parameter is dropped.
 */
export function coerceQueryArguments(
	query: Request["query"],
	inputSchema: Record<string, unknown>,
): Record<string, unknown> {
	const parsedSchema = propertyTypesSchema.safeParse(inputSchema);
	const properties = parsedSchema.success ? parsedSchema.data.properties : {};
	const args: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(query)) {
		if (key === API_KEY_QUERY_PARAM) {
			continue;
		}
		if (typeof value !== "string") {
			args[key] = value;
			continue;
		}
		const type = properties[key]?.type;
		args[key] = type === undefined ? value : coerceValue(value, typeof type === "string" ? [type] : type);
	}
	return args;
}

/**
 * Legacy REST surface mounted at `/mcp/tools`. Every route requires an API key.
 */
export function createToolRouter(options: ToolRouterOptions): Router {
	const { registry, dispatcher, settings } = options;
	const router = express.Router();

	router.use(requireApiKey(settings));

	async function respond(res: Response, name: string, args: Record<string, unknown>): Promise<void> {
		const outcome = await dispatcher.dispatch(name, args);
		if (outcome.ok) {
			res.json(outcome.value);
			return;
		}
		res.status(STATUS_BY_KIND[outcome.error.kind]).json({ error: outcome.error.message });
	}

	function queryArguments(name: string, query: Request["query"]): Record<string, unknown> {
		const tool = registry.list().find(descriptor => descriptor.name === name);
		return coerceQueryArguments(query, tool?.inputSchema ?? {});
	}

	router.get("/tail_logs/:service", async (req, res) => {
		await respond(res, "tail_logs", { ...queryArguments("tail_logs", req.query), service: req.params.service });
	});

	router.get("/:toolName", async (req, res) => {
		const name = req.params.toolName;
		await respond(res, name, queryArguments(name, req.query));
	});

	router.post("/:toolName", async (req, res) => {
		const body = bodySchema.safeParse(req.body ?? {});
		if (!body.success) {
			res.status(400).json({ error: "Request body must be a JSON object" });
			return;
		}
		await respond(res, req.params.toolName, body.data);
	});

	return router;
}
