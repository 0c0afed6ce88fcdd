import {
	type CallToolResult,
	type InitializeResult,
	isProtocolErrorResponse,
	JSON_RPC_VERSION,
	type ListToolsResult,
	type ProtocolErrorCode,
	type ProtocolRequest,
	type ProtocolResponse,
	type ToolDescriptor,
} from "../types/Protocol";

export const API_KEY_HEADER = "X-API-Key";

export interface HealthResponse {
	status: string;
	service: string;
	timestamp: string;
}

/**
 * Raised when the gateway answers a protocol call with a JSON-RPC error.
 */
export class GatewayProtocolError extends Error {
	readonly code: ProtocolErrorCode;

	constructor(code: ProtocolErrorCode, message: string) {
		super(message);
		this.name = "GatewayProtocolError";
		this.code = code;
	}
}

export interface GatewayClient {
	/**
	 * Performs the protocol handshake. Does not require an API key.
	 */
	initialize(): Promise<InitializeResult>;
	/**
	 * Lists the tool catalog.
	 * @throws GatewayProtocolError if the key is rejected
	 */
	listTools(): Promise<ReadonlyArray<ToolDescriptor>>;
	/**
	 * Calls a tool over the protocol surface. Tool failures come back with `isError: true`.
	 * @throws GatewayProtocolError on protocol-level errors
	 */
	callTool(name: string, args?: Record<string, unknown>): Promise<CallToolResult>;
	/**
	 * Calls a tool over the legacy REST surface and returns the tool value.
	 * @throws Error with the gateway's message if the call is not successful
	 */
	callRestTool<T = unknown>(name: string, args?: Record<string, unknown>): Promise<T>;
	/**
	 * Reads the unauthenticated health endpoint.
	 */
	health(): Promise<HealthResponse>;
}

async function readJson<T>(response: Response): Promise<T> {
	return (await response.json()) as T;
}

export function createGatewayClient(baseUrl: string, apiKey?: string): GatewayClient {
	let nextId = 1;

	return {
		initialize,
		listTools,
		callTool,
		callRestTool,
		health,
	};

	function createRequest(method: "GET" | "POST", body?: unknown): RequestInit {
		const headers: Record<string, string> = {};
		if (apiKey) {
			headers[API_KEY_HEADER] = apiKey;
		}
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
		}
		return {
			method,
			headers,
			body: body !== undefined ? JSON.stringify(body) : null,
		};
	}

	async function rpc<T>(method: string, params?: Record<string, unknown>): Promise<T> {
		const request: ProtocolRequest = {
			jsonrpc: JSON_RPC_VERSION,
			id: nextId++,
			method,
			...(params ? { params } : {}),
		};
		const response = await fetch(`${baseUrl}/mcp`, createRequest("POST", request));
		if (!response.ok) {
			throw new Error(`Gateway request ${method} failed: ${response.status} ${response.statusText}`);
		}
		const body = await readJson<ProtocolResponse<T>>(response);
		if (isProtocolErrorResponse(body)) {
			throw new GatewayProtocolError(body.error.code, body.error.message);
		}
		return body.result;
	}

	function initialize(): Promise<InitializeResult> {
		return rpc<InitializeResult>("initialize");
	}

	async function listTools(): Promise<ReadonlyArray<ToolDescriptor>> {
		const result = await rpc<ListToolsResult>("tools/list");
		return result.tools;
	}

	function callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
		return rpc<CallToolResult>("tools/call", { name, arguments: args });
	}

	async function callRestTool<T>(name: string, args: Record<string, unknown> = {}): Promise<T> {
		const response = await fetch(`${baseUrl}/mcp/tools/${encodeURIComponent(name)}`, createRequest("POST", args));
		if (!response.ok) {
			const errorData = await readJson<{ error?: string }>(response).catch(() => ({ error: undefined }));
			const message = errorData.error || response.statusText;
			throw new Error(`Tool ${name} failed: ${message}`);
		}
		return readJson<T>(response);
	}

	async function health(): Promise<HealthResponse> {
		const response = await fetch(`${baseUrl}/health`, createRequest("GET"));
		if (!response.ok) {
			throw new Error(`Health check failed: ${response.statusText}`);
		}
		return readJson<HealthResponse>(response);
	}
}
