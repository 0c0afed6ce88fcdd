/**
 * Wire types shared by the gateway and its clients.
 * The protocol surface is JSON-RPC 2.0 shaped: one request per HTTP call, no session.
 */

export const JSON_RPC_VERSION = "2.0";

/**
 * Protocol revision reported by `initialize`.
 */
export const PROTOCOL_VERSION = "2024-11-05";

/**
 * Error codes used on the protocol surface.
 */
export const ProtocolErrorCode = {
	PARSE_ERROR: -32700,
	INVALID_REQUEST: -32600,
	METHOD_NOT_FOUND: -32601,
	INVALID_PARAMS: -32602,
	INTERNAL_ERROR: -32603,
	AUTHENTICATION_REQUIRED: -32001,
} as const;

export type ProtocolErrorCode = (typeof ProtocolErrorCode)[keyof typeof ProtocolErrorCode];

export type ProtocolId = string | number | null;

export interface ProtocolRequest {
	readonly jsonrpc: typeof JSON_RPC_VERSION;
	readonly id?: ProtocolId;
	readonly method: string;
	readonly params?: Record<string, unknown>;
}

export interface ProtocolError {
	readonly code: ProtocolErrorCode;
	readonly message: string;
}

export interface ProtocolSuccessResponse<T = unknown> {
	readonly jsonrpc: typeof JSON_RPC_VERSION;
	readonly id: ProtocolId;
	readonly result: T;
}

export interface ProtocolErrorResponse {
	readonly jsonrpc: typeof JSON_RPC_VERSION;
	readonly id: ProtocolId;
	readonly error: ProtocolError;
}

export type ProtocolResponse<T = unknown> = ProtocolSuccessResponse<T> | ProtocolErrorResponse;

export function isProtocolErrorResponse(response: ProtocolResponse): response is ProtocolErrorResponse {
	return "error" in response;
}

/**
 * Catalog entry returned by `tools/list`.
 */
export interface ToolDescriptor {
	readonly name: string;
	readonly description: string;
	/** JSON Schema (draft 7) object describing the tool's arguments */
	readonly inputSchema: Record<string, unknown>;
}

export interface InitializeResult {
	readonly protocolVersion: string;
	readonly capabilities: { readonly tools: Record<string, never> };
	readonly serverInfo: { readonly name: string; readonly version: string };
}

export interface ListToolsResult {
	readonly tools: ReadonlyArray<ToolDescriptor>;
}

export interface TextContent {
	readonly type: "text";
	readonly text: string;
}

export interface CallToolResult {
	readonly content: ReadonlyArray<TextContent>;
	readonly isError?: boolean;
}

/**
 * Normalized outcome of one spawned command.
 * A non-zero exit or a timeout is reported here, never thrown.
 */
export interface ExecutionResult {
	readonly stdout: string;
	readonly stderr: string;
	/** Process exit code; -1 when the process timed out or could not be started */
	readonly exitCode: number;
	readonly success: boolean;
	readonly timedOut: boolean;
}
