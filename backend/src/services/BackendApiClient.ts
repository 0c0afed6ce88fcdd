import { getLog } from "../util/Logger";
import { API_KEY_HEADER } from "opsgate-common";

const log = getLog(import.meta);

/**
 * Response from the application backend. The body is parsed JSON, or `{ raw }` when it is not JSON.
 */
export interface BackendResponse {
	readonly ok: boolean;
	readonly status: number;
	readonly body: unknown;
}

/**
 * Client for the internal application backend.
 * Non-2xx responses resolve with `ok: false`; network failures and timeouts reject.
 */
export interface BackendApiClient {
	getStats(): Promise<BackendResponse>;
	triggerReanalysis(recordId: string): Promise<BackendResponse>;
	hideRecord(recordId: string, reason?: string): Promise<BackendResponse>;
}

export interface BackendApiClientOptions {
	readonly baseUrl: string;
	readonly apiKey?: string | undefined;
	readonly timeoutMs: number;
}

export function createBackendApiClient(options: BackendApiClientOptions): BackendApiClient {
	const baseUrl = options.baseUrl.replace(/\/+$/, "");

	return {
		getStats,
		triggerReanalysis,
		hideRecord,
	};

	function createRequest(method: "GET" | "POST", body?: unknown): RequestInit {
		const headers: Record<string, string> = {};
		if (options.apiKey) {
			headers[API_KEY_HEADER] = options.apiKey;
		}
		if (body !== undefined) {
			headers["Content-Type"] = "application/json";
		}
		return {
			method,
			headers,
			body: body !== undefined ? JSON.stringify(body) : null,
			signal: AbortSignal.timeout(options.timeoutMs),
		};
	}

	async function send(path: string, request: RequestInit): Promise<BackendResponse> {
		const response = await fetch(`${baseUrl}${path}`, request);
		const text = await response.text();
		let body: unknown;
		try {
			body = JSON.parse(text);
		} catch {
			body = { raw: text };
		}
		if (!response.ok) {
			log.warn({ path, status: response.status }, "Backend request failed");
		}
		return { ok: response.ok, status: response.status, body };
	}

	function getStats(): Promise<BackendResponse> {
		return send("/api/stats", createRequest("GET"));
	}

	function triggerReanalysis(recordId: string): Promise<BackendResponse> {
		return send(`/api/records/${encodeURIComponent(recordId)}/reanalyze`, createRequest("POST", {}));
	}

	function hideRecord(recordId: string, reason?: string): Promise<BackendResponse> {
		return send(
			`/api/records/${encodeURIComponent(recordId)}/hide`,
			createRequest("POST", reason !== undefined ? { reason } : {}),
		);
	}
}
