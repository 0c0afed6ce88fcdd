import type { GatewaySettings } from "../config/GatewaySettings";
import type { Request } from "express";
import { API_KEY_HEADER } from "opsgate-common";

/** Query parameter accepted in place of the header, for clients that cannot set headers. */
export const API_KEY_QUERY_PARAM = "key";

export const INVALID_API_KEY_MESSAGE = "Invalid or missing API key";

/** The parts of an Express request a credential is read from. */
export interface CredentialSource {
	header(name: string): string | undefined;
	readonly query: Request["query"];
}

/**
 * Reads the API key from the `X-API-Key` header, falling back to the `key` query parameter.
 */
export function extractCredential(req: CredentialSource): string | undefined {
	const header = req.header(API_KEY_HEADER);
	if (header) {
		return header;
	}
	const query = req.query[API_KEY_QUERY_PARAM];
	return typeof query === "string" && query.length > 0 ? query : undefined;
}

export function isAuthorized(
	credential: string | undefined,
	settings: Pick<GatewaySettings, "apiKeys">,
): credential is string {
	return credential !== undefined && settings.apiKeys.has(credential);
}
