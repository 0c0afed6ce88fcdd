import { extractCredential, INVALID_API_KEY_MESSAGE, isAuthorized } from "../auth/ApiKeyAuth";
import type { GatewaySettings } from "../config/GatewaySettings";
import { getLog } from "../util/Logger";
import type { NextFunction, Request, RequestHandler, Response } from "express";

const log = getLog(import.meta);

/**
 * Middleware for the REST surface: answers 401 unless the request carries a configured API key.
 */
export function requireApiKey(settings: Pick<GatewaySettings, "apiKeys">): RequestHandler {
	return (req: Request, res: Response, next: NextFunction) => {
		if (!isAuthorized(extractCredential(req), settings)) {
			log.warn("Rejected unauthenticated request to %s %s", req.method, req.originalUrl.split("?")[0]);
			res.status(401).json({ error: INVALID_API_KEY_MESSAGE });
			return;
		}
		next();
	};
}
