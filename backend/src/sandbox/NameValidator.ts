import type { GatewaySettings } from "../config/GatewaySettings";
import { ToolError } from "../tools/ToolError";

export function isAllowedService(service: string, settings: Pick<GatewaySettings, "allowedServices">): boolean {
	return settings.allowedServices.includes(service);
}

/**
 * @throws ToolError with kind `invalid_arguments` for a service outside the allowlist
 */
export function requireAllowedService(service: string, settings: Pick<GatewaySettings, "allowedServices">): string {
	if (!isAllowedService(service, settings)) {
		throw new ToolError(
			"invalid_arguments",
			`Unknown service: ${service}. Allowed: ${settings.allowedServices.join(", ")}`,
		);
	}
	return service;
}

/**
 * Resolves a repository name to its configured checkout directory.
 * @throws ToolError with kind `invalid_arguments` for an unknown repository
 */
export function requireRepoPath(repo: string, settings: Pick<GatewaySettings, "repoPaths">): string {
	const path = settings.repoPaths.get(repo);
	if (path === undefined) {
		throw new ToolError(
			"invalid_arguments",
			`Unknown repo: ${repo}. Allowed: ${[...settings.repoPaths.keys()].join(", ")}`,
		);
	}
	return path;
}
