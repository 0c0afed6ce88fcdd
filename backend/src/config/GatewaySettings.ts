import type { Config } from "./Config";

/**
 * Immutable allowlists and limits consumed by the auth gate, the sandbox validators and the tools.
 * Built once at start and passed by reference.
 */
export interface GatewaySettings {
	readonly apiKeys: ReadonlySet<string>;
	/** Base directories a path must lie under, as configured (canonicalized on use) */
	readonly allowedPaths: ReadonlyArray<string>;
	/** Matched against the lower-cased canonical path */
	readonly blockedPatterns: ReadonlyArray<RegExp>;
	/** Service names in configuration order */
	readonly allowedServices: ReadonlyArray<string>;
	/** Repository name to checkout directory */
	readonly repoPaths: ReadonlyMap<string, string>;
	/** Service name to the repository it is built from */
	readonly serviceRepos: ReadonlyMap<string, string>;
	readonly commandPrefixes: ReadonlyArray<string>;
	/** Directory holding the docker compose project */
	readonly composeDirectory: string;
	readonly fileReadMaxChars: number;
}

export type SettingsSource = Pick<
	Config,
	| "API_KEYS"
	| "ALLOWED_PATHS"
	| "BLOCKED_PATH_PATTERNS"
	| "ALLOWED_SERVICES"
	| "REPO_PATHS"
	| "SERVICE_REPOS"
	| "ALLOWED_COMMAND_PREFIXES"
	| "COMPOSE_DIRECTORY"
	| "FILE_READ_MAX_CHARS"
>;

export function createGatewaySettings(config: SettingsSource): GatewaySettings {
	return Object.freeze({
		apiKeys: new Set(config.API_KEYS),
		allowedPaths: Object.freeze([...config.ALLOWED_PATHS]),
		blockedPatterns: Object.freeze(config.BLOCKED_PATH_PATTERNS.map(pattern => new RegExp(pattern))),
		allowedServices: Object.freeze([...config.ALLOWED_SERVICES]),
		repoPaths: new Map(Object.entries(config.REPO_PATHS)),
		serviceRepos: new Map(Object.entries(config.SERVICE_REPOS)),
		commandPrefixes: Object.freeze([...config.ALLOWED_COMMAND_PREFIXES]),
		composeDirectory: config.COMPOSE_DIRECTORY,
		fileReadMaxChars: config.FILE_READ_MAX_CHARS,
	});
}
