import type { GatewaySettings } from "../config/GatewaySettings";
import { ToolError } from "../tools/ToolError";
import { getLog } from "../util/Logger";
import { realpath } from "node:fs/promises";
import { basename, dirname, join, resolve, sep } from "node:path";

const log = getLog(import.meta);

export type PathCheck = { allowed: true; path: string } | { allowed: false; reason: string };

export type PathRules = Pick<GatewaySettings, "allowedPaths" | "blockedPatterns">;

function isMissing(error: unknown): boolean {
	return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Resolves a path to its absolute form with symlinks followed. For a path that does not exist yet,
 * the nearest existing ancestor is resolved and the remaining segments appended.
 * @throws any filesystem error other than a missing entry
 */
export async function canonicalizePath(input: string): Promise<string> {
	const absolute = resolve(input);
	const remainder: Array<string> = [];
	let current = absolute;
	for (;;) {
		try {
			const real = await realpath(current);
			return remainder.length > 0 ? join(real, ...remainder.reverse()) : real;
		} catch (error) {
			const parent = dirname(current);
			if (!isMissing(error) || parent === current) {
				throw error;
			}
			remainder.push(basename(current));
			current = parent;
		}
	}
}

/**
 * True when `path` equals `base` or lies below it. Both must be canonical.
 */
export function isWithin(path: string, base: string): boolean {
	if (path === base) {
		return true;
	}
	return path.startsWith(base.endsWith(sep) ? base : `${base}${sep}`);
}

async function canonicalBases(allowedPaths: ReadonlyArray<string>): Promise<Array<string>> {
	const bases: Array<string> = [];
	for (const base of allowedPaths) {
		try {
			bases.push(await canonicalizePath(base));
		} catch (error) {
			log.warn({ base, error }, "Skipping allowed path that cannot be resolved");
		}
	}
	return bases;
}

/** Matches the lower-cased path against the blocked patterns. */
export function isBlockedPath(path: string, rules: Pick<PathRules, "blockedPatterns">): boolean {
	const lowered = path.toLowerCase();
	return rules.blockedPatterns.some(pattern => pattern.test(lowered));
}

/**
 * Checks a caller-supplied path: it must resolve under an allowed base directory and must not
 * match a blocked pattern. Fails closed when the path cannot be resolved.
 */
export async function checkPath(input: string, rules: PathRules): Promise<PathCheck> {
	let canonical: string;
	try {
		canonical = await canonicalizePath(input);
	} catch (error) {
		log.warn({ path: input, error }, "Path could not be resolved");
		return { allowed: false, reason: `Access denied: ${input} could not be resolved` };
	}

	const bases = await canonicalBases(rules.allowedPaths);
	if (!bases.some(base => isWithin(canonical, base))) {
		return { allowed: false, reason: `Access denied: ${input} is outside allowed directories` };
	}

	if (isBlockedPath(canonical, rules)) {
		return { allowed: false, reason: `Access denied: ${input} matches blocked pattern` };
	}

	return { allowed: true, path: canonical };
}

/**
 * Like {@link checkPath}, returning the canonical path.
 * @throws ToolError with kind `access_denied` when the path is refused
 */
export async function requireAllowedPath(input: string, rules: PathRules): Promise<string> {
	const check = await checkPath(input, rules);
	if (!check.allowed) {
		throw new ToolError("access_denied", check.reason);
	}
	return check.path;
}
