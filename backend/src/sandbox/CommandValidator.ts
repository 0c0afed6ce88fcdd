import type { GatewaySettings } from "../config/GatewaySettings";
import { ToolError } from "../tools/ToolError";

/**
 * True when the raw command starts with one of the literal prefixes.
 * Only the prefix is checked: whatever follows it reaches the shell unchanged.
 */
export function isCommandAllowed(command: string, prefixes: ReadonlyArray<string>): boolean {
	return prefixes.some(prefix => command.startsWith(prefix));
}

/**
 * @throws ToolError with kind `access_denied` when no prefix matches
 */
export function requireAllowedCommand(command: string, settings: Pick<GatewaySettings, "commandPrefixes">): string {
	if (!isCommandAllowed(command, settings.commandPrefixes)) {
		throw new ToolError(
			"access_denied",
			`Command not allowed. Must start with one of: ${settings.commandPrefixes.map(p => JSON.stringify(p)).join(", ")}`,
		);
	}
	return command;
}
