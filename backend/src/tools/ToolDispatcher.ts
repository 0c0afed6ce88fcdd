import { getLog } from "../util/Logger";
import { ToolError, type ToolErrorKind } from "./ToolError";
import type { ToolRegistry } from "./ToolRegistry";
import type { ToolDeps } from "./ToolTypes";

const log = getLog(import.meta);

export type DispatchErrorKind = ToolErrorKind | "unknown_tool" | "internal";

export interface DispatchError {
	readonly kind: DispatchErrorKind;
	readonly message: string;
}

export type DispatchResult =
	| { readonly ok: true; readonly value: unknown }
	| { readonly ok: false; readonly error: DispatchError };

export const INTERNAL_ERROR_MESSAGE = "Internal error while executing tool";

/**
 * Single entry point shared by the protocol and REST surfaces.
 */
export interface ToolDispatcher {
	/**
	 * Resolves the tool, applies the confirmation gate, validates the arguments and runs the executor.
	 * Never rejects.
	 */
	dispatch(name: string, args: Record<string, unknown>): Promise<DispatchResult>;
}

export function createToolDispatcher(registry: ToolRegistry, deps: ToolDeps): ToolDispatcher {
	return { dispatch };

	async function dispatch(name: string, args: Record<string, unknown>): Promise<DispatchResult> {
		const tool = registry.get(name);
		if (!tool) {
			return { ok: false, error: { kind: "unknown_tool", message: `Unknown tool: ${name}` } };
		}

		if (tool.destructive && args.confirm !== true) {
			log.info("Refusing %s without confirmation", name);
			return { ok: true, value: { error: `Must set confirm=true to ${tool.destructive.action}` } };
		}

		const check = tool.checkArguments(args);
		if (!check.success) {
			log.warn("Tool argument validation failed for %s: %s", name, check.error);
			return { ok: false, error: { kind: "invalid_arguments", message: check.error } };
		}

		log.info("Executing tool: %s", name);
		try {
			return { ok: true, value: await check.invoke(deps) };
		} catch (error) {
			if (error instanceof ToolError) {
				log.warn("Tool %s refused: %s", name, error.message);
				return { ok: false, error: { kind: error.kind, message: error.message } };
			}
			log.error(error, "Tool %s failed", name);
			return { ok: false, error: { kind: "internal", message: INTERNAL_ERROR_MESSAGE } };
		}
	}
}
