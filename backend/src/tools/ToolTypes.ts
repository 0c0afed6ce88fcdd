import type { AuditService } from "../audit";
import type { GatewaySettings } from "../config/GatewaySettings";
import type { BackendApiClient } from "../services/BackendApiClient";
import type { GraphQueryClient } from "../services/GraphQueryClient";
import type { ProcessRunner } from "../util/ProcessRunner";
import type { z } from "zod";

/**
 * Dependencies shared by every tool executor.
 */
export interface ToolDeps {
	readonly settings: GatewaySettings;
	readonly runner: ProcessRunner;
	readonly graph: GraphQueryClient;
	readonly backend: BackendApiClient;
	readonly audit: AuditService;
}

/**
 * A tool as written: an argument schema paired with an executor typed by it.
 */
export interface ToolDefinition<S extends z.ZodTypeAny, R> {
	readonly name: string;
	readonly description: string;
	readonly schema: S;
	/**
	 * Present on destructive tools. The dispatcher runs them only when `confirm` is `true`;
	 * otherwise it answers "Must set confirm=true to <action>".
	 */
	readonly destructive?: { readonly action: string };
	execute(deps: ToolDeps, args: z.output<S>): Promise<R>;
}

export type ArgumentCheck =
	| { readonly success: true; invoke(deps: ToolDeps): Promise<unknown> }
	| { readonly success: false; readonly error: string };

/**
 * A tool as stored in the registry, with its argument type erased behind `checkArguments`.
 */
export interface RegisteredTool {
	readonly name: string;
	readonly description: string;
	readonly schema: z.ZodTypeAny;
	readonly destructive?: { readonly action: string } | undefined;
	/**
	 * Validates a loosely-typed argument map, filling declared defaults.
	 * On success the returned `invoke` runs the executor with the parsed arguments.
	 */
	checkArguments(args: Record<string, unknown>): ArgumentCheck;
}

/**
 * Formats zod issues as "path: message" pairs.
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

export function defineTool<S extends z.ZodTypeAny, R>(definition: ToolDefinition<S, R>): RegisteredTool {
	const { name, description, schema, destructive } = definition;
	return {
		name,
		description,
		schema,
		destructive,
		checkArguments(args) {
			const parsed = schema.safeParse(args);
			if (!parsed.success) {
				return { success: false, error: `Invalid arguments for ${name}: ${formatIssues(parsed.error)}` };
			}
			const data: z.output<S> = parsed.data;
			return { success: true, invoke: deps => definition.execute(deps, data) };
		},
	};
}
