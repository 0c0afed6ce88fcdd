import type { RegisteredTool } from "./ToolTypes";
import type { ToolDescriptor } from "opsgate-common";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/**
 * Immutable catalog of the tools the gateway exposes.
 */
export interface ToolRegistry {
	/** Catalog entries in registration order; the same array on every call */
	list(): ReadonlyArray<ToolDescriptor>;
	get(name: string): RegisteredTool | undefined;
	names(): ReadonlyArray<string>;
}

/**
 * Derives a draft-07 JSON Schema object from a tool's argument schema, inlined without `$ref`s.
 */
export function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
	const jsonSchema: object = zodToJsonSchema(schema, { $refStrategy: "none", target: "jsonSchema7" });
	const inputSchema: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(jsonSchema)) {
		if (key !== "$schema") {
			inputSchema[key] = value;
		}
	}
	return inputSchema;
}

/**
 * Builds the registry once at start.
 * @throws Error when two tools share a name
 */
export function createToolRegistry(tools: ReadonlyArray<RegisteredTool>): ToolRegistry {
	const byName = new Map<string, RegisteredTool>();
	for (const tool of tools) {
		if (byName.has(tool.name)) {
			throw new Error(`Duplicate tool name: ${tool.name}`);
		}
		byName.set(tool.name, tool);
	}

	const catalog: ReadonlyArray<ToolDescriptor> = Object.freeze(
		tools.map(tool =>
			Object.freeze({
				name: tool.name,
				description: tool.description,
				inputSchema: toInputSchema(tool.schema),
			}),
		),
	);
	const names = Object.freeze(tools.map(tool => tool.name));

	return {
		list: () => catalog,
		get: name => byName.get(name),
		names: () => names,
	};
}
