/**
 * Failure categories a tool handler may signal. Each maps to a client error on the REST surface.
 */
export type ToolErrorKind = "access_denied" | "not_found" | "invalid_arguments";

/**
 * Thrown by sandbox checks and tool handlers when a call is refused before any side effect.
 */
export class ToolError extends Error {
	readonly kind: ToolErrorKind;

	constructor(kind: ToolErrorKind, message: string) {
		super(message);
		this.name = "ToolError";
		this.kind = kind;
	}
}
