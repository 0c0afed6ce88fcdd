/**
 * True when a filesystem error carries one of the given `code`s.
 */
export function hasErrorCode(error: unknown, ...codes: Array<string>): boolean {
	return error instanceof Error && "code" in error && typeof error.code === "string" && codes.includes(error.code);
}
