import { getLog } from "../util/Logger";
import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

const log = getLog(import.meta);

/**
 * Metadata keys whose values are never written to the audit trail (compared lower-cased)
 */
const SENSITIVE_FIELDS = new Set([
	"password",
	"secret",
	"token",
	"apikey",
	"api_key",
	"privatekey",
	"accesstoken",
	"refreshtoken",
	"clientsecret",
	"authorization",
]);

/**
 * Maximum length for string values in audit logs
 */
const MAX_STRING_LENGTH = 1000;

/**
 * Maximum number of array items kept in audit metadata
 */
const MAX_ARRAY_LENGTH = 100;

export type AuditAction = "service.restart" | "record.reanalyze" | "record.hide";

export type AuditOutcome = "success" | "failure";

/**
 * Parameters for logging an audit event
 */
export interface AuditLogParams {
	/** The action that was performed */
	readonly action: AuditAction;
	/** Name of the tool that performed it */
	readonly tool: string;
	/** The service or record acted upon */
	readonly target: string;
	readonly outcome: AuditOutcome;
	/** Additional metadata about the event; sensitive keys are redacted */
	readonly metadata?: Record<string, unknown>;
}

/**
 * One line of the audit trail
 */
export interface AuditEvent {
	readonly timestamp: string;
	readonly action: AuditAction;
	readonly tool: string;
	readonly target: string;
	readonly outcome: AuditOutcome;
	readonly metadata: Record<string, unknown>;
}

/**
 * Service for logging audit events
 */
export interface AuditService {
	/**
	 * Log an audit event and wait for the write. A failed write is logged, never thrown.
	 */
	log(params: AuditLogParams): Promise<void>;
}

export interface AuditServiceOptions {
	/** When false, events only reach the application log */
	readonly enabled: boolean;
	/** JSON-lines file the events are appended to */
	readonly filePath: string;
	/** Appends one line to the file; defaults to creating the directory and appending */
	readonly append?: (filePath: string, line: string) => Promise<void>;
}

async function appendLine(filePath: string, line: string): Promise<void> {
	await mkdir(dirname(filePath), { recursive: true });
	await appendFile(filePath, line, "utf8");
}

/**
 * Check if a field is a sensitive field that should be completely redacted
 */
function isSensitiveField(fieldName: string): boolean {
	return SENSITIVE_FIELDS.has(fieldName.toLowerCase());
}

/**
 * Sanitize a value for audit logging: redacts sensitive keys and summarizes long strings and arrays
 */
export function sanitizeValue(value: unknown, fieldName?: string): unknown {
	if (fieldName && isSensitiveField(fieldName)) {
		return "[REDACTED]";
	}

	if (value === null || value === undefined) {
		return value;
	}

	if (typeof value === "string") {
		return value.length > MAX_STRING_LENGTH ? `[${value.length} characters]` : value;
	}

	if (Array.isArray(value)) {
		if (value.length > MAX_ARRAY_LENGTH) {
			return `[Array of ${value.length} items]`;
		}
		return value.map(item => sanitizeValue(item));
	}

	if (typeof value === "object") {
		const sanitized: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(value)) {
			sanitized[key] = sanitizeValue(val, key);
		}
		return sanitized;
	}

	return value;
}

function sanitizeMetadata(metadata: Record<string, unknown> | undefined): Record<string, unknown> {
	const sanitized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(metadata ?? {})) {
		sanitized[key] = sanitizeValue(value, key);
	}
	return sanitized;
}

/**
 * Create an AuditService instance
 */
export function createAuditService(options: AuditServiceOptions): AuditService {
	const { enabled, filePath, append = appendLine } = options;

	return {
		log: logAuditEvent,
	};

	async function logAuditEvent(params: AuditLogParams): Promise<void> {
		const event: AuditEvent = {
			timestamp: new Date().toISOString(),
			action: params.action,
			tool: params.tool,
			target: params.target,
			outcome: params.outcome,
			metadata: sanitizeMetadata(params.metadata),
		};

		log.info({ audit: event }, "Audit %s %s: %s", event.action, event.target, event.outcome);

		if (!enabled) {
			return;
		}

		try {
			await append(filePath, `${JSON.stringify(event)}\n`);
		} catch (error) {
			// Log the error but don't fail the request
			log.error(error, "Failed to write audit event for %s %s", params.action, params.target);
		}
	}
}
