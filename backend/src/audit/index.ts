// Audit trail module exports

export type { AuditAction, AuditEvent, AuditLogParams, AuditOutcome, AuditService, AuditServiceOptions } from "./AuditService";
export { createAuditService, sanitizeValue } from "./AuditService";
