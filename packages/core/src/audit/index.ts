import { DrizzleAuditLogger } from './audit-logger';

export interface AuditEntry {
  /** Acting member; null for unauthenticated events such as a failed login. */
  userId: string | null;
  action: string;
  entityType: string;
  entityId: string;
  changes?: Record<string, { old: unknown; new: unknown }>;
  metadata?: Record<string, unknown>;
  ipAddress?: string;
}

export interface AuditLogger {
  /** Never throws: a failed write is logged and dropped. */
  log(entry: AuditEntry): Promise<void>;
}

// ── Singleton ────────────────────────────────────────────────────

let _auditLogger: AuditLogger | null = null;

export function getAuditLogger(): AuditLogger {
  if (!_auditLogger) {
    _auditLogger = new DrizzleAuditLogger();
  }
  return _auditLogger;
}

export function setAuditLogger(logger: AuditLogger): void {
  _auditLogger = logger;
}

// ── Re-exports ───────────────────────────────────────────────────

export { DrizzleAuditLogger } from './audit-logger';
export { auditLog, logMemberAction, logFinancialAction, logApproval, logLogin } from './helpers';
export { computeChanges } from './diff';
export { getEntityLogs, getUserActivity, searchAuditLogs } from './queries';
export type { AuditLogRow, SearchAuditLogsInput } from './queries';
export { cleanupAuditLogs } from './retention';
