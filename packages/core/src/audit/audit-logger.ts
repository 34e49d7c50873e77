import { db, auditLog as auditLogTable } from '@shepherd/db';
import { logger, serializeError } from '../observability/logger';
import type { AuditEntry, AuditLogger } from './index';

export class DrizzleAuditLogger implements AuditLogger {
  async log(entry: AuditEntry): Promise<void> {
    try {
      await db.insert(auditLogTable).values({
        userId: entry.userId,
        action: entry.action,
        entityType: entry.entityType,
        entityId: entry.entityId,
        changes: entry.changes ?? null,
        metadata: entry.metadata ?? null,
        ipAddress: entry.ipAddress ?? null,
      });
    } catch (error) {
      logger.error('Failed to write audit log entry', {
        userId: entry.userId ?? undefined,
        action: entry.action,
        entityType: entry.entityType,
        entityId: entry.entityId,
        error: serializeError(error),
      });
    }
  }
}
