import { lt } from 'drizzle-orm';
import { db, auditLog } from '@shepherd/db';
import { daysAgo } from '@shepherd/shared';
import { logger } from '../observability/logger';

/**
 * Delete audit entries older than the retention period.
 * Run from a scheduled job; returns the number of rows removed.
 */
export async function cleanupAuditLogs(daysToKeep: number = 365): Promise<number> {
  const cutoff = daysAgo(daysToKeep);
  const removed = await db
    .delete(auditLog)
    .where(lt(auditLog.createdAt, cutoff))
    .returning({ id: auditLog.id });

  logger.info('Audit log cleanup finished', { removed: removed.length, daysToKeep });
  return removed.length;
}
