import { pgTable, text, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';

// ── Audit Log ────────────────────────────────────────────────────
// user_id has no FK: entries outlive the rows they describe.
export const auditLog = pgTable(
  'audit_log',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    userId: text('user_id'),
    action: text('action').notNull(),
    entityType: text('entity_type').notNull(),
    entityId: text('entity_id').notNull(),
    changes: jsonb('changes').$type<Record<string, { old: unknown; new: unknown }>>(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    ipAddress: text('ip_address'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_audit_log_entity').on(table.entityType, table.entityId),
    index('idx_audit_log_user').on(table.userId, table.createdAt),
    index('idx_audit_log_created').on(table.createdAt),
  ],
);
