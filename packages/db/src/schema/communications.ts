import { pgTable, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { members } from './core';

// ── Communications ───────────────────────────────────────────────
// Notices written alongside the change that caused them.
// target_group_id is null for church-wide notices.
export const communications = pgTable(
  'communications',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    title: text('title').notNull(),
    message: text('message').notNull(),
    channel: text('channel').notNull().default('in_app'),
    sentBy: text('sent_by').references(() => members.id),
    targetGroupId: text('target_group_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_communications_group').on(table.targetGroupId),
    index('idx_communications_created').on(table.createdAt),
  ],
);

// ── Communication Deliveries ─────────────────────────────────────
// One row per recipient of an e-mail or SMS notice.
// status: Pending → Sent | Failed
export const communicationDeliveries = pgTable(
  'communication_deliveries',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    communicationId: text('communication_id')
      .notNull()
      .references(() => communications.id),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    channel: text('channel').notNull(),
    status: text('status').notNull().default('Pending'),
    errorMessage: text('error_message'),
    deliveredAt: timestamp('delivered_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_communication_deliveries_recipient').on(table.communicationId, table.memberId),
    index('idx_communication_deliveries_status').on(table.status, table.createdAt),
  ],
);
