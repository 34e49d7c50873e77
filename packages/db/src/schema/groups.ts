import { pgTable, text, timestamp, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { branches, members } from './core';

// ── Group Types ──────────────────────────────────────────────────
export const groupTypes = pgTable('group_types', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Groups ───────────────────────────────────────────────────────
export const groups = pgTable(
  'groups',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    name: text('name').notNull(),
    description: text('description'),
    leaderId: text('leader_id')
      .notNull()
      .references(() => members.id),
    typeId: text('type_id')
      .notNull()
      .references(() => groupTypes.id),
    branchId: text('branch_id').references(() => branches.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_groups_name').on(table.name),
    index('idx_groups_type').on(table.typeId),
    index('idx_groups_branch').on(table.branchId),
  ],
);

// ── Group Members ────────────────────────────────────────────────
export const groupMembers = pgTable(
  'group_members',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    groupId: text('group_id')
      .notNull()
      .references(() => groups.id),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    joinedAt: timestamp('joined_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_group_members_group_member').on(table.groupId, table.memberId),
    index('idx_group_members_member').on(table.memberId),
  ],
);

// ── Group Messages ───────────────────────────────────────────────
export const groupMessages = pgTable(
  'group_messages',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    groupId: text('group_id')
      .notNull()
      .references(() => groups.id),
    senderId: text('sender_id')
      .notNull()
      .references(() => members.id),
    subject: text('subject').notNull(),
    body: text('body').notNull(),
    sentAt: timestamp('sent_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_group_messages_group_sent').on(table.groupId, table.sentAt)],
);
