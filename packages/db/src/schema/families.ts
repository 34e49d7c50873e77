import { pgTable, text, date, timestamp, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { branches, members } from './core';

// ── Families ─────────────────────────────────────────────────────
export const families = pgTable(
  'families',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    name: text('name').notNull(),
    headMemberId: text('head_member_id')
      .notNull()
      .references(() => members.id),
    branchId: text('branch_id')
      .notNull()
      .references(() => branches.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_families_name').on(table.name),
    index('idx_families_branch').on(table.branchId),
  ],
);

// ── Family Members ───────────────────────────────────────────────
export const familyMembers = pgTable(
  'family_members',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    familyId: text('family_id')
      .notNull()
      .references(() => families.id),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    role: text('role').notNull(),
    joinedAt: date('joined_at').notNull(),
  },
  (table) => [
    uniqueIndex('uq_family_members_member').on(table.memberId),
    index('idx_family_members_family').on(table.familyId),
  ],
);
