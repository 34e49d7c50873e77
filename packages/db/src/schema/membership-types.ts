import { pgTable, text, date, timestamp, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { members } from './core';

// ── Membership Types ─────────────────────────────────────────────
export const membershipTypes = pgTable('membership_types', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Member Membership Types ──────────────────────────────────────
// end_date null = assignment still open.
export const memberMembershipTypes = pgTable(
  'member_membership_types',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    membershipTypeId: text('membership_type_id')
      .notNull()
      .references(() => membershipTypes.id),
    startDate: date('start_date').notNull(),
    endDate: date('end_date'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_member_membership_types_member').on(table.memberId),
    index('idx_member_membership_types_type').on(table.membershipTypeId),
  ],
);
