import { pgTable, text, timestamp, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { branches, members } from './core';

// ── Events ───────────────────────────────────────────────────────
export const events = pgTable(
  'events',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    name: text('name').notNull(),
    description: text('description'),
    eventDate: timestamp('event_date', { withTimezone: true }).notNull(),
    location: text('location'),
    branchId: text('branch_id')
      .notNull()
      .references(() => branches.id),
    createdBy: text('created_by').references(() => members.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_events_branch_date').on(table.branchId, table.eventDate)],
);

// ── Volunteer Roles ──────────────────────────────────────────────
export const volunteerRoles = pgTable('volunteer_roles', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
});

// ── Event Volunteers ─────────────────────────────────────────────
export const eventVolunteers = pgTable(
  'event_volunteers',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    eventId: text('event_id')
      .notNull()
      .references(() => events.id),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    volunteerRoleId: text('volunteer_role_id').references(() => volunteerRoles.id),
    assignedBy: text('assigned_by').references(() => members.id),
    notes: text('notes'),
    status: text('status').notNull().default('Pending'),
    assignedAt: timestamp('assigned_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_event_volunteers_event_member').on(table.eventId, table.memberId),
    index('idx_event_volunteers_member').on(table.memberId),
  ],
);
