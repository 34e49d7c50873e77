import { pgTable, text, timestamp, uniqueIndex, index, primaryKey } from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { members } from './core';

// ── Permissions ──────────────────────────────────────────────────
// Names are `module.action`, e.g. `members.view`.
export const permissions = pgTable('permissions', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Roles ────────────────────────────────────────────────────────
export const roles = pgTable('roles', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Role Permissions ─────────────────────────────────────────────
export const rolePermissions = pgTable(
  'role_permissions',
  {
    roleId: text('role_id')
      .notNull()
      .references(() => roles.id),
    permissionId: text('permission_id')
      .notNull()
      .references(() => permissions.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.roleId, table.permissionId] }),
    index('idx_role_permissions_permission').on(table.permissionId),
  ],
);

// ── Member Roles ─────────────────────────────────────────────────
export const memberRoles = pgTable(
  'member_roles',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    roleId: text('role_id')
      .notNull()
      .references(() => roles.id),
    assignedAt: timestamp('assigned_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_member_roles_member_role').on(table.memberId, table.roleId),
    index('idx_member_roles_role').on(table.roleId),
  ],
);
