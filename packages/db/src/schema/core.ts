import {
  pgTable,
  text,
  boolean,
  date,
  timestamp,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';

// ── Branches ─────────────────────────────────────────────────────
export const branches = pgTable('branches', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  location: text('location'),
  phone: text('phone'),
  email: text('email'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Members ──────────────────────────────────────────────────────
// family_id is checked in the application layer: families reference their
// head member, so a database FK here would make the two tables circular.
export const members = pgTable(
  'members',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    firstName: text('first_name').notNull(),
    familyName: text('family_name').notNull(),
    otherNames: text('other_names'),
    gender: text('gender').notNull().default('Male'),
    email: text('email').notNull(),
    dateOfBirth: date('date_of_birth'),
    address: text('address'),
    occupation: text('occupation'),
    maritalStatus: text('marital_status'),
    branchId: text('branch_id').references(() => branches.id),
    familyId: text('family_id'),
    membershipStatus: text('membership_status').notNull().default('Active'),
    registrationDate: date('registration_date').notNull(),
    deleted: boolean('deleted').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_members_branch').on(table.branchId),
    index('idx_members_family').on(table.familyId),
    index('idx_members_email').on(table.email),
    index('idx_members_name').on(table.familyName, table.firstName),
  ],
);

// ── Member Phones ────────────────────────────────────────────────
export const memberPhones = pgTable(
  'member_phones',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    phoneNumber: text('phone_number').notNull(),
    phoneType: text('phone_type').notNull().default('Mobile'),
    isPrimary: boolean('is_primary').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_member_phones_number').on(table.phoneNumber),
    index('idx_member_phones_member').on(table.memberId),
  ],
);

// ── Member Credentials ───────────────────────────────────────────
export const memberCredentials = pgTable('member_credentials', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  memberId: text('member_id')
    .notNull()
    .unique()
    .references(() => members.id),
  username: text('username').notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  lastLoginAt: timestamp('last_login_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Refresh Tokens ───────────────────────────────────────────────
// Only the sha256 of the token is stored.
export const refreshTokens = pgTable(
  'refresh_tokens',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    tokenHash: text('token_hash').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_refresh_tokens_hash').on(table.tokenHash),
    index('idx_refresh_tokens_member').on(table.memberId),
  ],
);
