import {
  pgTable,
  text,
  boolean,
  date,
  numeric,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { generateUlid } from '@shepherd/shared';
import { branches, members } from './core';

// ── Fiscal Years ─────────────────────────────────────────────────
export const fiscalYears = pgTable(
  'fiscal_years',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    branchId: text('branch_id')
      .notNull()
      .references(() => branches.id),
    startDate: date('start_date').notNull(),
    endDate: date('end_date').notNull(),
    status: text('status').notNull().default('Active'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_fiscal_years_branch_status').on(table.branchId, table.status)],
);

// ── Expense Categories ───────────────────────────────────────────
// Budgets are planned per expense category so budget-vs-actual lines up.
export const expenseCategories = pgTable('expense_categories', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Budgets ──────────────────────────────────────────────────────
export const budgets = pgTable(
  'budgets',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    fiscalYearId: text('fiscal_year_id')
      .notNull()
      .references(() => fiscalYears.id),
    categoryId: text('category_id')
      .notNull()
      .references(() => expenseCategories.id),
    branchId: text('branch_id')
      .notNull()
      .references(() => branches.id),
    title: text('title').notNull(),
    description: text('description'),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    status: text('status').notNull().default('Draft'),
    createdBy: text('created_by').references(() => members.id),
    submittedAt: timestamp('submitted_at', { withTimezone: true }),
    reviewedBy: text('reviewed_by').references(() => members.id),
    reviewedAt: timestamp('reviewed_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_budgets_fiscal_year').on(table.fiscalYearId),
    index('idx_budgets_branch').on(table.branchId),
  ],
);

// ── Contribution Types / Payment Options ─────────────────────────
export const contributionTypes = pgTable('contribution_types', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
  description: text('description'),
});

export const paymentOptions = pgTable('payment_options', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull().unique(),
});

// ── Contributions ────────────────────────────────────────────────
export const contributions = pgTable(
  'contributions',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    memberId: text('member_id')
      .notNull()
      .references(() => members.id),
    contributionTypeId: text('contribution_type_id')
      .notNull()
      .references(() => contributionTypes.id),
    paymentOptionId: text('payment_option_id')
      .notNull()
      .references(() => paymentOptions.id),
    fiscalYearId: text('fiscal_year_id')
      .notNull()
      .references(() => fiscalYears.id),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    contributionDate: date('contribution_date').notNull(),
    description: text('description'),
    recordedBy: text('recorded_by').references(() => members.id),
    deleted: boolean('deleted').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_contributions_member').on(table.memberId),
    index('idx_contributions_fiscal_year').on(table.fiscalYearId),
    index('idx_contributions_date').on(table.contributionDate),
  ],
);

// ── Expenses ─────────────────────────────────────────────────────
export const expenses = pgTable(
  'expenses',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    fiscalYearId: text('fiscal_year_id')
      .notNull()
      .references(() => fiscalYears.id),
    categoryId: text('category_id')
      .notNull()
      .references(() => expenseCategories.id),
    branchId: text('branch_id').references(() => branches.id),
    title: text('title').notNull(),
    purpose: text('purpose'),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    expenseDate: date('expense_date').notNull(),
    status: text('status').notNull().default('Pending Approval'),
    requestedBy: text('requested_by').references(() => members.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_expenses_fiscal_year_status').on(table.fiscalYearId, table.status),
    index('idx_expenses_category').on(table.categoryId),
  ],
);

// ── Expense Approvals ────────────────────────────────────────────
export const expenseApprovals = pgTable(
  'expense_approvals',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    expenseId: text('expense_id')
      .notNull()
      .references(() => expenses.id),
    approverId: text('approver_id')
      .notNull()
      .references(() => members.id),
    status: text('status').notNull(),
    comments: text('comments'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_expense_approvals_expense').on(table.expenseId)],
);
