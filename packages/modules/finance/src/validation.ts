import { z } from 'zod';
import { idSchema, isoDateSchema, paginationSchema, positiveAmountSchema } from '@shepherd/shared';

export const FISCAL_YEAR_STATUSES = ['Active', 'Closed'] as const;
export type FiscalYearStatus = (typeof FISCAL_YEAR_STATUSES)[number];

export const BUDGET_STATUSES = ['Draft', 'Submitted', 'Approved', 'Rejected'] as const;
export type BudgetStatus = (typeof BUDGET_STATUSES)[number];

export const EXPENSE_STATUSES = ['Pending Approval', 'Approved', 'Declined'] as const;
export type ExpenseStatus = (typeof EXPENSE_STATUSES)[number];

export const EXPENSE_REPORT_TYPES = ['by_category', 'by_fiscal_year', 'pending_vs_approved', 'by_month'] as const;
export type ExpenseReportType = (typeof EXPENSE_REPORT_TYPES)[number];

const optionalText = z.string().trim().max(1000).optional().nullable();

const nothingToUpdate = (v: Record<string, unknown>) => Object.values(v).some((x) => x !== undefined);

const dateRange = {
  dateFrom: isoDateSchema.optional(),
  dateTo: isoDateSchema.optional(),
};

// ── Fiscal years ────────────────────────────────────────────────

export const createFiscalYearSchema = z
  .object({
    branchId: idSchema,
    startDate: isoDateSchema,
    endDate: isoDateSchema,
    status: z.enum(FISCAL_YEAR_STATUSES).default('Active'),
  })
  .refine((v) => v.startDate < v.endDate, {
    message: 'Start date must be before end date',
    path: ['endDate'],
  });
export type CreateFiscalYearInput = z.input<typeof createFiscalYearSchema>;

export const updateFiscalYearSchema = z
  .object({
    branchId: idSchema,
    startDate: isoDateSchema,
    endDate: isoDateSchema,
    status: z.enum(FISCAL_YEAR_STATUSES),
  })
  .partial()
  .refine(nothingToUpdate, { message: 'Nothing to update' });
export type UpdateFiscalYearInput = z.input<typeof updateFiscalYearSchema>;

export const listFiscalYearsSchema = paginationSchema.extend({
  branchId: idSchema.optional(),
  status: z.enum(FISCAL_YEAR_STATUSES).optional(),
  ...dateRange,
});
export type ListFiscalYearsInput = z.input<typeof listFiscalYearsSchema>;

// ── Expense categories ──────────────────────────────────────────

export const createExpenseCategorySchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: optionalText,
});
export type CreateExpenseCategoryInput = z.input<typeof createExpenseCategorySchema>;

export const updateExpenseCategorySchema = createExpenseCategorySchema
  .partial()
  .refine(nothingToUpdate, { message: 'Nothing to update' });
export type UpdateExpenseCategoryInput = z.input<typeof updateExpenseCategorySchema>;

// ── Budgets ─────────────────────────────────────────────────────

const budgetAmountSchema = z.coerce.number().positive('Budget amount must be positive').max(9_999_999_999.99);

export const createBudgetSchema = z.object({
  fiscalYearId: idSchema,
  categoryId: idSchema,
  branchId: idSchema,
  title: z.string().trim().min(1).max(200),
  description: optionalText,
  amount: budgetAmountSchema,
});
export type CreateBudgetInput = z.input<typeof createBudgetSchema>;

export const updateBudgetSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    description: optionalText,
    amount: budgetAmountSchema,
  })
  .partial()
  .refine(nothingToUpdate, { message: 'Nothing to update' });
export type UpdateBudgetInput = z.input<typeof updateBudgetSchema>;

export const reviewBudgetSchema = z.object({
  action: z.enum(['approve', 'reject']),
  comments: optionalText,
});
export type ReviewBudgetInput = z.input<typeof reviewBudgetSchema>;

export const listBudgetsSchema = paginationSchema.extend({
  fiscalYearId: idSchema.optional(),
  branchId: idSchema.optional(),
  status: z.enum(BUDGET_STATUSES).optional(),
});
export type ListBudgetsInput = z.input<typeof listBudgetsSchema>;

// ── Contributions ───────────────────────────────────────────────

export const createContributionSchema = z.object({
  memberId: idSchema,
  contributionTypeId: idSchema,
  paymentOptionId: idSchema,
  fiscalYearId: idSchema,
  amount: positiveAmountSchema,
  contributionDate: isoDateSchema,
  description: optionalText,
});
export type CreateContributionInput = z.input<typeof createContributionSchema>;

export const updateContributionSchema = z
  .object({
    memberId: idSchema,
    contributionTypeId: idSchema,
    paymentOptionId: idSchema,
    fiscalYearId: idSchema,
    amount: positiveAmountSchema,
    contributionDate: isoDateSchema,
    description: optionalText,
  })
  .partial()
  .refine(nothingToUpdate, { message: 'Nothing to update' });
export type UpdateContributionInput = z.input<typeof updateContributionSchema>;

export const contributionFiltersSchema = z.object({
  typeId: idSchema.optional(),
  memberId: idSchema.optional(),
  fiscalYearId: idSchema.optional(),
  startDate: isoDateSchema.optional(),
  endDate: isoDateSchema.optional(),
});
export type ContributionFilters = z.input<typeof contributionFiltersSchema>;

export const listContributionsSchema = paginationSchema.merge(contributionFiltersSchema);
export type ListContributionsInput = z.input<typeof listContributionsSchema>;

// ── Expenses ────────────────────────────────────────────────────

export const createExpenseSchema = z.object({
  fiscalYearId: idSchema,
  categoryId: idSchema,
  branchId: idSchema.optional().nullable(),
  title: z.string().trim().min(1).max(200),
  purpose: optionalText,
  amount: z.coerce.number().positive('Expense amount must be positive').max(9_999_999_999.99),
  expenseDate: isoDateSchema.optional(),
});
export type CreateExpenseInput = z.input<typeof createExpenseSchema>;

export const updateExpenseSchema = z
  .object({
    categoryId: idSchema,
    title: z.string().trim().min(1).max(200),
    purpose: optionalText,
    amount: z.coerce.number().positive('Expense amount must be positive').max(9_999_999_999.99),
    expenseDate: isoDateSchema,
  })
  .partial()
  .refine(nothingToUpdate, { message: 'Nothing to update' });
export type UpdateExpenseInput = z.input<typeof updateExpenseSchema>;

export const reviewExpenseSchema = z.object({
  status: z.enum(['Approved', 'Declined']),
  comments: optionalText,
});
export type ReviewExpenseInput = z.input<typeof reviewExpenseSchema>;

export const listExpensesSchema = paginationSchema.extend({
  fiscalYearId: idSchema.optional(),
  categoryId: idSchema.optional(),
  status: z.enum(EXPENSE_STATUSES).optional(),
  startDate: isoDateSchema.optional(),
  endDate: isoDateSchema.optional(),
});
export type ListExpensesInput = z.input<typeof listExpensesSchema>;

export const expenseReportSchema = z.object({
  type: z.enum(EXPENSE_REPORT_TYPES),
  fiscalYearId: idSchema.optional(),
  year: z.coerce.number().int().min(1900).max(9999).optional(),
});
export type ExpenseReportInput = z.input<typeof expenseReportSchema>;

// ── Reports ─────────────────────────────────────────────────────

export const summaryRangeSchema = z.object(dateRange);
export type SummaryRangeInput = z.input<typeof summaryRangeSchema>;

export const fiscalYearReportSchema = z.object({
  fiscalYearId: idSchema,
});
export type FiscalYearReportInput = z.input<typeof fiscalYearReportSchema>;
