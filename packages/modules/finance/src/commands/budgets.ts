import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges, logApproval, logFinancialAction } from '@shepherd/core/audit';
import { budgets } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  assertUlid,
  parseInput,
  toMoneyString,
} from '@shepherd/shared';
import { createBudgetSchema, reviewBudgetSchema, updateBudgetSchema } from '../validation';
import type { CreateBudgetInput, ReviewBudgetInput, UpdateBudgetInput } from '../validation';
import { assertActiveFiscalYear, assertBranch, assertExpenseCategory } from './helpers';

async function loadBudget(tx: Transaction, budgetId: string) {
  const budget = await tx.query.budgets.findFirst({ where: eq(budgets.id, budgetId) });
  if (!budget) {
    throw new NotFoundError('Budget', budgetId);
  }
  return budget;
}

export async function createBudget(ctx: RequestContext, input: CreateBudgetInput) {
  const data = parseInput(createBudgetSchema, input);

  const budget = await publishWithNotifications(ctx, async (tx) => {
    await assertActiveFiscalYear(tx, data.fiscalYearId);
    await assertExpenseCategory(tx, data.categoryId);
    await assertBranch(tx, data.branchId);

    const [created] = await tx
      .insert(budgets)
      .values({
        fiscalYearId: data.fiscalYearId,
        categoryId: data.categoryId,
        branchId: data.branchId,
        title: data.title,
        description: data.description ?? null,
        amount: toMoneyString(data.amount),
        status: 'Draft',
        createdBy: ctx.user.id,
      })
      .returning();
    return { result: created, notifications: [] };
  });

  await logFinancialAction(ctx, 'budget.created', 'budget', budget.id, { amount: data.amount });
  return budget;
}

export async function updateBudget(ctx: RequestContext, budgetId: string, input: UpdateBudgetInput) {
  assertUlid(budgetId, 'budgetId');
  const data = parseInput(updateBudgetSchema, input);
  const values = {
    ...data,
    amount: data.amount === undefined ? undefined : toMoneyString(data.amount),
  };

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadBudget(tx, budgetId);
    if (existing.status === 'Approved') {
      throw new ValidationError('Cannot update an approved budget');
    }

    const [row] = await tx
      .update(budgets)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(budgets.id, budgetId))
      .returning();
    return { result: { updated: row, changes: computeChanges(existing, values) }, notifications: [] };
  });

  await auditLog(ctx, 'budget.updated', 'budget', budgetId, changes, { category: 'financial' });
  return updated;
}

export async function submitBudget(ctx: RequestContext, budgetId: string) {
  assertUlid(budgetId, 'budgetId');

  const submitted = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadBudget(tx, budgetId);
    if (existing.status !== 'Draft') {
      throw new ValidationError(`Cannot submit a budget in '${existing.status}' status`);
    }

    const now = new Date();
    const [row] = await tx
      .update(budgets)
      .set({ status: 'Submitted', submittedAt: now, updatedAt: now })
      .where(eq(budgets.id, budgetId))
      .returning();

    return {
      result: row,
      notifications: [
        {
          title: 'Budget Submitted',
          message: `Budget "${existing.title}" has been submitted for review.`,
        },
      ],
    };
  });

  await logFinancialAction(ctx, 'budget.submitted', 'budget', budgetId);
  return submitted;
}

export async function reviewBudget(ctx: RequestContext, budgetId: string, input: ReviewBudgetInput) {
  assertUlid(budgetId, 'budgetId');
  const { action, comments } = parseInput(reviewBudgetSchema, input);
  const status = action === 'approve' ? 'Approved' : 'Rejected';

  const reviewed = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadBudget(tx, budgetId);
    if (existing.status !== 'Submitted') {
      throw new ValidationError('Only submitted budgets can be reviewed');
    }

    const now = new Date();
    const [row] = await tx
      .update(budgets)
      .set({ status, reviewedBy: ctx.user.id, reviewedAt: now, updatedAt: now })
      .where(eq(budgets.id, budgetId))
      .returning();

    const message = comments
      ? `Budget "${existing.title}" has been ${status.toLowerCase()}. Comments: ${comments}`
      : `Budget "${existing.title}" has been ${status.toLowerCase()}.`;
    return { result: row, notifications: [{ title: `Budget ${status}`, message }] };
  });

  await logApproval(ctx, 'budget', budgetId, status, comments);
  return reviewed;
}

export async function deleteBudget(ctx: RequestContext, budgetId: string) {
  assertUlid(budgetId, 'budgetId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadBudget(tx, budgetId);
    if (existing.status === 'Approved') {
      throw new ConflictError('Cannot delete an approved budget');
    }

    await tx.delete(budgets).where(eq(budgets.id, budgetId));
    return { result: null, notifications: [] };
  });

  await logFinancialAction(ctx, 'budget.deleted', 'budget', budgetId);
}
