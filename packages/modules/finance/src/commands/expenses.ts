import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges, logApproval, logFinancialAction } from '@shepherd/core/audit';
import { expenseApprovals, expenses } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import {
  NotFoundError,
  ValidationError,
  assertUlid,
  parseInput,
  todayIso,
  toMoneyString,
} from '@shepherd/shared';
import { createExpenseSchema, reviewExpenseSchema, updateExpenseSchema } from '../validation';
import type { CreateExpenseInput, ReviewExpenseInput, UpdateExpenseInput } from '../validation';
import { assertActiveFiscalYear, assertBranch, assertExpenseCategory } from './helpers';

const PENDING = 'Pending Approval';

async function loadPendingExpense(tx: Transaction, expenseId: string, verb: string) {
  const expense = await tx.query.expenses.findFirst({ where: eq(expenses.id, expenseId) });
  if (!expense) {
    throw new NotFoundError('Expense', expenseId);
  }
  if (expense.status !== PENDING) {
    throw new ValidationError(`Cannot ${verb} an expense that has already been processed`);
  }
  return expense;
}

export async function createExpense(ctx: RequestContext, input: CreateExpenseInput) {
  const data = parseInput(createExpenseSchema, input);

  const expense = await publishWithNotifications(ctx, async (tx) => {
    await assertActiveFiscalYear(tx, data.fiscalYearId);
    await assertExpenseCategory(tx, data.categoryId);
    if (data.branchId) {
      await assertBranch(tx, data.branchId);
    }

    const [created] = await tx
      .insert(expenses)
      .values({
        fiscalYearId: data.fiscalYearId,
        categoryId: data.categoryId,
        branchId: data.branchId ?? null,
        title: data.title,
        purpose: data.purpose ?? null,
        amount: toMoneyString(data.amount),
        expenseDate: data.expenseDate ?? todayIso(),
        status: PENDING,
        requestedBy: ctx.user.id,
      })
      .returning();

    return {
      result: created,
      notifications: [
        {
          title: 'New Expense Request',
          message: `Expense "${data.title}" for ${toMoneyString(data.amount)} is awaiting approval.`,
        },
      ],
    };
  });

  await logFinancialAction(ctx, 'expense.created', 'expense', expense.id, { amount: data.amount });
  return expense;
}

export async function updateExpense(ctx: RequestContext, expenseId: string, input: UpdateExpenseInput) {
  assertUlid(expenseId, 'expenseId');
  const data = parseInput(updateExpenseSchema, input);
  const values = {
    ...data,
    amount: data.amount === undefined ? undefined : toMoneyString(data.amount),
  };

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadPendingExpense(tx, expenseId, 'update');
    if (data.categoryId) {
      await assertExpenseCategory(tx, data.categoryId);
    }

    const [row] = await tx
      .update(expenses)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(expenses.id, expenseId))
      .returning();
    return { result: { updated: row, changes: computeChanges(existing, values) }, notifications: [] };
  });

  await auditLog(ctx, 'expense.updated', 'expense', expenseId, changes, { category: 'financial' });
  return updated;
}

export async function deleteExpense(ctx: RequestContext, expenseId: string) {
  assertUlid(expenseId, 'expenseId');

  await publishWithNotifications(ctx, async (tx) => {
    await loadPendingExpense(tx, expenseId, 'delete');
    await tx.delete(expenses).where(eq(expenses.id, expenseId));
    return { result: null, notifications: [] };
  });

  await logFinancialAction(ctx, 'expense.deleted', 'expense', expenseId);
}

/** Approves or declines a pending expense; the decision is kept in expense_approvals. */
export async function reviewExpense(ctx: RequestContext, expenseId: string, input: ReviewExpenseInput) {
  assertUlid(expenseId, 'expenseId');
  const { status, comments } = parseInput(reviewExpenseSchema, input);

  const reviewed = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadPendingExpense(tx, expenseId, 'review');

    const [row] = await tx
      .update(expenses)
      .set({ status, updatedAt: new Date() })
      .where(eq(expenses.id, expenseId))
      .returning();

    await tx.insert(expenseApprovals).values({
      expenseId,
      approverId: ctx.user.id,
      status,
      comments: comments ?? null,
    });

    let message = `Expense "${existing.title}" for ${existing.amount} has been ${status}.`;
    if (comments) message += ` Comments: ${comments}`;
    return { result: row, notifications: [{ title: `Expense ${status}`, message }] };
  });

  await logApproval(ctx, 'expense', expenseId, status, comments);
  return reviewed;
}
