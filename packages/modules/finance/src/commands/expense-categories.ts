import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { budgets, expenseCategories, expenses } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { createExpenseCategorySchema, updateExpenseCategorySchema } from '../validation';
import type { CreateExpenseCategoryInput, UpdateExpenseCategoryInput } from '../validation';

export async function createExpenseCategory(ctx: RequestContext, input: CreateExpenseCategoryInput) {
  const data = parseInput(createExpenseCategorySchema, input);

  const category = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.expenseCategories.findFirst({ where: eq(expenseCategories.name, data.name) });
    if (existing) {
      throw new ConflictError('Expense category name already exists');
    }

    const [created] = await tx
      .insert(expenseCategories)
      .values({ name: data.name, description: data.description ?? null })
      .returning();
    return { result: created, notifications: [] };
  });

  await auditLog(ctx, 'expense_category.created', 'expense_category', category.id);
  return category;
}

export async function updateExpenseCategory(
  ctx: RequestContext,
  categoryId: string,
  input: UpdateExpenseCategoryInput,
) {
  assertUlid(categoryId, 'categoryId');
  const data = parseInput(updateExpenseCategorySchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.expenseCategories.findFirst({ where: eq(expenseCategories.id, categoryId) });
    if (!existing) {
      throw new NotFoundError('Expense category', categoryId);
    }
    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.expenseCategories.findFirst({ where: eq(expenseCategories.name, data.name) });
      if (clash) {
        throw new ConflictError('Expense category name already exists');
      }
    }

    const [row] = await tx
      .update(expenseCategories)
      .set(data)
      .where(eq(expenseCategories.id, categoryId))
      .returning();
    return { result: { updated: row, changes: computeChanges(existing, data) }, notifications: [] };
  });

  await auditLog(ctx, 'expense_category.updated', 'expense_category', categoryId, changes);
  return updated;
}

export async function deleteExpenseCategory(ctx: RequestContext, categoryId: string) {
  assertUlid(categoryId, 'categoryId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.expenseCategories.findFirst({ where: eq(expenseCategories.id, categoryId) });
    if (!existing) {
      throw new NotFoundError('Expense category', categoryId);
    }

    const inUse =
      (await tx.$count(expenses, eq(expenses.categoryId, categoryId))) +
      (await tx.$count(budgets, eq(budgets.categoryId, categoryId)));
    if (inUse > 0) {
      throw new ConflictError('Cannot delete expense category that is in use');
    }

    await tx.delete(expenseCategories).where(eq(expenseCategories.id, categoryId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'expense_category.deleted', 'expense_category', categoryId);
}
