import { eq, asc } from 'drizzle-orm';
import { db, expenseCategories } from '@shepherd/db';
import { NotFoundError, assertUlid } from '@shepherd/shared';

export async function getExpenseCategory(categoryId: string) {
  assertUlid(categoryId, 'categoryId');
  const category = await db.query.expenseCategories.findFirst({ where: eq(expenseCategories.id, categoryId) });
  if (!category) {
    throw new NotFoundError('Expense category', categoryId);
  }
  return category;
}

export async function listExpenseCategories() {
  return db.query.expenseCategories.findMany({ orderBy: asc(expenseCategories.name) });
}
