import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createExpenseCategory,
  createExpenseCategorySchema,
  listExpenseCategories,
} from '@shepherd/module-finance';
import { parseBody } from '@/lib/api-params';

export const GET = withMiddleware(
  async () => {
    const categories = await listExpenseCategories();
    return NextResponse.json({ data: categories });
  },
  { permission: 'expenses.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createExpenseCategorySchema);
    const category = await createExpenseCategory(ctx, input);
    return NextResponse.json({ data: category }, { status: 201 });
  },
  { permission: 'expense_categories.manage' },
);
