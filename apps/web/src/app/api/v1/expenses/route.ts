import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createExpense,
  createExpenseSchema,
  listExpenses,
  listExpensesSchema,
} from '@shepherd/module-finance';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listExpenses(parseQuery(request, listExpensesSchema));
    return NextResponse.json(result);
  },
  { permission: 'expenses.view' },
);

// Expense requests wait for approval before they count against a budget
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createExpenseSchema);
    const expense = await createExpense(ctx, input);
    return NextResponse.json({ data: expense }, { status: 201 });
  },
  { permission: 'expenses.create' },
);
