import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createBudget,
  createBudgetSchema,
  listBudgets,
  listBudgetsSchema,
} from '@shepherd/module-finance';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listBudgets(parseQuery(request, listBudgetsSchema));
    return NextResponse.json(result);
  },
  { permission: 'budgets.view' },
);

// New budgets start as drafts
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createBudgetSchema);
    const budget = await createBudget(ctx, input);
    return NextResponse.json({ data: budget }, { status: 201 });
  },
  { permission: 'budgets.create' },
);
