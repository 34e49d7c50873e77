import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { expenseReportSchema, getExpenseReport } from '@shepherd/module-finance';
import { parseQuery } from '@/lib/api-params';

// ?type=by_category|by_fiscal_year|pending_vs_approved|by_month, optional fiscalYearId and year
export const GET = withMiddleware(
  async (request) => {
    const report = await getExpenseReport(parseQuery(request, expenseReportSchema));
    return NextResponse.json(report);
  },
  { permission: 'finance.reports' },
);
