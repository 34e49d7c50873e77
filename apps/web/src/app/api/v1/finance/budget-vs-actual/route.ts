import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { fiscalYearReportSchema, getBudgetVsActual } from '@shepherd/module-finance';
import { parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const { fiscalYearId } = parseQuery(request, fiscalYearReportSchema);
    const report = await getBudgetVsActual(fiscalYearId);
    return NextResponse.json({ data: report });
  },
  { permission: 'finance.reports' },
);
