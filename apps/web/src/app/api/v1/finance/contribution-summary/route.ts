import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { getContributionSummary, summaryRangeSchema } from '@shepherd/module-finance';
import { parseQuery } from '@/lib/api-params';

// Optional ?dateFrom=&dateTo= range
export const GET = withMiddleware(
  async (request) => {
    const summary = await getContributionSummary(parseQuery(request, summaryRangeSchema));
    return NextResponse.json(summary);
  },
  { permission: 'finance.reports' },
);
