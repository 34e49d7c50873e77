import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { contributionFiltersSchema, getContributionTotal } from '@shepherd/module-finance';
import { parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await getContributionTotal(parseQuery(request, contributionFiltersSchema));
    return NextResponse.json({ data: result });
  },
  { permission: 'contributions.view' },
);
