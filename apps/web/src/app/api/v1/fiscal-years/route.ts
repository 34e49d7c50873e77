import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createFiscalYear,
  createFiscalYearSchema,
  listFiscalYears,
  listFiscalYearsSchema,
} from '@shepherd/module-finance';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listFiscalYears(parseQuery(request, listFiscalYearsSchema));
    return NextResponse.json(result);
  },
  { permission: 'fiscal_years.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createFiscalYearSchema);
    const fiscalYear = await createFiscalYear(ctx, input);
    return NextResponse.json({ data: fiscalYear }, { status: 201 });
  },
  { permission: 'fiscal_years.manage' },
);
