import { NextResponse } from 'next/server';
import { searchAuditLogs, withMiddleware } from '@shepherd/core';
import { parseDate, parseLimit, parseNumber } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const url = new URL(request.url);
    const result = await searchAuditLogs({
      page: parseNumber(url.searchParams.get('page')),
      limit: parseLimit(url.searchParams.get('limit'), 100, 10),
      userId: url.searchParams.get('userId') ?? undefined,
      action: url.searchParams.get('action') ?? undefined,
      entityType: url.searchParams.get('entityType') ?? undefined,
      startDate: parseDate(url.searchParams.get('startDate')),
      endDate: parseDate(url.searchParams.get('endDate')),
    });
    return NextResponse.json(result);
  },
  { permission: 'audit.view' },
);
