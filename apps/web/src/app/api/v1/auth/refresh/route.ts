import { NextResponse } from 'next/server';
import { RATE_LIMITS, refreshSchema, refreshSession, withPublicMiddleware } from '@shepherd/core';
import { parseBody } from '@/lib/api-params';

export const POST = withPublicMiddleware(
  async (request) => {
    const input = await parseBody(request, refreshSchema);
    const session = await refreshSession(input);
    return NextResponse.json({ data: session });
  },
  { rateLimit: { prefix: 'refresh', ...RATE_LIMITS.refresh } },
);
