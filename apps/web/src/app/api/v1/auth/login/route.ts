import { NextResponse } from 'next/server';
import { login, loginSchema, withPublicMiddleware } from '@shepherd/core';
import { parseBody } from '@/lib/api-params';

// Attempts are limited per client address inside `login`
export const POST = withPublicMiddleware(async (request, ctx) => {
  const input = await parseBody(request, loginSchema);
  const session = await login(input, { ipAddress: ctx.ipAddress });
  return NextResponse.json({ data: session });
});
