import { NextResponse } from 'next/server';
import { logout, refreshSchema, withMiddleware } from '@shepherd/core';
import { parseBody } from '@/lib/api-params';

// Revokes the refresh token; the access token lapses on its own
export const POST = withMiddleware(async (request) => {
  const input = await parseBody(request, refreshSchema);
  await logout(input);
  return new NextResponse(null, { status: 204 });
});
