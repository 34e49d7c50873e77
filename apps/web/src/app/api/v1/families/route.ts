import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createFamily,
  createFamilySchema,
  listFamilies,
  listFamiliesSchema,
} from '@shepherd/module-families';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listFamilies(parseQuery(request, listFamiliesSchema));
    return NextResponse.json(result);
  },
  { permission: 'families.view' },
);

// Head of family is linked as the first member
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createFamilySchema);
    const family = await createFamily(ctx, input);
    return NextResponse.json({ data: family }, { status: 201 });
  },
  { permission: 'families.manage' },
);
