import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createGroupType,
  createGroupTypeSchema,
  listGroupTypes,
  listGroupTypesSchema,
} from '@shepherd/module-groups';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listGroupTypes(parseQuery(request, listGroupTypesSchema));
    return NextResponse.json(result);
  },
  { permission: 'group_types.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createGroupTypeSchema);
    const type = await createGroupType(ctx, input);
    return NextResponse.json({ data: type }, { status: 201 });
  },
  { permission: 'group_types.manage' },
);
