import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { createGroup, createGroupSchema, listGroups, listGroupsSchema } from '@shepherd/module-groups';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listGroups(parseQuery(request, listGroupsSchema));
    return NextResponse.json(result);
  },
  { permission: 'groups.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createGroupSchema);
    const group = await createGroup(ctx, input);
    return NextResponse.json({ data: group }, { status: 201 });
  },
  { permission: 'groups.manage' },
);
