import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createMembershipType,
  createMembershipTypeSchema,
  listMembershipTypes,
  listMembershipTypesSchema,
} from '@shepherd/module-membership';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listMembershipTypes(parseQuery(request, listMembershipTypesSchema));
    return NextResponse.json(result);
  },
  { permission: 'membership_types.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createMembershipTypeSchema);
    const type = await createMembershipType(ctx, input);
    return NextResponse.json({ data: type }, { status: 201 });
  },
  { permission: 'membership_types.manage' },
);
