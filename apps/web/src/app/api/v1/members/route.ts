import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  listMembers,
  listMembersSchema,
  registerMember,
  registerMemberSchema,
} from '@shepherd/module-membership';
import { parseBody, parseQuery } from '@/lib/api-params';

// GET /api/v1/members — paginated member directory
export const GET = withMiddleware(
  async (request) => {
    const result = await listMembers(parseQuery(request, listMembersSchema));
    return NextResponse.json(result);
  },
  { permission: 'members.view' },
);

// POST /api/v1/members — register a member with credentials
export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, registerMemberSchema);
    const result = await registerMember(ctx, input);
    return NextResponse.json({ data: result }, { status: 201 });
  },
  { permission: 'members.edit' },
);
