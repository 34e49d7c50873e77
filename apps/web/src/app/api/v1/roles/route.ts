import { NextResponse } from 'next/server';
import { createRole, createRoleSchema, listRoles, withMiddleware } from '@shepherd/core';
import { parseBody } from '@/lib/api-params';

export const GET = withMiddleware(
  async () => {
    const roles = await listRoles();
    return NextResponse.json({ data: roles });
  },
  { permission: 'roles.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createRoleSchema);
    const role = await createRole(ctx, input);
    return NextResponse.json({ data: role }, { status: 201 });
  },
  { permission: 'roles.manage' },
);
