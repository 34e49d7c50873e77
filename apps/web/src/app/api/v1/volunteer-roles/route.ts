import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createVolunteerRole,
  createVolunteerRoleSchema,
  listVolunteerRoles,
} from '@shepherd/module-volunteers';
import { parseBody } from '@/lib/api-params';

export const GET = withMiddleware(
  async () => {
    const roles = await listVolunteerRoles();
    return NextResponse.json({ data: roles });
  },
  { permission: 'volunteers.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createVolunteerRoleSchema);
    const role = await createVolunteerRole(ctx, input);
    return NextResponse.json({ data: role }, { status: 201 });
  },
  { permission: 'volunteer_roles.manage' },
);
