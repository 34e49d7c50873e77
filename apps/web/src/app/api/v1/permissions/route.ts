import { NextResponse } from 'next/server';
import {
  createPermission,
  createPermissionSchema,
  listPermissions,
  listPermissionsSchema,
  withMiddleware,
} from '@shepherd/core';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listPermissions(parseQuery(request, listPermissionsSchema));
    return NextResponse.json(result);
  },
  { permission: 'roles.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createPermissionSchema);
    const permission = await createPermission(ctx, input);
    return NextResponse.json({ data: permission }, { status: 201 });
  },
  { permission: 'roles.manage' },
);
