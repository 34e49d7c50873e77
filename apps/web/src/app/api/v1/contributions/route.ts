import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import {
  createContribution,
  createContributionSchema,
  listContributions,
  listContributionsSchema,
} from '@shepherd/module-finance';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listContributions(parseQuery(request, listContributionsSchema));
    return NextResponse.json(result);
  },
  { permission: 'contributions.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createContributionSchema);
    const contribution = await createContribution(ctx, input);
    return NextResponse.json({ data: contribution }, { status: 201 });
  },
  { permission: 'contributions.create' },
);
