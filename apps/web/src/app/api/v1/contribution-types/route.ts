import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { listContributionTypes } from '@shepherd/module-finance';

export const GET = withMiddleware(
  async () => {
    const types = await listContributionTypes();
    return NextResponse.json({ data: types });
  },
  { permission: 'contributions.view' },
);
