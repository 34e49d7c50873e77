import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { listPaymentOptions } from '@shepherd/module-finance';

export const GET = withMiddleware(
  async () => {
    const options = await listPaymentOptions();
    return NextResponse.json({ data: options });
  },
  { permission: 'contributions.view' },
);
