import { NextResponse } from 'next/server';
import { withMiddleware } from '@shepherd/core';
import { createEvent, createEventSchema, listEvents, listEventsSchema } from '@shepherd/module-volunteers';
import { parseBody, parseQuery } from '@/lib/api-params';

export const GET = withMiddleware(
  async (request) => {
    const result = await listEvents(parseQuery(request, listEventsSchema));
    return NextResponse.json(result);
  },
  { permission: 'events.view' },
);

export const POST = withMiddleware(
  async (request, ctx) => {
    const input = await parseBody(request, createEventSchema);
    const event = await createEvent(ctx, input);
    return NextResponse.json({ data: event }, { status: 201 });
  },
  { permission: 'events.manage' },
);
