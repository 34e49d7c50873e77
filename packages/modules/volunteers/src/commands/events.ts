import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { branches, events } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import { NotFoundError, ValidationError, assertUlid, parseInput } from '@shepherd/shared';
import { createEventSchema, updateEventSchema } from '../validation';
import type { CreateEventInput, UpdateEventInput } from '../validation';
import { loadEvent, toEventDate } from './helpers';

async function assertBranch(tx: Transaction, branchId: string): Promise<void> {
  const branch = await tx.query.branches.findFirst({ where: eq(branches.id, branchId) });
  if (!branch) {
    throw new NotFoundError('Branch', branchId);
  }
}

function futureDate(value: string): Date {
  const date = toEventDate(value);
  if (date.getTime() <= Date.now()) {
    throw new ValidationError('Event date must be in the future');
  }
  return date;
}

function describeEvent(name: string, date: Date, location: string | null | undefined): string {
  const when = date.toISOString().slice(0, 10);
  return location ? `'${name}' scheduled for ${when} at ${location}` : `'${name}' scheduled for ${when}`;
}

export async function createEvent(ctx: RequestContext, input: CreateEventInput) {
  const data = parseInput(createEventSchema, input);
  const eventDate = futureDate(data.eventDate);

  const event = await publishWithNotifications(ctx, async (tx) => {
    await assertBranch(tx, data.branchId);

    const [created] = await tx
      .insert(events)
      .values({
        name: data.name,
        description: data.description ?? null,
        eventDate,
        location: data.location ?? null,
        branchId: data.branchId,
        createdBy: ctx.user.id,
      })
      .returning();

    return {
      result: created,
      notifications: [
        {
          title: 'New Event Created',
          message: `New event ${describeEvent(data.name, eventDate, data.location)}.`,
        },
      ],
    };
  });

  await auditLog(ctx, 'event.created', 'event', event.id);
  return event;
}

export async function updateEvent(ctx: RequestContext, eventId: string, input: UpdateEventInput) {
  assertUlid(eventId, 'eventId');
  const { eventDate: rawDate, ...rest } = parseInput(updateEventSchema, input);
  const values = { ...rest, eventDate: rawDate === undefined ? undefined : futureDate(rawDate) };

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadEvent(tx, eventId);
    if (values.branchId) {
      await assertBranch(tx, values.branchId);
    }

    const [row] = await tx
      .update(events)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(events.id, eventId))
      .returning();

    const name = values.name ?? existing.name;
    const date = values.eventDate ?? existing.eventDate;
    const location = values.location === undefined ? existing.location : values.location;
    return {
      result: { updated: row, changes: computeChanges(existing, values) },
      notifications: [
        { title: 'Event Updated', message: `Event ${describeEvent(name, date, location)} has been updated.` },
      ],
    };
  });

  await auditLog(ctx, 'event.updated', 'event', eventId, changes);
  return updated;
}
