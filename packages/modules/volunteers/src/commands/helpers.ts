import { eq } from 'drizzle-orm';
import { events, eventVolunteers } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import { NotFoundError } from '@shepherd/shared';

export async function loadEvent(tx: Transaction, eventId: string) {
  const event = await tx.query.events.findFirst({ where: eq(events.id, eventId) });
  if (!event) {
    throw new NotFoundError('Event', eventId);
  }
  return event;
}

export async function loadAssignment(tx: Transaction, assignmentId: string) {
  const assignment = await tx.query.eventVolunteers.findFirst({ where: eq(eventVolunteers.id, assignmentId) });
  if (!assignment) {
    throw new NotFoundError('Assignment', assignmentId);
  }
  return assignment;
}

/** `YYYY-MM-DD` is read as midnight UTC. */
export function toEventDate(value: string): Date {
  return new Date(value.length === 10 ? `${value}T00:00:00Z` : value);
}
