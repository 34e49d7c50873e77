import { eq, asc } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, events, volunteerRoles } from '@shepherd/db';
import { NotFoundError, assertUlid, paginate, parseInput, toIsoTimestamp, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listEventVolunteersSchema } from '../validation';
import type { ListEventVolunteersInput } from '../validation';

export type EventVolunteerItem = {
  id: string;
  memberId: string;
  memberName: string;
  email: string;
  roleName: string | null;
  status: string;
  notes: string | null;
  assignedByName: string | null;
  assignedAt: string;
};

export async function listVolunteerRoles() {
  return db.query.volunteerRoles.findMany({ orderBy: asc(volunteerRoles.name) });
}

export async function listEventVolunteers(
  eventId: string,
  input: ListEventVolunteersInput = {},
): Promise<PaginatedResult<EventVolunteerItem>> {
  assertUlid(eventId, 'eventId');
  const filters = parseInput(listEventVolunteersSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const event = await db.query.events.findFirst({ where: eq(events.id, eventId) });
  if (!event) {
    throw new NotFoundError('Event', eventId);
  }

  const conditions: SQL[] = [sql`ev.event_id = ${eventId}`];
  if (filters.status) {
    conditions.push(sql`ev.status = ${filters.status}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM event_volunteers ev WHERE ${where}`),
    db.execute<{
      id: string;
      member_id: string;
      member_name: string;
      email: string;
      role_name: string | null;
      status: string;
      notes: string | null;
      assigned_by_name: string | null;
      assigned_at: Date | string;
    }>(sql`
      SELECT ev.id, ev.member_id, m.first_name || ' ' || m.family_name AS member_name, m.email,
             vr.name AS role_name, ev.status, ev.notes,
             a.first_name || ' ' || a.family_name AS assigned_by_name, ev.assigned_at
      FROM event_volunteers ev
      JOIN members m ON m.id = ev.member_id
      LEFT JOIN volunteer_roles vr ON vr.id = ev.volunteer_role_id
      LEFT JOIN members a ON a.id = ev.assigned_by
      WHERE ${where}
      ORDER BY ev.assigned_at DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    id: r.id,
    memberId: r.member_id,
    memberName: r.member_name,
    email: r.email,
    roleName: r.role_name,
    status: r.status,
    notes: r.notes,
    assignedByName: r.assigned_by_name,
    assignedAt: toIsoTimestamp(r.assigned_at),
  }));
  return toPaginatedResult(data, page, limit, total);
}
