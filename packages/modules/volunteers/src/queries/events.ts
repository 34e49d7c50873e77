import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, containsPattern } from '@shepherd/db';
import { NotFoundError, assertUlid, paginate, parseInput, toIsoTimestamp, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listEventsSchema } from '../validation';
import type { ListEventsInput } from '../validation';

export type EventItem = {
  id: string;
  name: string;
  description: string | null;
  eventDate: string;
  location: string | null;
  branchId: string;
  branchName: string;
  volunteerCount: number;
};

type EventRow = {
  id: string;
  name: string;
  description: string | null;
  event_date: Date | string;
  location: string | null;
  branch_id: string;
  branch_name: string;
  volunteer_count: number;
};

const SELECT_EVENT = sql`
  SELECT e.id, e.name, e.description, e.event_date, e.location, e.branch_id, b.name AS branch_name,
         (SELECT count(*)::int FROM event_volunteers ev WHERE ev.event_id = e.id) AS volunteer_count
  FROM events e
  JOIN branches b ON b.id = e.branch_id
`;

function mapRow(r: EventRow): EventItem {
  return {
    id: r.id,
    name: r.name,
    description: r.description,
    eventDate: toIsoTimestamp(r.event_date),
    location: r.location,
    branchId: r.branch_id,
    branchName: r.branch_name,
    volunteerCount: r.volunteer_count,
  };
}

export async function getEvent(eventId: string): Promise<EventItem> {
  assertUlid(eventId, 'eventId');
  const rows = await db.execute<EventRow>(sql`${SELECT_EVENT} WHERE e.id = ${eventId}`);
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Event', eventId);
  }
  return mapRow(row);
}

export async function listEvents(input: ListEventsInput = {}): Promise<PaginatedResult<EventItem>> {
  const filters = parseInput(listEventsSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.branchId) {
    conditions.push(sql`e.branch_id = ${filters.branchId}`);
  }
  if (filters.dateFrom) {
    conditions.push(sql`e.event_date >= ${filters.dateFrom}::date`);
  }
  if (filters.dateTo) {
    conditions.push(sql`e.event_date < ${filters.dateTo}::date + 1`);
  }
  if (filters.name) {
    conditions.push(sql`e.name ILIKE ${containsPattern(filters.name)}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM events e WHERE ${where}`),
    db.execute<EventRow>(sql`
      ${SELECT_EVENT}
      WHERE ${where}
      ORDER BY e.event_date DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  return toPaginatedResult(Array.from(rows).map(mapRow), page, limit, total);
}
