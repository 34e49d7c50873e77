import { eq } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, groupTypes, groups, containsPattern } from '@shepherd/db';
import { NotFoundError, assertUlid, paginate, parseInput, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listGroupTypesSchema } from '../validation';
import type { ListGroupTypesInput } from '../validation';

export type GroupTypeListItem = {
  id: string;
  name: string;
  description: string | null;
  groupCount: number;
};

export async function getGroupType(typeId: string) {
  assertUlid(typeId, 'typeId');
  const type = await db.query.groupTypes.findFirst({ where: eq(groupTypes.id, typeId) });
  if (!type) {
    throw new NotFoundError('Group type', typeId);
  }
  const groupCount = await db.$count(groups, eq(groups.typeId, typeId));
  return { ...type, groupCount };
}

export async function listGroupTypes(input: ListGroupTypesInput = {}): Promise<PaginatedResult<GroupTypeListItem>> {
  const filters = parseInput(listGroupTypesSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.name) {
    conditions.push(sql`t.name ILIKE ${containsPattern(filters.name)}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM group_types t WHERE ${where}`),
    db.execute<{ id: string; name: string; description: string | null; group_count: number }>(sql`
      SELECT t.id, t.name, t.description,
             (SELECT count(*)::int FROM groups g WHERE g.type_id = t.id) AS group_count
      FROM group_types t
      WHERE ${where}
      ORDER BY t.name
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    id: r.id,
    name: r.name,
    description: r.description,
    groupCount: r.group_count,
  }));
  return toPaginatedResult(data, page, limit, total);
}
