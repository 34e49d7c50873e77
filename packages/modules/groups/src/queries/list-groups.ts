import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, containsPattern } from '@shepherd/db';
import { paginate, parseInput, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listGroupsSchema } from '../validation';
import type { ListGroupsInput } from '../validation';

export type GroupListItem = {
  id: string;
  name: string;
  leaderName: string;
  typeName: string;
  branchId: string | null;
  memberCount: number;
};

export async function listGroups(input: ListGroupsInput = {}): Promise<PaginatedResult<GroupListItem>> {
  const filters = parseInput(listGroupsSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.typeId) {
    conditions.push(sql`g.type_id = ${filters.typeId}`);
  }
  if (filters.branchId) {
    conditions.push(sql`g.branch_id = ${filters.branchId}`);
  }
  if (filters.name) {
    conditions.push(sql`g.name ILIKE ${containsPattern(filters.name)}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM groups g WHERE ${where}`),
    db.execute<{
      id: string;
      name: string;
      leader_name: string;
      type_name: string;
      branch_id: string | null;
      member_count: number;
    }>(sql`
      SELECT g.id, g.name, l.first_name || ' ' || l.family_name AS leader_name,
             t.name AS type_name, g.branch_id,
             (SELECT count(*)::int FROM group_members gm WHERE gm.group_id = g.id) AS member_count
      FROM groups g
      JOIN members l ON l.id = g.leader_id
      JOIN group_types t ON t.id = g.type_id
      WHERE ${where}
      ORDER BY g.name
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    id: r.id,
    name: r.name,
    leaderName: r.leader_name,
    typeName: r.type_name,
    branchId: r.branch_id,
    memberCount: r.member_count,
  }));
  return toPaginatedResult(data, page, limit, total);
}
