import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, containsPattern } from '@shepherd/db';
import { paginate, parseInput, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listFamiliesSchema } from '../validation';
import type { ListFamiliesInput } from '../validation';

export type FamilyListItem = {
  id: string;
  name: string;
  branchId: string;
  branchName: string;
  headName: string;
  memberCount: number;
};

export async function listFamilies(input: ListFamiliesInput = {}): Promise<PaginatedResult<FamilyListItem>> {
  const filters = parseInput(listFamiliesSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.branchId) {
    conditions.push(sql`f.branch_id = ${filters.branchId}`);
  }
  if (filters.name) {
    conditions.push(sql`f.name ILIKE ${containsPattern(filters.name)}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM families f WHERE ${where}`),
    db.execute<{
      id: string;
      name: string;
      branch_id: string;
      branch_name: string;
      head_name: string;
      member_count: number;
    }>(sql`
      SELECT f.id, f.name, f.branch_id, b.name AS branch_name,
             h.first_name || ' ' || h.family_name AS head_name,
             (SELECT count(*)::int FROM family_members fm WHERE fm.family_id = f.id) AS member_count
      FROM families f
      JOIN branches b ON b.id = f.branch_id
      JOIN members h ON h.id = f.head_member_id
      WHERE ${where}
      ORDER BY f.name
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    id: r.id,
    name: r.name,
    branchId: r.branch_id,
    branchName: r.branch_name,
    headName: r.head_name,
    memberCount: r.member_count,
  }));
  return toPaginatedResult(data, page, limit, total);
}
