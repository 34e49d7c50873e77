import type { SQL } from 'drizzle-orm';
import { db, sql, whereAll, containsPattern } from '@shepherd/db';
import { paginate, parseInput, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listMembersSchema } from '../validation';
import type { ListMembersInput } from '../validation';

export type MemberListItem = {
  id: string;
  firstName: string;
  familyName: string;
  email: string;
  gender: string;
  membershipStatus: string;
  branchId: string | null;
  familyId: string | null;
  familyNameLabel: string | null;
  primaryPhone: string | null;
  registrationDate: string;
};

type MemberListRow = {
  id: string;
  first_name: string;
  family_name: string;
  email: string;
  gender: string;
  membership_status: string;
  branch_id: string | null;
  family_id: string | null;
  family_name_label: string | null;
  primary_phone: string | null;
  registration_date: string;
};

export async function listMembers(input: ListMembersInput = {}): Promise<PaginatedResult<MemberListItem>> {
  const filters = parseInput(listMembersSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [sql`m.deleted = false`];
  if (filters.search) {
    const pattern = containsPattern(filters.search);
    conditions.push(sql`(
      m.first_name ILIKE ${pattern} OR
      m.family_name ILIKE ${pattern} OR
      m.other_names ILIKE ${pattern} OR
      m.email ILIKE ${pattern}
    )`);
  }
  if (filters.status) {
    conditions.push(sql`m.membership_status = ${filters.status}`);
  }
  if (filters.branchId) {
    conditions.push(sql`m.branch_id = ${filters.branchId}`);
  }
  if (filters.familyId) {
    conditions.push(sql`m.family_id = ${filters.familyId}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM members m WHERE ${where}`),
    db.execute<MemberListRow>(sql`
      SELECT m.id, m.first_name, m.family_name, m.email, m.gender, m.membership_status,
             m.branch_id, m.family_id, f.name AS family_name_label,
             p.phone_number AS primary_phone, m.registration_date
      FROM members m
      LEFT JOIN families f ON f.id = m.family_id
      LEFT JOIN member_phones p ON p.member_id = m.id AND p.is_primary = true
      WHERE ${where}
      ORDER BY m.family_name, m.first_name
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    id: r.id,
    firstName: r.first_name,
    familyName: r.family_name,
    email: r.email,
    gender: r.gender,
    membershipStatus: r.membership_status,
    branchId: r.branch_id,
    familyId: r.family_id,
    familyNameLabel: r.family_name_label,
    primaryPhone: r.primary_phone,
    registrationDate: r.registration_date,
  }));

  return toPaginatedResult(data, page, limit, total);
}
