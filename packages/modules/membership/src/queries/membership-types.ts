import { eq, and, isNull } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import {
  db,
  sql,
  whereAll,
  containsPattern,
  membershipTypes,
  memberMembershipTypes,
  members,
} from '@shepherd/db';
import { NotFoundError, assertUlid, paginate, parseInput, todayIso, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { listMembershipTypesSchema, listMemberAssignmentsSchema } from '../validation';
import type { ListMembershipTypesInput, ListMemberAssignmentsInput } from '../validation';

export type MembershipTypeListItem = {
  id: string;
  name: string;
  description: string | null;
  activeMembers: number;
};

export async function getMembershipType(membershipTypeId: string) {
  assertUlid(membershipTypeId, 'membershipTypeId');
  const type = await db.query.membershipTypes.findFirst({
    where: eq(membershipTypes.id, membershipTypeId),
  });
  if (!type) {
    throw new NotFoundError('Membership type', membershipTypeId);
  }

  const activeMembers = await db.$count(
    memberMembershipTypes,
    and(eq(memberMembershipTypes.membershipTypeId, membershipTypeId), isNull(memberMembershipTypes.endDate)),
  );
  return { ...type, activeMembers };
}

export async function listMembershipTypes(
  input: ListMembershipTypesInput = {},
): Promise<PaginatedResult<MembershipTypeListItem>> {
  const filters = parseInput(listMembershipTypesSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);

  const conditions: SQL[] = [];
  if (filters.name) {
    conditions.push(sql`t.name ILIKE ${containsPattern(filters.name)}`);
  }
  const where = whereAll(conditions);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(sql`SELECT count(*)::int AS total FROM membership_types t WHERE ${where}`),
    db.execute<{ id: string; name: string; description: string | null; active_members: number }>(sql`
      SELECT t.id, t.name, t.description,
             (SELECT count(*)::int FROM member_membership_types a
               WHERE a.membership_type_id = t.id AND a.end_date IS NULL) AS active_members
      FROM membership_types t
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
    activeMembers: r.active_members,
  }));
  return toPaginatedResult(data, page, limit, total);
}

export type MemberAssignment = {
  id: string;
  membershipTypeId: string;
  membershipTypeName: string;
  startDate: string;
  endDate: string | null;
};

/**
 * A member's membership windows, newest first. `active` means the window
 * covers today (open-ended windows always do).
 */
export async function listMemberAssignments(
  memberId: string,
  input: ListMemberAssignmentsInput = {},
): Promise<MemberAssignment[]> {
  assertUlid(memberId, 'memberId');
  const filters = parseInput(listMemberAssignmentsSchema, input);

  const member = await db.query.members.findFirst({ where: eq(members.id, memberId) });
  if (!member) {
    throw new NotFoundError('Member', memberId);
  }

  const today = todayIso();
  const conditions: SQL[] = [sql`a.member_id = ${memberId}`];
  if (filters.active === true) {
    conditions.push(sql`a.start_date <= ${today} AND (a.end_date IS NULL OR a.end_date >= ${today})`);
  } else if (filters.active === false) {
    conditions.push(sql`(a.start_date > ${today} OR a.end_date < ${today})`);
  }
  if (filters.startDate) {
    conditions.push(sql`(a.end_date IS NULL OR a.end_date >= ${filters.startDate})`);
  }
  if (filters.endDate) {
    conditions.push(sql`a.start_date <= ${filters.endDate}`);
  }

  const rows = await db.execute<{
    id: string;
    membership_type_id: string;
    membership_type_name: string;
    start_date: string;
    end_date: string | null;
  }>(sql`
    SELECT a.id, a.membership_type_id, t.name AS membership_type_name, a.start_date, a.end_date
    FROM member_membership_types a
    JOIN membership_types t ON t.id = a.membership_type_id
    WHERE ${whereAll(conditions)}
    ORDER BY a.start_date DESC
  `);

  return Array.from(rows).map((r) => ({
    id: r.id,
    membershipTypeId: r.membership_type_id,
    membershipTypeName: r.membership_type_name,
    startDate: r.start_date,
    endDate: r.end_date,
  }));
}
