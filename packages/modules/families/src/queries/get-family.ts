import { db, sql } from '@shepherd/db';
import { NotFoundError, assertUlid, toIsoTimestamp } from '@shepherd/shared';

type FamilyRow = {
  id: string;
  name: string;
  branch_id: string;
  branch_name: string;
  head_member_id: string;
  head_name: string;
  created_at: Date | string;
};

type FamilyMemberRow = {
  member_id: string;
  first_name: string;
  family_name: string;
  role: string;
  joined_at: string;
};

export async function getFamily(familyId: string) {
  assertUlid(familyId, 'familyId');

  const rows = await db.execute<FamilyRow>(sql`
    SELECT f.id, f.name, f.branch_id, b.name AS branch_name,
           f.head_member_id, h.first_name || ' ' || h.family_name AS head_name,
           f.created_at
    FROM families f
    JOIN branches b ON b.id = f.branch_id
    JOIN members h ON h.id = f.head_member_id
    WHERE f.id = ${familyId}
  `);
  const family = Array.from(rows)[0];
  if (!family) {
    throw new NotFoundError('Family', familyId);
  }

  const memberRows = await db.execute<FamilyMemberRow>(sql`
    SELECT fm.member_id, m.first_name, m.family_name, fm.role, fm.joined_at
    FROM family_members fm
    JOIN members m ON m.id = fm.member_id
    WHERE fm.family_id = ${familyId} AND m.deleted = false
    ORDER BY CASE fm.role WHEN 'Head' THEN 0 WHEN 'Spouse' THEN 1 WHEN 'Child' THEN 2 ELSE 3 END,
             m.first_name
  `);

  return {
    id: family.id,
    name: family.name,
    branchId: family.branch_id,
    branchName: family.branch_name,
    headMemberId: family.head_member_id,
    headName: family.head_name,
    createdAt: toIsoTimestamp(family.created_at),
    members: Array.from(memberRows).map((m) => ({
      memberId: m.member_id,
      name: `${m.first_name} ${m.family_name}`,
      role: m.role,
      joinedAt: m.joined_at,
    })),
  };
}
