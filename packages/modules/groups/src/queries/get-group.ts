import { db, sql } from '@shepherd/db';
import { NotFoundError, assertUlid, toIsoTimestamp } from '@shepherd/shared';

type GroupRow = {
  id: string;
  name: string;
  description: string | null;
  leader_id: string;
  leader_name: string;
  type_id: string;
  type_name: string;
  branch_id: string | null;
  member_count: number;
  created_at: Date | string;
};

export async function getGroup(groupId: string) {
  assertUlid(groupId, 'groupId');

  const rows = await db.execute<GroupRow>(sql`
    SELECT g.id, g.name, g.description,
           g.leader_id, l.first_name || ' ' || l.family_name AS leader_name,
           g.type_id, t.name AS type_name, g.branch_id,
           (SELECT count(*)::int FROM group_members gm WHERE gm.group_id = g.id) AS member_count,
           g.created_at
    FROM groups g
    JOIN members l ON l.id = g.leader_id
    JOIN group_types t ON t.id = g.type_id
    WHERE g.id = ${groupId}
  `);
  const row = Array.from(rows)[0];
  if (!row) {
    throw new NotFoundError('Group', groupId);
  }

  return {
    id: row.id,
    name: row.name,
    description: row.description,
    leaderId: row.leader_id,
    leaderName: row.leader_name,
    typeId: row.type_id,
    typeName: row.type_name,
    branchId: row.branch_id,
    memberCount: row.member_count,
    createdAt: toIsoTimestamp(row.created_at),
  };
}
