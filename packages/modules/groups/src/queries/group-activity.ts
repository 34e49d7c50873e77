import { eq } from 'drizzle-orm';
import { db, sql, groups } from '@shepherd/db';
import { NotFoundError, assertUlid, paginate, parseInput, toIsoTimestamp, toPaginatedResult } from '@shepherd/shared';
import type { PaginatedResult } from '@shepherd/shared';
import { groupPageSchema } from '../validation';
import type { GroupPageInput } from '../validation';

export type GroupMemberItem = {
  memberId: string;
  name: string;
  email: string;
  isLeader: boolean;
  joinedAt: string;
};

export type GroupMessageItem = {
  id: string;
  subject: string;
  body: string;
  senderId: string;
  senderName: string;
  sentAt: string;
};

async function assertGroupExists(groupId: string) {
  const group = await db.query.groups.findFirst({ where: eq(groups.id, groupId) });
  if (!group) {
    throw new NotFoundError('Group', groupId);
  }
  return group;
}

export async function listGroupMembers(
  groupId: string,
  input: GroupPageInput = {},
): Promise<PaginatedResult<GroupMemberItem>> {
  assertUlid(groupId, 'groupId');
  const filters = parseInput(groupPageSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);
  const group = await assertGroupExists(groupId);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(
      sql`SELECT count(*)::int AS total FROM group_members WHERE group_id = ${groupId}`,
    ),
    db.execute<{
      member_id: string;
      first_name: string;
      family_name: string;
      email: string;
      joined_at: Date | string;
    }>(sql`
      SELECT gm.member_id, m.first_name, m.family_name, m.email, gm.joined_at
      FROM group_members gm
      JOIN members m ON m.id = gm.member_id
      WHERE gm.group_id = ${groupId}
      ORDER BY m.family_name, m.first_name
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    memberId: r.member_id,
    name: `${r.first_name} ${r.family_name}`,
    email: r.email,
    isLeader: r.member_id === group.leaderId,
    joinedAt: toIsoTimestamp(r.joined_at),
  }));
  return toPaginatedResult(data, page, limit, total);
}

export async function listGroupMessages(
  groupId: string,
  input: GroupPageInput = {},
): Promise<PaginatedResult<GroupMessageItem>> {
  assertUlid(groupId, 'groupId');
  const filters = parseInput(groupPageSchema, input);
  const { page, limit, offset } = paginate(filters.page, filters.limit);
  await assertGroupExists(groupId);

  const [countRows, rows] = await Promise.all([
    db.execute<{ total: number }>(
      sql`SELECT count(*)::int AS total FROM group_messages WHERE group_id = ${groupId}`,
    ),
    db.execute<{
      id: string;
      subject: string;
      body: string;
      sender_id: string;
      sender_name: string;
      sent_at: Date | string;
    }>(sql`
      SELECT gm.id, gm.subject, gm.body, gm.sender_id,
             m.first_name || ' ' || m.family_name AS sender_name, gm.sent_at
      FROM group_messages gm
      JOIN members m ON m.id = gm.sender_id
      WHERE gm.group_id = ${groupId}
      ORDER BY gm.sent_at DESC
      LIMIT ${limit} OFFSET ${offset}
    `),
  ]);

  const total = Array.from(countRows)[0]?.total ?? 0;
  const data = Array.from(rows).map((r) => ({
    id: r.id,
    subject: r.subject,
    body: r.body,
    senderId: r.sender_id,
    senderName: r.sender_name,
    sentAt: toIsoTimestamp(r.sent_at),
  }));
  return toPaginatedResult(data, page, limit, total);
}
