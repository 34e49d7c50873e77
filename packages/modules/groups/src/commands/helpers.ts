import { eq, and } from 'drizzle-orm';
import { groups, groupTypes, members } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import { NotFoundError, ValidationError } from '@shepherd/shared';

export async function loadGroup(tx: Transaction, groupId: string) {
  const group = await tx.query.groups.findFirst({ where: eq(groups.id, groupId) });
  if (!group) {
    throw new NotFoundError('Group', groupId);
  }
  return group;
}

export async function loadActiveMember(tx: Transaction, memberId: string, label = 'member') {
  const member = await tx.query.members.findFirst({
    where: and(eq(members.id, memberId), eq(members.deleted, false)),
  });
  if (!member || member.membershipStatus !== 'Active') {
    throw new ValidationError(`Invalid or inactive ${label}`);
  }
  return member;
}

export async function assertGroupType(tx: Transaction, typeId: string): Promise<void> {
  const type = await tx.query.groupTypes.findFirst({ where: eq(groupTypes.id, typeId) });
  if (!type) {
    throw new NotFoundError('Group type', typeId);
  }
}
