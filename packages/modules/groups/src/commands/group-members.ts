import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { groupMembers } from '@shepherd/db';
import { ConflictError, NotFoundError, ValidationError, assertUlid, parseInput } from '@shepherd/shared';
import { addGroupMemberSchema } from '../validation';
import type { AddGroupMemberInput } from '../validation';
import { loadActiveMember, loadGroup } from './helpers';

export async function addGroupMember(ctx: RequestContext, groupId: string, input: AddGroupMemberInput) {
  assertUlid(groupId, 'groupId');
  const { memberId } = parseInput(addGroupMemberSchema, input);

  const row = await publishWithNotifications(ctx, async (tx) => {
    const group = await loadGroup(tx, groupId);
    const member = await loadActiveMember(tx, memberId);

    const existing = await tx.query.groupMembers.findFirst({
      where: and(eq(groupMembers.groupId, groupId), eq(groupMembers.memberId, memberId)),
    });
    if (existing) {
      throw new ConflictError('Member is already in the group');
    }

    const [created] = await tx.insert(groupMembers).values({ groupId, memberId }).returning();

    return {
      result: created,
      notifications: [
        {
          title: 'Added to Group',
          message: `${member.firstName} ${member.familyName} has been added to group "${group.name}".`,
          targetGroupId: groupId,
        },
      ],
    };
  });

  await auditLog(ctx, 'group.member_added', 'group', groupId, undefined, { memberId });
  return row;
}

export async function removeGroupMember(ctx: RequestContext, groupId: string, memberId: string) {
  assertUlid(groupId, 'groupId');
  assertUlid(memberId, 'memberId');

  await publishWithNotifications(ctx, async (tx) => {
    const group = await loadGroup(tx, groupId);
    if (group.leaderId === memberId) {
      throw new ValidationError('Cannot remove group leader as a member');
    }

    const existing = await tx.query.groupMembers.findFirst({
      where: and(eq(groupMembers.groupId, groupId), eq(groupMembers.memberId, memberId)),
    });
    if (!existing) {
      throw new NotFoundError('Group member');
    }

    await tx.delete(groupMembers).where(eq(groupMembers.id, existing.id));

    return {
      result: null,
      notifications: [
        {
          title: 'Removed from Group',
          message: `A member has been removed from group "${group.name}".`,
          targetGroupId: groupId,
        },
      ],
    };
  });

  await auditLog(ctx, 'group.member_removed', 'group', groupId, undefined, { memberId });
}
