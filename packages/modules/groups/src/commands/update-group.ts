import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { groups, groupMembers, branches } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { updateGroupSchema } from '../validation';
import type { UpdateGroupInput } from '../validation';
import { assertGroupType, loadActiveMember, loadGroup } from './helpers';

export async function updateGroup(ctx: RequestContext, groupId: string, input: UpdateGroupInput) {
  assertUlid(groupId, 'groupId');
  const data = parseInput(updateGroupSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await loadGroup(tx, groupId);

    if (data.leaderId) {
      await loadActiveMember(tx, data.leaderId, 'leader');
    }
    if (data.typeId) {
      await assertGroupType(tx, data.typeId);
    }
    if (data.branchId) {
      const branch = await tx.query.branches.findFirst({ where: eq(branches.id, data.branchId) });
      if (!branch) {
        throw new NotFoundError('Branch', data.branchId);
      }
    }
    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.groups.findFirst({ where: eq(groups.name, data.name) });
      if (clash) {
        throw new ConflictError('Group name already exists');
      }
    }

    const [row] = await tx
      .update(groups)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(groups.id, groupId))
      .returning();

    // a new leader is always a member of the group
    if (data.leaderId && data.leaderId !== existing.leaderId) {
      const isMember = await tx.query.groupMembers.findFirst({
        where: and(eq(groupMembers.groupId, groupId), eq(groupMembers.memberId, data.leaderId)),
      });
      if (!isMember) {
        await tx.insert(groupMembers).values({ groupId, memberId: data.leaderId });
      }
    }

    return {
      result: { updated: row, changes: computeChanges(existing, data) },
      notifications: [
        { title: 'Group Updated', message: `Group "${row.name}" has been updated.`, targetGroupId: groupId },
      ],
    };
  });

  await auditLog(ctx, 'group.updated', 'group', groupId, changes);
  return updated;
}
