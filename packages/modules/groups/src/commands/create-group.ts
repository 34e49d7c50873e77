import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { groups, groupMembers, branches } from '@shepherd/db';
import { ConflictError, NotFoundError, parseInput } from '@shepherd/shared';
import { createGroupSchema } from '../validation';
import type { CreateGroupInput } from '../validation';
import { assertGroupType, loadActiveMember } from './helpers';

/** The leader becomes the group's first member. */
export async function createGroup(ctx: RequestContext, input: CreateGroupInput) {
  const data = parseInput(createGroupSchema, input);

  const group = await publishWithNotifications(ctx, async (tx) => {
    await loadActiveMember(tx, data.leaderId, 'leader');
    await assertGroupType(tx, data.typeId);

    if (data.branchId) {
      const branch = await tx.query.branches.findFirst({ where: eq(branches.id, data.branchId) });
      if (!branch) {
        throw new NotFoundError('Branch', data.branchId);
      }
    }

    const sameName = await tx.query.groups.findFirst({ where: eq(groups.name, data.name) });
    if (sameName) {
      throw new ConflictError('Group name already exists');
    }

    const [created] = await tx
      .insert(groups)
      .values({
        name: data.name,
        description: data.description ?? null,
        leaderId: data.leaderId,
        typeId: data.typeId,
        branchId: data.branchId ?? null,
      })
      .returning();

    await tx.insert(groupMembers).values({ groupId: created.id, memberId: data.leaderId });

    return {
      result: created,
      notifications: [
        {
          title: 'New Group Created',
          message: `Group "${data.name}" has been created.`,
          targetGroupId: created.id,
        },
      ],
    };
  });

  await auditLog(ctx, 'group.created', 'group', group.id);
  return group;
}
