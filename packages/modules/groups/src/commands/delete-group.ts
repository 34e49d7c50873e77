import { eq, and, ne } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { groups, groupMembers, groupMessages } from '@shepherd/db';
import { ConflictError, assertUlid } from '@shepherd/shared';
import { loadGroup } from './helpers';

export async function deleteGroup(ctx: RequestContext, groupId: string) {
  assertUlid(groupId, 'groupId');

  await publishWithNotifications(ctx, async (tx) => {
    const group = await loadGroup(tx, groupId);

    const otherMembers = await tx.$count(
      groupMembers,
      and(eq(groupMembers.groupId, groupId), ne(groupMembers.memberId, group.leaderId)),
    );
    const messages = await tx.$count(groupMessages, eq(groupMessages.groupId, groupId));
    if (otherMembers > 0 || messages > 0) {
      throw new ConflictError('Cannot delete group with members or messages');
    }

    await tx.delete(groupMembers).where(eq(groupMembers.groupId, groupId));
    await tx.delete(groups).where(eq(groups.id, groupId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'group.deleted', 'group', groupId);
}
