import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import type { Notification } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { groupMembers, groupMessages } from '@shepherd/db';
import { AuthorizationError, assertUlid, parseInput } from '@shepherd/shared';
import { sendGroupMessageSchema } from '../validation';
import type { SendGroupMessageInput } from '../validation';
import { loadActiveMember, loadGroup } from './helpers';

/** The caller sends as themselves and must belong to the group. */
export async function sendGroupMessage(ctx: RequestContext, groupId: string, input: SendGroupMessageInput) {
  assertUlid(groupId, 'groupId');
  const data = parseInput(sendGroupMessageSchema, input);
  const senderId = ctx.user.id;

  const message = await publishWithNotifications(ctx, async (tx) => {
    await loadGroup(tx, groupId);
    await loadActiveMember(tx, senderId, 'sender');

    const membership = await tx.query.groupMembers.findFirst({
      where: and(eq(groupMembers.groupId, groupId), eq(groupMembers.memberId, senderId)),
    });
    if (!membership) {
      throw new AuthorizationError('Only members of the group can send messages to it');
    }

    const [created] = await tx
      .insert(groupMessages)
      .values({ groupId, senderId, subject: data.subject, body: data.body })
      .returning();

    const notifications: Notification[] = [{ title: data.subject, message: data.body, targetGroupId: groupId }];
    if (data.channels.length > 0) {
      const roster = await tx.query.groupMembers.findMany({ where: eq(groupMembers.groupId, groupId) });
      const recipientIds = roster.map((m) => m.memberId).filter((id) => id !== senderId);
      for (const channel of new Set(data.channels)) {
        notifications.push({ title: data.subject, message: data.body, targetGroupId: groupId, channel, recipientIds });
      }
    }

    return { result: created, notifications };
  });

  await auditLog(ctx, 'group.message_sent', 'group_message', message.id, undefined, { groupId });
  return message;
}
