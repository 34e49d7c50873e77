import { db, communications, communicationDeliveries } from '@shepherd/db';
import { generateUlid } from '@shepherd/shared';
import type { Transaction } from '@shepherd/db';
import type { RequestContext } from '../auth/context';
import { logger, serializeError } from '../observability/logger';

export type NotificationChannel = 'in_app' | 'email' | 'sms';

export interface Notification {
  title: string;
  message: string;
  /** Group the notice is addressed to; omitted for church-wide notices. */
  targetGroupId?: string | null;
  channel?: NotificationChannel;
  /** Members an `email` or `sms` notice is delivered to. */
  recipientIds?: string[];
}

function needsDelivery(notification: Notification): boolean {
  return notification.channel !== undefined && notification.channel !== 'in_app' && !!notification.recipientIds?.length;
}

/** Stores the notice with one Pending delivery row per recipient. */
async function queueDeliveries(tx: Transaction, ctx: RequestContext, notification: Notification) {
  const id = generateUlid();
  await tx.insert(communications).values({ id, ...buildNotification(ctx, notification) });
  await tx.insert(communicationDeliveries).values(
    [...new Set(notification.recipientIds)].map((memberId) => ({
      communicationId: id,
      memberId,
      channel: notification.channel ?? 'in_app',
    })),
  );
}

export function buildNotification(ctx: RequestContext, notification: Notification) {
  return {
    title: notification.title,
    message: notification.message,
    channel: notification.channel ?? 'in_app',
    sentBy: ctx.user.id,
    targetGroupId: notification.targetGroupId ?? null,
  } satisfies typeof communications.$inferInsert;
}

/**
 * Runs a write inside one transaction and stores the notifications it
 * produced in the same transaction, so a rollback discards both.
 * E-mail and SMS notices are only queued here; deliverPendingCommunications
 * sends them.
 */
export async function publishWithNotifications<T>(
  ctx: RequestContext,
  operation: (tx: Transaction) => Promise<{
    result: T;
    notifications: Notification[];
  }>,
): Promise<T> {
  try {
    return await db.transaction(async (tx) => {
      const { result, notifications } = await operation(tx);

      const notices = notifications.filter((n) => !needsDelivery(n));
      if (notices.length > 0) {
        await tx.insert(communications).values(notices.map((n) => buildNotification(ctx, n)));
      }
      for (const notification of notifications.filter(needsDelivery)) {
        await queueDeliveries(tx, ctx, notification);
      }

      return result;
    });
  } catch (error) {
    logger.warn('Transaction rolled back', {
      requestId: ctx.requestId,
      userId: ctx.user.id,
      error: serializeError(error),
    });
    throw error;
  }
}
