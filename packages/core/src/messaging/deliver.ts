import { and, asc, eq } from 'drizzle-orm';
import { db, communications, communicationDeliveries, members, memberPhones } from '@shepherd/db';
import { logger } from '../observability/logger';
import { sendEmail } from './email';
import { getSmsGateway } from './sms';
import { communicationEmail } from './templates';

export interface DeliveryRun {
  sent: number;
  failed: number;
}

interface PendingDelivery {
  id: string;
  channel: string;
  title: string;
  message: string;
  email: string;
  phoneNumber: string | null;
}

async function deliver(row: PendingDelivery): Promise<string | null> {
  switch (row.channel) {
    case 'sms': {
      if (!row.phoneNumber) return 'No primary phone number';
      const gateway = getSmsGateway();
      return (await gateway.send(row.phoneNumber, row.message)) ? null : (gateway.lastError ?? 'Gateway failed');
    }
    case 'email': {
      const { subject, html } = communicationEmail(row.title, row.message);
      return (await sendEmail(row.email, subject, html)) ? null : 'Gateway failed';
    }
    default:
      return `Unsupported channel: ${row.channel}`;
  }
}

/**
 * Sends up to `limit` Pending deliveries, oldest first, and marks each
 * row Sent or Failed. SMS goes to the member's primary phone.
 */
export async function deliverPendingCommunications(limit = 100): Promise<DeliveryRun> {
  const pending: PendingDelivery[] = await db
    .select({
      id: communicationDeliveries.id,
      channel: communicationDeliveries.channel,
      title: communications.title,
      message: communications.message,
      email: members.email,
      phoneNumber: memberPhones.phoneNumber,
    })
    .from(communicationDeliveries)
    .innerJoin(communications, eq(communicationDeliveries.communicationId, communications.id))
    .innerJoin(members, eq(communicationDeliveries.memberId, members.id))
    .leftJoin(memberPhones, and(eq(memberPhones.memberId, members.id), eq(memberPhones.isPrimary, true)))
    .where(eq(communicationDeliveries.status, 'Pending'))
    .orderBy(asc(communicationDeliveries.createdAt))
    .limit(limit);

  const run: DeliveryRun = { sent: 0, failed: 0 };
  for (const row of pending) {
    const failure = await deliver(row);
    await db
      .update(communicationDeliveries)
      .set(
        failure === null
          ? { status: 'Sent', deliveredAt: new Date(), errorMessage: null }
          : { status: 'Failed', deliveredAt: null, errorMessage: failure },
      )
      .where(eq(communicationDeliveries.id, row.id));

    if (failure === null) {
      run.sent++;
    } else {
      run.failed++;
    }
  }

  logger.info('Communication deliveries processed', { ...run, pending: pending.length });
  return run;
}
