import { eq, and, ne } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { members, memberPhones } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { addPhoneSchema, updatePhoneSchema } from '../validation';
import type { AddPhoneInput, UpdatePhoneInput } from '../validation';

// A member's first phone is always primary, and at most one phone is.

async function findMemberPhone(tx: Transaction, memberId: string, phoneId: string) {
  const phone = await tx.query.memberPhones.findFirst({
    where: and(eq(memberPhones.id, phoneId), eq(memberPhones.memberId, memberId)),
  });
  if (!phone || phone.memberId !== memberId) {
    throw new NotFoundError('Phone number', phoneId);
  }
  return phone;
}

export async function addPhone(ctx: RequestContext, memberId: string, input: AddPhoneInput) {
  assertUlid(memberId, 'memberId');
  const data = parseInput(addPhoneSchema, input);

  const phone = await publishWithNotifications(ctx, async (tx) => {
    const member = await tx.query.members.findFirst({
      where: and(eq(members.id, memberId), eq(members.deleted, false)),
    });
    if (!member) {
      throw new NotFoundError('Member', memberId);
    }

    const inUse = await tx.query.memberPhones.findFirst({
      where: eq(memberPhones.phoneNumber, data.phoneNumber),
    });
    if (inUse) {
      throw new ConflictError('Phone number already in use');
    }

    const existingCount = await tx.$count(memberPhones, eq(memberPhones.memberId, memberId));
    const isPrimary = data.isPrimary || existingCount === 0;
    if (isPrimary && existingCount > 0) {
      await tx.update(memberPhones).set({ isPrimary: false }).where(eq(memberPhones.memberId, memberId));
    }

    const [created] = await tx
      .insert(memberPhones)
      .values({ memberId, phoneNumber: data.phoneNumber, phoneType: data.phoneType, isPrimary })
      .returning();

    return { result: created, notifications: [] };
  });

  await auditLog(ctx, 'member_phone.created', 'member_phone', phone.id, undefined, { memberId });
  return phone;
}

export async function updatePhone(
  ctx: RequestContext,
  memberId: string,
  phoneId: string,
  input: UpdatePhoneInput,
) {
  assertUlid(memberId, 'memberId');
  assertUlid(phoneId, 'phoneId');
  const data = parseInput(updatePhoneSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await findMemberPhone(tx, memberId, phoneId);

    if (data.phoneNumber && data.phoneNumber !== existing.phoneNumber) {
      const clash = await tx.query.memberPhones.findFirst({
        where: and(eq(memberPhones.phoneNumber, data.phoneNumber), ne(memberPhones.id, phoneId)),
      });
      if (clash) {
        throw new ConflictError('Phone number already in use');
      }
    }

    if (data.isPrimary && !existing.isPrimary) {
      await tx
        .update(memberPhones)
        .set({ isPrimary: false })
        .where(eq(memberPhones.memberId, memberId));
    }

    const [row] = await tx
      .update(memberPhones)
      .set(data)
      .where(eq(memberPhones.id, phoneId))
      .returning();

    return { result: { updated: row, changes: computeChanges(existing, data) }, notifications: [] };
  });

  await auditLog(ctx, 'member_phone.updated', 'member_phone', phoneId, changes, { memberId });
  return updated;
}

export async function deletePhone(ctx: RequestContext, memberId: string, phoneId: string) {
  assertUlid(memberId, 'memberId');
  assertUlid(phoneId, 'phoneId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await findMemberPhone(tx, memberId, phoneId);
    if (existing.isPrimary) {
      throw new ConflictError('Cannot delete primary phone number');
    }

    await tx.delete(memberPhones).where(eq(memberPhones.id, phoneId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'member_phone.deleted', 'member_phone', phoneId, undefined, { memberId });
}
