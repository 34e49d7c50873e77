import { eq, and, ne } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { computeChanges, logMemberAction } from '@shepherd/core/audit';
import { members, branches } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { updateMemberSchema } from '../validation';
import type { UpdateMemberInput } from '../validation';

export async function updateMember(ctx: RequestContext, memberId: string, input: UpdateMemberInput) {
  assertUlid(memberId, 'memberId');
  const data = parseInput(updateMemberSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.members.findFirst({
      where: and(eq(members.id, memberId), eq(members.deleted, false)),
    });
    if (!existing) {
      throw new NotFoundError('Member', memberId);
    }

    if (data.email && data.email !== existing.email) {
      const clash = await tx.query.members.findFirst({
        where: and(eq(members.email, data.email), eq(members.deleted, false), ne(members.id, memberId)),
      });
      if (clash) {
        throw new ConflictError('Email address already registered');
      }
    }

    if (data.branchId) {
      const branch = await tx.query.branches.findFirst({ where: eq(branches.id, data.branchId) });
      if (!branch) {
        throw new NotFoundError('Branch', data.branchId);
      }
    }

    const [row] = await tx
      .update(members)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(members.id, memberId))
      .returning();

    return { result: { updated: row, changes: computeChanges(existing, data) }, notifications: [] };
  });

  await logMemberAction(ctx, 'updated', memberId, changes);
  return updated;
}
