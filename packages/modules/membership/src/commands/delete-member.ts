import { eq, and, isNull } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { logMemberAction } from '@shepherd/core/audit';
import { members, refreshTokens } from '@shepherd/db';
import { NotFoundError, assertUlid } from '@shepherd/shared';

/** Soft delete: the row stays for contribution history; open sessions are revoked. */
export async function deleteMember(ctx: RequestContext, memberId: string) {
  assertUlid(memberId, 'memberId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.members.findFirst({
      where: and(eq(members.id, memberId), eq(members.deleted, false)),
    });
    if (!existing) {
      throw new NotFoundError('Member', memberId);
    }

    const now = new Date();
    await tx
      .update(members)
      .set({ deleted: true, membershipStatus: 'Inactive', updatedAt: now })
      .where(eq(members.id, memberId));

    await tx
      .update(refreshTokens)
      .set({ revokedAt: now })
      .where(and(eq(refreshTokens.memberId, memberId), isNull(refreshTokens.revokedAt)));

    return { result: null, notifications: [] };
  });

  await logMemberAction(ctx, 'deleted', memberId);
}
