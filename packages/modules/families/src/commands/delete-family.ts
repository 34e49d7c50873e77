import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { families, familyMembers, members } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid } from '@shepherd/shared';

/** Only a family whose sole member is its head can be deleted. */
export async function deleteFamily(ctx: RequestContext, familyId: string) {
  assertUlid(familyId, 'familyId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.families.findFirst({ where: eq(families.id, familyId) });
    if (!existing) {
      throw new NotFoundError('Family', familyId);
    }

    const memberCount = await tx.$count(familyMembers, eq(familyMembers.familyId, familyId));
    if (memberCount > 1) {
      throw new ConflictError('Cannot delete family with members');
    }

    await tx.delete(familyMembers).where(eq(familyMembers.familyId, familyId));
    await tx
      .update(members)
      .set({ familyId: null, updatedAt: new Date() })
      .where(eq(members.familyId, familyId));
    await tx.delete(families).where(eq(families.id, familyId));

    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'family.deleted', 'family', familyId);
}
