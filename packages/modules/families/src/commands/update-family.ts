import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { families, branches } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { updateFamilySchema } from '../validation';
import type { UpdateFamilyInput } from '../validation';

export async function updateFamily(ctx: RequestContext, familyId: string, input: UpdateFamilyInput) {
  assertUlid(familyId, 'familyId');
  const data = parseInput(updateFamilySchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.families.findFirst({ where: eq(families.id, familyId) });
    if (!existing) {
      throw new NotFoundError('Family', familyId);
    }

    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.families.findFirst({ where: eq(families.name, data.name) });
      if (clash) {
        throw new ConflictError('Family name already exists');
      }
    }

    if (data.branchId) {
      const branch = await tx.query.branches.findFirst({ where: eq(branches.id, data.branchId) });
      if (!branch) {
        throw new NotFoundError('Branch', data.branchId);
      }
    }

    const [row] = await tx
      .update(families)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(families.id, familyId))
      .returning();

    return { result: { updated: row, changes: computeChanges(existing, data) }, notifications: [] };
  });

  await auditLog(ctx, 'family.updated', 'family', familyId, changes);
  return updated;
}
