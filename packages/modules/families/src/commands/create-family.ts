import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { families, familyMembers, members, branches } from '@shepherd/db';
import { ConflictError, NotFoundError, ValidationError, parseInput, todayIso } from '@shepherd/shared';
import { createFamilySchema } from '../validation';
import type { CreateFamilyInput } from '../validation';

/** Creates the family together with its `Head` membership row. */
export async function createFamily(ctx: RequestContext, input: CreateFamilyInput) {
  const data = parseInput(createFamilySchema, input);

  const family = await publishWithNotifications(ctx, async (tx) => {
    const head = await tx.query.members.findFirst({
      where: and(eq(members.id, data.headMemberId), eq(members.deleted, false)),
    });
    if (!head || head.membershipStatus !== 'Active') {
      throw new ValidationError('Invalid or inactive head of household');
    }

    const branch = await tx.query.branches.findFirst({ where: eq(branches.id, data.branchId) });
    if (!branch) {
      throw new NotFoundError('Branch', data.branchId);
    }
    if (head.branchId !== data.branchId) {
      throw new ValidationError('Head of household must belong to the selected branch');
    }

    const sameName = await tx.query.families.findFirst({ where: eq(families.name, data.name) });
    if (sameName) {
      throw new ConflictError('Family name already exists');
    }

    const membership = await tx.query.familyMembers.findFirst({
      where: eq(familyMembers.memberId, data.headMemberId),
    });
    if (head.familyId || membership) {
      throw new ConflictError('Head of household is already assigned to a family');
    }

    const [created] = await tx
      .insert(families)
      .values({ name: data.name, headMemberId: data.headMemberId, branchId: data.branchId })
      .returning();

    await tx.insert(familyMembers).values({
      familyId: created.id,
      memberId: data.headMemberId,
      role: 'Head',
      joinedAt: todayIso(),
    });

    await tx
      .update(members)
      .set({ familyId: created.id, updatedAt: new Date() })
      .where(eq(members.id, data.headMemberId));

    return {
      result: created,
      notifications: [
        { title: 'New Family Created', message: `The ${data.name} family has been created.` },
      ],
    };
  });

  await auditLog(ctx, 'family.created', 'family', family.id);
  return family;
}
