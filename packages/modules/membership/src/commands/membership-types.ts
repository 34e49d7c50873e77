import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { membershipTypes, memberMembershipTypes } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { createMembershipTypeSchema, updateMembershipTypeSchema } from '../validation';
import type { CreateMembershipTypeInput, UpdateMembershipTypeInput } from '../validation';

export async function createMembershipType(ctx: RequestContext, input: CreateMembershipTypeInput) {
  const data = parseInput(createMembershipTypeSchema, input);

  const created = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.membershipTypes.findFirst({
      where: eq(membershipTypes.name, data.name),
    });
    if (existing) {
      throw new ConflictError('Membership type name already exists');
    }

    const [row] = await tx
      .insert(membershipTypes)
      .values({ name: data.name, description: data.description ?? null })
      .returning();

    return {
      result: row,
      notifications: [
        { title: 'New Membership Type Created', message: `Membership type "${data.name}" has been created.` },
      ],
    };
  });

  await auditLog(ctx, 'membership_type.created', 'membership_type', created.id);
  return created;
}

export async function updateMembershipType(
  ctx: RequestContext,
  membershipTypeId: string,
  input: UpdateMembershipTypeInput,
) {
  assertUlid(membershipTypeId, 'membershipTypeId');
  const data = parseInput(updateMembershipTypeSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.membershipTypes.findFirst({
      where: eq(membershipTypes.id, membershipTypeId),
    });
    if (!existing) {
      throw new NotFoundError('Membership type', membershipTypeId);
    }

    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.membershipTypes.findFirst({
        where: eq(membershipTypes.name, data.name),
      });
      if (clash) {
        throw new ConflictError('Membership type name already exists');
      }
    }

    const [row] = await tx
      .update(membershipTypes)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(membershipTypes.id, membershipTypeId))
      .returning();

    return {
      result: { updated: row, changes: computeChanges(existing, data) },
      notifications: [
        { title: 'Membership Type Updated', message: `Membership type "${row.name}" has been updated.` },
      ],
    };
  });

  await auditLog(ctx, 'membership_type.updated', 'membership_type', membershipTypeId, changes);
  return updated;
}

export async function deleteMembershipType(ctx: RequestContext, membershipTypeId: string) {
  assertUlid(membershipTypeId, 'membershipTypeId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.membershipTypes.findFirst({
      where: eq(membershipTypes.id, membershipTypeId),
    });
    if (!existing) {
      throw new NotFoundError('Membership type', membershipTypeId);
    }

    const assigned = await tx.$count(
      memberMembershipTypes,
      eq(memberMembershipTypes.membershipTypeId, membershipTypeId),
    );
    if (assigned > 0) {
      throw new ConflictError('Cannot delete membership type that is assigned to members');
    }

    await tx.delete(membershipTypes).where(eq(membershipTypes.id, membershipTypeId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'membership_type.deleted', 'membership_type', membershipTypeId);
}
