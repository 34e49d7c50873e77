import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { groupTypes, groups } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import { createGroupTypeSchema, updateGroupTypeSchema } from '../validation';
import type { CreateGroupTypeInput, UpdateGroupTypeInput } from '../validation';

export async function createGroupType(ctx: RequestContext, input: CreateGroupTypeInput) {
  const data = parseInput(createGroupTypeSchema, input);

  const type = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.groupTypes.findFirst({ where: eq(groupTypes.name, data.name) });
    if (existing) {
      throw new ConflictError('Group type name already exists');
    }

    const [created] = await tx
      .insert(groupTypes)
      .values({ name: data.name, description: data.description ?? null })
      .returning();
    return { result: created, notifications: [] };
  });

  await auditLog(ctx, 'group_type.created', 'group_type', type.id);
  return type;
}

export async function updateGroupType(ctx: RequestContext, typeId: string, input: UpdateGroupTypeInput) {
  assertUlid(typeId, 'typeId');
  const data = parseInput(updateGroupTypeSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.groupTypes.findFirst({ where: eq(groupTypes.id, typeId) });
    if (!existing) {
      throw new NotFoundError('Group type', typeId);
    }
    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.groupTypes.findFirst({ where: eq(groupTypes.name, data.name) });
      if (clash) {
        throw new ConflictError('Group type name already exists');
      }
    }

    const [row] = await tx.update(groupTypes).set(data).where(eq(groupTypes.id, typeId)).returning();
    return { result: { updated: row, changes: computeChanges(existing, data) }, notifications: [] };
  });

  await auditLog(ctx, 'group_type.updated', 'group_type', typeId, changes);
  return updated;
}

export async function deleteGroupType(ctx: RequestContext, typeId: string) {
  assertUlid(typeId, 'typeId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.groupTypes.findFirst({ where: eq(groupTypes.id, typeId) });
    if (!existing) {
      throw new NotFoundError('Group type', typeId);
    }

    const inUse = await tx.$count(groups, eq(groups.typeId, typeId));
    if (inUse > 0) {
      throw new ConflictError('Cannot delete group type used by existing groups');
    }

    await tx.delete(groupTypes).where(eq(groupTypes.id, typeId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'group_type.deleted', 'group_type', typeId);
}
