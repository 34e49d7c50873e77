import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { families, familyMembers, members } from '@shepherd/db';
import type { Transaction } from '@shepherd/db';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  assertUlid,
  parseInput,
  todayIso,
} from '@shepherd/shared';
import { addFamilyMemberSchema, updateFamilyMemberRoleSchema } from '../validation';
import type { AddFamilyMemberInput, UpdateFamilyMemberRoleInput } from '../validation';

async function loadFamily(tx: Transaction, familyId: string) {
  const family = await tx.query.families.findFirst({ where: eq(families.id, familyId) });
  if (!family) {
    throw new NotFoundError('Family', familyId);
  }
  return family;
}

export async function addFamilyMember(ctx: RequestContext, familyId: string, input: AddFamilyMemberInput) {
  assertUlid(familyId, 'familyId');
  const data = parseInput(addFamilyMemberSchema, input);
  if (data.role === 'Head') {
    throw new ValidationError('Cannot assign Head role; the head is set when the family is created');
  }

  const row = await publishWithNotifications(ctx, async (tx) => {
    const family = await loadFamily(tx, familyId);

    const member = await tx.query.members.findFirst({
      where: and(eq(members.id, data.memberId), eq(members.deleted, false)),
    });
    if (!member || member.membershipStatus !== 'Active') {
      throw new ValidationError('Invalid or inactive member');
    }

    const current = await tx.query.familyMembers.findFirst({
      where: eq(familyMembers.memberId, data.memberId),
    });
    if (current?.familyId === familyId) {
      throw new ConflictError('Member already in family');
    }
    if (current || (member.familyId && member.familyId !== familyId)) {
      throw new ConflictError('Member already belongs to another family');
    }

    const [created] = await tx
      .insert(familyMembers)
      .values({ familyId, memberId: data.memberId, role: data.role, joinedAt: todayIso() })
      .returning();

    await tx
      .update(members)
      .set({ familyId, updatedAt: new Date() })
      .where(eq(members.id, data.memberId));

    return {
      result: created,
      notifications: [
        {
          title: 'Family Member Added',
          message: `${member.firstName} ${member.familyName} has joined the ${family.name} family.`,
        },
      ],
    };
  });

  await auditLog(ctx, 'family.member_added', 'family', familyId, undefined, {
    memberId: data.memberId,
    role: data.role,
  });
  return row;
}

export async function removeFamilyMember(ctx: RequestContext, familyId: string, memberId: string) {
  assertUlid(familyId, 'familyId');
  assertUlid(memberId, 'memberId');

  await publishWithNotifications(ctx, async (tx) => {
    const family = await loadFamily(tx, familyId);
    if (family.headMemberId === memberId) {
      throw new ValidationError('Cannot remove head of household');
    }

    const link = await tx.query.familyMembers.findFirst({
      where: and(eq(familyMembers.familyId, familyId), eq(familyMembers.memberId, memberId)),
    });
    if (!link) {
      throw new NotFoundError('Family member');
    }

    await tx.delete(familyMembers).where(eq(familyMembers.id, link.id));
    await tx
      .update(members)
      .set({ familyId: null, updatedAt: new Date() })
      .where(eq(members.id, memberId));

    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'family.member_removed', 'family', familyId, undefined, { memberId });
}

export async function updateFamilyMemberRole(
  ctx: RequestContext,
  familyId: string,
  memberId: string,
  input: UpdateFamilyMemberRoleInput,
) {
  assertUlid(familyId, 'familyId');
  assertUlid(memberId, 'memberId');
  const { role } = parseInput(updateFamilyMemberRoleSchema, input);

  const { updated, previousRole } = await publishWithNotifications(ctx, async (tx) => {
    const family = await loadFamily(tx, familyId);
    if (family.headMemberId === memberId) {
      throw new ValidationError('Head of household role cannot be changed');
    }
    if (role === 'Head') {
      throw new ValidationError('Cannot assign Head role; the head is set when the family is created');
    }

    const link = await tx.query.familyMembers.findFirst({
      where: and(eq(familyMembers.familyId, familyId), eq(familyMembers.memberId, memberId)),
    });
    if (!link) {
      throw new NotFoundError('Family member');
    }

    const [row] = await tx
      .update(familyMembers)
      .set({ role })
      .where(eq(familyMembers.id, link.id))
      .returning();

    return { result: { updated: row, previousRole: link.role }, notifications: [] };
  });

  await auditLog(
    ctx,
    'family.member_role_updated',
    'family',
    familyId,
    { role: { old: previousRole, new: role } },
    { memberId },
  );
  return updated;
}
