import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog, computeChanges } from '@shepherd/core/audit';
import { members, membershipTypes, memberMembershipTypes } from '@shepherd/db';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  assertUlid,
  parseInput,
  rangesOverlap,
} from '@shepherd/shared';
import { assignMembershipTypeSchema, updateMembershipAssignmentSchema } from '../validation';
import type { AssignMembershipTypeInput, UpdateMembershipAssignmentInput } from '../validation';

type MembershipWindow = { id: string; startDate: string; endDate: string | null };

function assertNoOverlap(
  windows: MembershipWindow[],
  startDate: string,
  endDate: string | null,
  excludeId?: string,
): void {
  const clash = windows.find(
    (w) => w.id !== excludeId && rangesOverlap(startDate, endDate, w.startDate, w.endDate),
  );
  if (clash) {
    throw new ConflictError('Membership period overlaps an existing assignment');
  }
}

export async function assignMembershipType(
  ctx: RequestContext,
  memberId: string,
  input: AssignMembershipTypeInput,
) {
  assertUlid(memberId, 'memberId');
  const data = parseInput(assignMembershipTypeSchema, input);

  const assignment = await publishWithNotifications(ctx, async (tx) => {
    const member = await tx.query.members.findFirst({
      where: and(eq(members.id, memberId), eq(members.deleted, false)),
    });
    if (!member) {
      throw new NotFoundError('Member', memberId);
    }
    if (member.membershipStatus !== 'Active') {
      throw new ValidationError('Member is not active');
    }

    const type = await tx.query.membershipTypes.findFirst({
      where: eq(membershipTypes.id, data.membershipTypeId),
    });
    if (!type) {
      throw new NotFoundError('Membership type', data.membershipTypeId);
    }

    const windows = await tx.query.memberMembershipTypes.findMany({
      where: eq(memberMembershipTypes.memberId, memberId),
    });
    if (windows.some((w) => w.endDate === null)) {
      throw new ConflictError('Member already has an open membership type assignment');
    }
    assertNoOverlap(windows, data.startDate, data.endDate ?? null);

    const [row] = await tx
      .insert(memberMembershipTypes)
      .values({
        memberId,
        membershipTypeId: data.membershipTypeId,
        startDate: data.startDate,
        endDate: data.endDate ?? null,
      })
      .returning();

    return {
      result: row,
      notifications: [
        {
          title: 'Membership Type Assigned',
          message: `${member.firstName} ${member.familyName} is now a "${type.name}" member.`,
        },
      ],
    };
  });

  await auditLog(ctx, 'membership_assignment.created', 'membership_assignment', assignment.id, undefined, {
    memberId,
    membershipTypeId: data.membershipTypeId,
  });
  return assignment;
}

export async function updateMembershipAssignment(
  ctx: RequestContext,
  assignmentId: string,
  input: UpdateMembershipAssignmentInput,
) {
  assertUlid(assignmentId, 'assignmentId');
  const data = parseInput(updateMembershipAssignmentSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.memberMembershipTypes.findFirst({
      where: eq(memberMembershipTypes.id, assignmentId),
    });
    if (!existing) {
      throw new NotFoundError('Membership assignment', assignmentId);
    }

    const startDate = data.startDate ?? existing.startDate;
    const endDate = data.endDate === undefined ? existing.endDate : data.endDate;
    if (endDate !== null && endDate < startDate) {
      throw new ValidationError('End date must be on or after start date', [
        { field: 'endDate', message: 'End date must be on or after start date' },
      ]);
    }
    const windows = await tx.query.memberMembershipTypes.findMany({
      where: eq(memberMembershipTypes.memberId, existing.memberId),
    });
    assertNoOverlap(windows, startDate, endDate, assignmentId);

    const [row] = await tx
      .update(memberMembershipTypes)
      .set({ startDate, endDate })
      .where(eq(memberMembershipTypes.id, assignmentId))
      .returning();

    return { result: { updated: row, changes: computeChanges(existing, data) }, notifications: [] };
  });

  await auditLog(ctx, 'membership_assignment.updated', 'membership_assignment', assignmentId, changes);
  return updated;
}
