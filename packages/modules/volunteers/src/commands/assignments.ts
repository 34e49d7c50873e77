import { eq, and } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import type { Notification } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { eventVolunteers, members, volunteerRoles } from '@shepherd/db';
import { AuthorizationError, ValidationError, assertUlid, parseInput } from '@shepherd/shared';
import { assignVolunteersSchema, respondToAssignmentSchema } from '../validation';
import type { AssignVolunteersInput, RespondToAssignmentInput } from '../validation';
import { loadAssignment, loadEvent } from './helpers';

/**
 * All-or-nothing: an invalid member or role anywhere in the list rolls back
 * every row inserted before it. Members already on the event are skipped.
 */
export async function assignVolunteers(ctx: RequestContext, eventId: string, input: AssignVolunteersInput) {
  assertUlid(eventId, 'eventId');
  const { volunteers } = parseInput(assignVolunteersSchema, input);

  const outcome = await publishWithNotifications(ctx, async (tx) => {
    const event = await loadEvent(tx, eventId);
    const assignedIds: string[] = [];
    const skipped: string[] = [];
    const notifications: Notification[] = [];

    for (const v of volunteers) {
      const member = await tx.query.members.findFirst({
        where: and(eq(members.id, v.memberId), eq(members.deleted, false)),
      });
      if (!member || member.membershipStatus !== 'Active') {
        throw new ValidationError(`Invalid member: ${v.memberId}`);
      }

      let roleName = 'a volunteer';
      if (v.roleId) {
        const role = await tx.query.volunteerRoles.findFirst({ where: eq(volunteerRoles.id, v.roleId) });
        if (!role) {
          throw new ValidationError(`Invalid role ID: ${v.roleId}`);
        }
        roleName = role.name;
      }

      const existing = await tx.query.eventVolunteers.findFirst({
        where: and(eq(eventVolunteers.eventId, eventId), eq(eventVolunteers.memberId, v.memberId)),
      });
      if (existing) {
        skipped.push(v.memberId);
        continue;
      }

      const [row] = await tx
        .insert(eventVolunteers)
        .values({
          eventId,
          memberId: v.memberId,
          volunteerRoleId: v.roleId ?? null,
          assignedBy: ctx.user.id,
          notes: v.notes ?? null,
          status: 'Pending',
        })
        .returning();
      assignedIds.push(row.id);
      notifications.push({
        title: 'Volunteer Assignment',
        message: `${member.firstName} ${member.familyName} has been assigned as ${roleName} for event '${event.name}'.`,
      });
    }

    return { result: { assigned: assignedIds, skipped }, notifications };
  });

  await auditLog(ctx, 'event.volunteers_assigned', 'event', eventId, undefined, {
    assigned: outcome.assigned.length,
    skipped: outcome.skipped.length,
  });
  return outcome;
}

export async function respondToAssignment(
  ctx: RequestContext,
  assignmentId: string,
  input: RespondToAssignmentInput,
) {
  assertUlid(assignmentId, 'assignmentId');
  const { action } = parseInput(respondToAssignmentSchema, input);
  const status = action === 'confirm' ? 'Confirmed' : 'Declined';

  const updated = await publishWithNotifications(ctx, async (tx) => {
    const assignment = await loadAssignment(tx, assignmentId);
    if (assignment.memberId !== ctx.user.id) {
      throw new AuthorizationError('You can only respond to your own assignment');
    }
    if (assignment.status === 'Completed') {
      throw new ValidationError('Assignment is already completed');
    }

    const [row] = await tx
      .update(eventVolunteers)
      .set({ status, updatedAt: new Date() })
      .where(eq(eventVolunteers.id, assignmentId))
      .returning();
    return { result: row, notifications: [] };
  });

  await auditLog(ctx, `event_volunteer.${status.toLowerCase()}`, 'event_volunteer', assignmentId);
  return updated;
}

export async function completeAssignment(ctx: RequestContext, assignmentId: string) {
  assertUlid(assignmentId, 'assignmentId');

  const updated = await publishWithNotifications(ctx, async (tx) => {
    const assignment = await loadAssignment(tx, assignmentId);
    if (assignment.status === 'Declined') {
      throw new ValidationError('A declined assignment cannot be completed');
    }

    const [row] = await tx
      .update(eventVolunteers)
      .set({ status: 'Completed', updatedAt: new Date() })
      .where(eq(eventVolunteers.id, assignmentId))
      .returning();
    return { result: row, notifications: [] };
  });

  await auditLog(ctx, 'event_volunteer.completed', 'event_volunteer', assignmentId);
  return updated;
}

export async function removeAssignment(ctx: RequestContext, assignmentId: string) {
  assertUlid(assignmentId, 'assignmentId');

  const removed = await publishWithNotifications(ctx, async (tx) => {
    const assignment = await loadAssignment(tx, assignmentId);
    await tx.delete(eventVolunteers).where(eq(eventVolunteers.id, assignmentId));
    return { result: assignment, notifications: [] };
  });

  await auditLog(ctx, 'event_volunteer.removed', 'event_volunteer', assignmentId, undefined, {
    eventId: removed.eventId,
    memberId: removed.memberId,
  });
}
