import { eq } from 'drizzle-orm';
import type { RequestContext } from '@shepherd/core/auth';
import { publishWithNotifications } from '@shepherd/core/notifications';
import { auditLog } from '@shepherd/core/audit';
import { volunteerRoles } from '@shepherd/db';
import { ConflictError, parseInput } from '@shepherd/shared';
import { createVolunteerRoleSchema } from '../validation';
import type { CreateVolunteerRoleInput } from '../validation';

export async function createVolunteerRole(ctx: RequestContext, input: CreateVolunteerRoleInput) {
  const data = parseInput(createVolunteerRoleSchema, input);

  const role = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.volunteerRoles.findFirst({ where: eq(volunteerRoles.name, data.name) });
    if (existing) {
      throw new ConflictError('Volunteer role name already exists');
    }

    const [created] = await tx
      .insert(volunteerRoles)
      .values({ name: data.name, description: data.description ?? null })
      .returning();
    return { result: created, notifications: [] };
  });

  await auditLog(ctx, 'volunteer_role.created', 'volunteer_role', role.id);
  return role;
}
