import { eq, and, inArray } from 'drizzle-orm';
import { permissions, roles, rolePermissions, memberRoles, members } from '@shepherd/db';
import { ConflictError, NotFoundError, assertUlid, parseInput } from '@shepherd/shared';
import type { RequestContext } from '../auth/context';
import { publishWithNotifications } from '../notifications';
import { auditLog, computeChanges } from '../audit';
import { getPermissionEngine } from './engine';
import {
  createPermissionSchema,
  updatePermissionSchema,
  createRoleSchema,
  updateRoleSchema,
} from './validation';
import type {
  CreatePermissionInput,
  UpdatePermissionInput,
  CreateRoleInput,
  UpdateRoleInput,
} from './validation';

// ── Permissions ──────────────────────────────────────────────────

export async function createPermission(ctx: RequestContext, input: CreatePermissionInput) {
  const data = parseInput(createPermissionSchema, input);

  const permission = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.permissions.findFirst({
      where: eq(permissions.name, data.name),
    });
    if (existing) {
      throw new ConflictError('Permission name already exists');
    }

    const [created] = await tx
      .insert(permissions)
      .values({ name: data.name, description: data.description ?? null })
      .returning();

    return {
      result: created,
      notifications: [
        { title: 'New Permission Created', message: `Permission "${data.name}" has been created.` },
      ],
    };
  });

  await auditLog(ctx, 'permission.created', 'permission', permission.id);
  return permission;
}

export async function updatePermission(
  ctx: RequestContext,
  permissionId: string,
  input: UpdatePermissionInput,
) {
  assertUlid(permissionId, 'permissionId');
  const data = parseInput(updatePermissionSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.permissions.findFirst({
      where: eq(permissions.id, permissionId),
    });
    if (!existing) {
      throw new NotFoundError('Permission', permissionId);
    }

    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.permissions.findFirst({
        where: eq(permissions.name, data.name),
      });
      if (clash) {
        throw new ConflictError('Permission name already exists');
      }
    }

    const [row] = await tx
      .update(permissions)
      .set({ name: data.name, description: data.description })
      .where(eq(permissions.id, permissionId))
      .returning();

    return {
      result: { updated: row, changes: computeChanges(existing, data) },
      notifications: [
        { title: 'Permission Updated', message: `Permission "${row.name}" has been updated.` },
      ],
    };
  });

  // a rename changes what every holder of the old name is granted
  await getPermissionEngine().invalidateAll();
  await auditLog(ctx, 'permission.updated', 'permission', permissionId, changes);
  return updated;
}

export async function deletePermission(ctx: RequestContext, permissionId: string) {
  assertUlid(permissionId, 'permissionId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.permissions.findFirst({
      where: eq(permissions.id, permissionId),
    });
    if (!existing) {
      throw new NotFoundError('Permission', permissionId);
    }

    const assigned = await tx.$count(rolePermissions, eq(rolePermissions.permissionId, permissionId));
    if (assigned > 0) {
      throw new ConflictError('Cannot delete permission that is assigned to roles');
    }

    await tx.delete(permissions).where(eq(permissions.id, permissionId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'permission.deleted', 'permission', permissionId);
}

// ── Roles ────────────────────────────────────────────────────────

export async function createRole(ctx: RequestContext, input: CreateRoleInput) {
  const data = parseInput(createRoleSchema, input);
  const permissionIds = [...new Set(data.permissionIds ?? [])];

  const role = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.roles.findFirst({ where: eq(roles.name, data.name) });
    if (existing) {
      throw new ConflictError('Role name already exists');
    }

    if (permissionIds.length > 0) {
      const found = await tx.query.permissions.findMany({
        where: inArray(permissions.id, permissionIds),
      });
      const missing = permissionIds.find((id) => !found.some((p) => p.id === id));
      if (missing) {
        throw new NotFoundError('Permission', missing);
      }
    }

    const [created] = await tx
      .insert(roles)
      .values({ name: data.name, description: data.description ?? null })
      .returning();

    if (permissionIds.length > 0) {
      await tx
        .insert(rolePermissions)
        .values(permissionIds.map((permissionId) => ({ roleId: created.id, permissionId })));
    }

    return {
      result: created,
      notifications: [{ title: 'New Role Created', message: `Role "${data.name}" has been created.` }],
    };
  });

  await auditLog(ctx, 'role.created', 'role', role.id, undefined, { permissionIds });
  return role;
}

export async function updateRole(ctx: RequestContext, roleId: string, input: UpdateRoleInput) {
  assertUlid(roleId, 'roleId');
  const data = parseInput(updateRoleSchema, input);

  const { updated, changes } = await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.roles.findFirst({ where: eq(roles.id, roleId) });
    if (!existing) {
      throw new NotFoundError('Role', roleId);
    }

    if (data.name && data.name !== existing.name) {
      const clash = await tx.query.roles.findFirst({ where: eq(roles.name, data.name) });
      if (clash) {
        throw new ConflictError('Role name already exists');
      }
    }

    const [row] = await tx
      .update(roles)
      .set({ name: data.name, description: data.description, updatedAt: new Date() })
      .where(eq(roles.id, roleId))
      .returning();

    return {
      result: { updated: row, changes: computeChanges(existing, data) },
      notifications: [],
    };
  });

  await auditLog(ctx, 'role.updated', 'role', roleId, changes);
  return updated;
}

export async function deleteRole(ctx: RequestContext, roleId: string) {
  assertUlid(roleId, 'roleId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.roles.findFirst({ where: eq(roles.id, roleId) });
    if (!existing) {
      throw new NotFoundError('Role', roleId);
    }

    const holders = await tx.$count(memberRoles, eq(memberRoles.roleId, roleId));
    if (holders > 0) {
      throw new ConflictError('Cannot delete role that is assigned to members');
    }

    const grants = await tx.$count(rolePermissions, eq(rolePermissions.roleId, roleId));
    if (grants > 0) {
      throw new ConflictError('Cannot delete role that has permissions');
    }

    await tx.delete(roles).where(eq(roles.id, roleId));
    return { result: null, notifications: [] };
  });

  await auditLog(ctx, 'role.deleted', 'role', roleId);
}

// ── Role ↔ Permission ────────────────────────────────────────────

export async function assignPermissionToRole(
  ctx: RequestContext,
  roleId: string,
  permissionId: string,
) {
  assertUlid(roleId, 'roleId');
  assertUlid(permissionId, 'permissionId');

  await publishWithNotifications(ctx, async (tx) => {
    const role = await tx.query.roles.findFirst({ where: eq(roles.id, roleId) });
    if (!role) {
      throw new NotFoundError('Role', roleId);
    }
    const permission = await tx.query.permissions.findFirst({
      where: eq(permissions.id, permissionId),
    });
    if (!permission) {
      throw new NotFoundError('Permission', permissionId);
    }

    const existing = await tx.query.rolePermissions.findFirst({
      where: and(eq(rolePermissions.roleId, roleId), eq(rolePermissions.permissionId, permissionId)),
    });
    if (existing) {
      throw new ConflictError('Permission is already assigned to this role');
    }

    await tx.insert(rolePermissions).values({ roleId, permissionId });
    return { result: null, notifications: [] };
  });

  await getPermissionEngine().invalidateAll();
  await auditLog(ctx, 'role.permission_assigned', 'role', roleId, undefined, { permissionId });
}

export async function removePermissionFromRole(
  ctx: RequestContext,
  roleId: string,
  permissionId: string,
) {
  assertUlid(roleId, 'roleId');
  assertUlid(permissionId, 'permissionId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.rolePermissions.findFirst({
      where: and(eq(rolePermissions.roleId, roleId), eq(rolePermissions.permissionId, permissionId)),
    });
    if (!existing) {
      throw new NotFoundError('Role permission');
    }

    await tx
      .delete(rolePermissions)
      .where(and(eq(rolePermissions.roleId, roleId), eq(rolePermissions.permissionId, permissionId)));
    return { result: null, notifications: [] };
  });

  await getPermissionEngine().invalidateAll();
  await auditLog(ctx, 'role.permission_removed', 'role', roleId, undefined, { permissionId });
}

// ── Member ↔ Role ────────────────────────────────────────────────

export async function assignRoleToMember(ctx: RequestContext, memberId: string, roleId: string) {
  assertUlid(memberId, 'memberId');
  assertUlid(roleId, 'roleId');

  const assignment = await publishWithNotifications(ctx, async (tx) => {
    const member = await tx.query.members.findFirst({
      where: and(eq(members.id, memberId), eq(members.deleted, false)),
    });
    if (!member) {
      throw new NotFoundError('Member', memberId);
    }
    const role = await tx.query.roles.findFirst({ where: eq(roles.id, roleId) });
    if (!role) {
      throw new NotFoundError('Role', roleId);
    }

    const existing = await tx.query.memberRoles.findFirst({
      where: and(eq(memberRoles.memberId, memberId), eq(memberRoles.roleId, roleId)),
    });
    if (existing) {
      throw new ConflictError('Member already has this role');
    }

    const [created] = await tx.insert(memberRoles).values({ memberId, roleId }).returning();
    return {
      result: created,
      notifications: [
        {
          title: 'Role Assigned',
          message: `${member.firstName} ${member.familyName} has been given the "${role.name}" role.`,
        },
      ],
    };
  });

  await getPermissionEngine().invalidateCache(memberId);
  await auditLog(ctx, 'member.role_assigned', 'member', memberId, undefined, { roleId });
  return assignment;
}

export async function removeRoleFromMember(ctx: RequestContext, memberId: string, roleId: string) {
  assertUlid(memberId, 'memberId');
  assertUlid(roleId, 'roleId');

  await publishWithNotifications(ctx, async (tx) => {
    const existing = await tx.query.memberRoles.findFirst({
      where: and(eq(memberRoles.memberId, memberId), eq(memberRoles.roleId, roleId)),
    });
    if (!existing) {
      throw new NotFoundError('Member role');
    }

    await tx.delete(memberRoles).where(eq(memberRoles.id, existing.id));
    return { result: null, notifications: [] };
  });

  await getPermissionEngine().invalidateCache(memberId);
  await auditLog(ctx, 'member.role_removed', 'member', memberId, undefined, { roleId });
}
