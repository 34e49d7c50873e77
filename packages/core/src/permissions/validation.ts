import { z } from 'zod';
import { idSchema, paginationSchema } from '@shepherd/shared';

// `*`, `module.*` or `module.action`
const PERMISSION_NAME = /^(\*|[a-z][a-z0-9_]*\.(\*|[a-z][a-z0-9_]*))$/;

export const createPermissionSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Permission name is required')
    .max(100)
    .regex(PERMISSION_NAME, 'Permission names look like module.action'),
  description: z.string().trim().max(500).optional(),
});
export type CreatePermissionInput = z.input<typeof createPermissionSchema>;

export const updatePermissionSchema = createPermissionSchema
  .partial()
  .refine((v) => v.name !== undefined || v.description !== undefined, {
    message: 'Nothing to update',
  });
export type UpdatePermissionInput = z.input<typeof updatePermissionSchema>;

export const createRoleSchema = z.object({
  name: z.string().trim().min(1, 'Role name is required').max(100),
  description: z.string().trim().max(500).optional(),
  permissionIds: z.array(idSchema).optional(),
});
export type CreateRoleInput = z.input<typeof createRoleSchema>;

export const updateRoleSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  description: z.string().trim().max(500).optional(),
});
export type UpdateRoleInput = z.input<typeof updateRoleSchema>;

export const listPermissionsSchema = paginationSchema.extend({
  search: z.string().trim().optional(),
});
export type ListPermissionsInput = z.input<typeof listPermissionsSchema>;

export const memberRoleSchema = z.object({ roleId: idSchema });
export type MemberRoleInput = z.input<typeof memberRoleSchema>;

export const rolePermissionSchema = z.object({ permissionId: idSchema });
export type RolePermissionInput = z.input<typeof rolePermissionSchema>;
