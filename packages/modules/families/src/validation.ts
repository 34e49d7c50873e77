import { z } from 'zod';
import { idSchema, paginationSchema } from '@shepherd/shared';

export const FAMILY_ROLES = ['Head', 'Spouse', 'Child', 'Other'] as const;
export type FamilyRole = (typeof FAMILY_ROLES)[number];

export const createFamilySchema = z.object({
  name: z.string().trim().min(1).max(100),
  headMemberId: idSchema,
  branchId: idSchema,
});
export type CreateFamilyInput = z.input<typeof createFamilySchema>;

export const updateFamilySchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    branchId: idSchema,
  })
  .partial()
  .refine((v) => v.name !== undefined || v.branchId !== undefined, { message: 'Nothing to update' });
export type UpdateFamilyInput = z.input<typeof updateFamilySchema>;

export const listFamiliesSchema = paginationSchema.extend({
  branchId: idSchema.optional(),
  name: z.string().trim().min(1).optional(),
});
export type ListFamiliesInput = z.input<typeof listFamiliesSchema>;

export const addFamilyMemberSchema = z.object({
  memberId: idSchema,
  role: z.enum(FAMILY_ROLES),
});
export type AddFamilyMemberInput = z.input<typeof addFamilyMemberSchema>;

export const updateFamilyMemberRoleSchema = z.object({
  role: z.enum(FAMILY_ROLES),
});
export type UpdateFamilyMemberRoleInput = z.input<typeof updateFamilyMemberRoleSchema>;
