import { z } from 'zod';
import { idSchema, paginationSchema } from '@shepherd/shared';

const optionalText = z.string().trim().max(1000).optional().nullable();

// ── Groups ──────────────────────────────────────────────────────

export const createGroupSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: optionalText,
  leaderId: idSchema,
  typeId: idSchema,
  branchId: idSchema.optional().nullable(),
});
export type CreateGroupInput = z.input<typeof createGroupSchema>;

export const updateGroupSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    description: optionalText,
    leaderId: idSchema,
    typeId: idSchema,
    branchId: idSchema.nullable(),
  })
  .partial()
  .refine((v) => Object.values(v).some((x) => x !== undefined), { message: 'Nothing to update' });
export type UpdateGroupInput = z.input<typeof updateGroupSchema>;

export const listGroupsSchema = paginationSchema.extend({
  typeId: idSchema.optional(),
  branchId: idSchema.optional(),
  name: z.string().trim().min(1).optional(),
});
export type ListGroupsInput = z.input<typeof listGroupsSchema>;

export const addGroupMemberSchema = z.object({
  memberId: idSchema,
});
export type AddGroupMemberInput = z.input<typeof addGroupMemberSchema>;

export const sendGroupMessageSchema = z.object({
  subject: z.string().trim().min(1).max(200),
  body: z.string().trim().min(1).max(5000),
  /** Also deliver to each other group member by these channels. */
  channels: z.array(z.enum(['email', 'sms'])).max(2).default([]),
});
export type SendGroupMessageInput = z.input<typeof sendGroupMessageSchema>;

export const groupPageSchema = paginationSchema;
export type GroupPageInput = z.input<typeof groupPageSchema>;

// ── Group types ─────────────────────────────────────────────────

export const createGroupTypeSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: optionalText,
});
export type CreateGroupTypeInput = z.input<typeof createGroupTypeSchema>;

export const updateGroupTypeSchema = createGroupTypeSchema
  .partial()
  .refine((v) => v.name !== undefined || v.description !== undefined, { message: 'Nothing to update' });
export type UpdateGroupTypeInput = z.input<typeof updateGroupTypeSchema>;

export const listGroupTypesSchema = paginationSchema.extend({
  name: z.string().trim().min(1).optional(),
});
export type ListGroupTypesInput = z.input<typeof listGroupTypesSchema>;
