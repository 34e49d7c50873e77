import { z } from 'zod';
import { idSchema, isoDateSchema, paginationSchema } from '@shepherd/shared';

export const GENDERS = ['Male', 'Female', 'Other'] as const;
export const MEMBERSHIP_STATUSES = ['Active', 'Inactive'] as const;
export const PHONE_TYPES = ['Mobile', 'Home', 'Work', 'Other'] as const;

const phoneNumberSchema = z
  .string()
  .trim()
  .regex(/^\+?[0-9\s\-()]{7,20}$/, 'Must be a valid phone number');

const optionalText = z.string().trim().max(255).optional().nullable();

// ── Members ─────────────────────────────────────────────────────

export const registerMemberSchema = z.object({
  firstName: z.string().trim().min(1).max(100),
  familyName: z.string().trim().min(1).max(100),
  otherNames: optionalText,
  gender: z.enum(GENDERS).default('Male'),
  email: z.string().trim().toLowerCase().email(),
  dateOfBirth: isoDateSchema.optional().nullable(),
  address: optionalText,
  occupation: optionalText,
  maritalStatus: optionalText,
  branchId: idSchema.optional().nullable(),
  phoneNumbers: z.array(phoneNumberSchema).max(10).default([]),
  username: z.string().trim().min(3).max(50),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});
export type RegisterMemberInput = z.input<typeof registerMemberSchema>;

export const updateMemberSchema = z
  .object({
    firstName: z.string().trim().min(1).max(100),
    familyName: z.string().trim().min(1).max(100),
    otherNames: optionalText,
    gender: z.enum(GENDERS),
    email: z.string().trim().toLowerCase().email(),
    dateOfBirth: isoDateSchema.nullable(),
    address: optionalText,
    occupation: optionalText,
    maritalStatus: optionalText,
    branchId: idSchema.nullable(),
    membershipStatus: z.enum(MEMBERSHIP_STATUSES),
  })
  .partial()
  .refine((v) => Object.values(v).some((x) => x !== undefined), { message: 'Nothing to update' });
export type UpdateMemberInput = z.input<typeof updateMemberSchema>;

export const listMembersSchema = paginationSchema.extend({
  search: z.string().trim().min(1).optional(),
  status: z.enum(MEMBERSHIP_STATUSES).optional(),
  branchId: idSchema.optional(),
  familyId: idSchema.optional(),
});
export type ListMembersInput = z.input<typeof listMembersSchema>;

// ── Phones ──────────────────────────────────────────────────────

export const addPhoneSchema = z.object({
  phoneNumber: phoneNumberSchema,
  phoneType: z.enum(PHONE_TYPES).default('Mobile'),
  isPrimary: z.boolean().default(false),
});
export type AddPhoneInput = z.input<typeof addPhoneSchema>;

export const updatePhoneSchema = z
  .object({
    phoneNumber: phoneNumberSchema,
    phoneType: z.enum(PHONE_TYPES),
    isPrimary: z.literal(true),
  })
  .partial()
  .refine((v) => Object.values(v).some((x) => x !== undefined), { message: 'Nothing to update' });
export type UpdatePhoneInput = z.input<typeof updatePhoneSchema>;

// ── Membership types ────────────────────────────────────────────

export const createMembershipTypeSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: optionalText,
});
export type CreateMembershipTypeInput = z.input<typeof createMembershipTypeSchema>;

export const updateMembershipTypeSchema = createMembershipTypeSchema
  .partial()
  .refine((v) => v.name !== undefined || v.description !== undefined, { message: 'Nothing to update' });
export type UpdateMembershipTypeInput = z.input<typeof updateMembershipTypeSchema>;

export const listMembershipTypesSchema = paginationSchema.extend({
  name: z.string().trim().min(1).optional(),
});
export type ListMembershipTypesInput = z.input<typeof listMembershipTypesSchema>;

export const assignMembershipTypeSchema = z
  .object({
    membershipTypeId: idSchema,
    startDate: isoDateSchema,
    endDate: isoDateSchema.optional().nullable(),
  })
  .refine((v) => !v.endDate || v.endDate >= v.startDate, {
    message: 'End date must be on or after start date',
    path: ['endDate'],
  });
export type AssignMembershipTypeInput = z.input<typeof assignMembershipTypeSchema>;

export const updateMembershipAssignmentSchema = z
  .object({
    startDate: isoDateSchema,
    endDate: isoDateSchema.nullable(),
  })
  .partial()
  .refine((v) => v.startDate !== undefined || v.endDate !== undefined, { message: 'Nothing to update' });
export type UpdateMembershipAssignmentInput = z.input<typeof updateMembershipAssignmentSchema>;

export const listMemberAssignmentsSchema = z.object({
  active: z
    .union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')])
    .optional(),
  startDate: isoDateSchema.optional(),
  endDate: isoDateSchema.optional(),
});
export type ListMemberAssignmentsInput = z.input<typeof listMemberAssignmentsSchema>;
