import { z } from 'zod';
import { idSchema, isoDateSchema, paginationSchema } from '@shepherd/shared';

export const ASSIGNMENT_STATUSES = ['Pending', 'Confirmed', 'Declined', 'Completed'] as const;
export type AssignmentStatus = (typeof ASSIGNMENT_STATUSES)[number];

/** A calendar date or a full ISO date-time with offset. */
const eventDateSchema = z.union([isoDateSchema, z.string().datetime({ offset: true })]);

// ── Events ──────────────────────────────────────────────────────

export const createEventSchema = z.object({
  name: z.string().trim().min(1).max(150),
  description: z.string().trim().max(2000).optional().nullable(),
  eventDate: eventDateSchema,
  location: z.string().trim().max(200).optional().nullable(),
  branchId: idSchema,
});
export type CreateEventInput = z.input<typeof createEventSchema>;

export const updateEventSchema = createEventSchema
  .partial()
  .refine((v) => Object.values(v).some((x) => x !== undefined), { message: 'Nothing to update' });
export type UpdateEventInput = z.input<typeof updateEventSchema>;

export const listEventsSchema = paginationSchema.extend({
  branchId: idSchema.optional(),
  dateFrom: isoDateSchema.optional(),
  dateTo: isoDateSchema.optional(),
  name: z.string().trim().min(1).optional(),
});
export type ListEventsInput = z.input<typeof listEventsSchema>;

// ── Volunteer roles ─────────────────────────────────────────────

export const createVolunteerRoleSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().max(500).optional().nullable(),
});
export type CreateVolunteerRoleInput = z.input<typeof createVolunteerRoleSchema>;

// ── Assignments ─────────────────────────────────────────────────

export const assignVolunteersSchema = z.object({
  volunteers: z
    .array(
      z.object({
        memberId: idSchema,
        roleId: idSchema.optional().nullable(),
        notes: z.string().trim().max(500).optional().nullable(),
      }),
    )
    .min(1, 'volunteers array is required')
    .max(100),
});
export type AssignVolunteersInput = z.input<typeof assignVolunteersSchema>;

export const respondToAssignmentSchema = z.object({
  action: z.enum(['confirm', 'decline']),
});
export type RespondToAssignmentInput = z.input<typeof respondToAssignmentSchema>;

export const listEventVolunteersSchema = paginationSchema.extend({
  status: z.enum(ASSIGNMENT_STATUSES).optional(),
});
export type ListEventVolunteersInput = z.input<typeof listEventVolunteersSchema>;
