export const MODULE_KEY = 'volunteers';
export const MODULE_NAME = 'Volunteers';

// Validation
export * from './validation';

// Commands
export { createEvent, updateEvent } from './commands/events';
export { createVolunteerRole } from './commands/volunteer-roles';
export {
  assignVolunteers,
  respondToAssignment,
  completeAssignment,
  removeAssignment,
} from './commands/assignments';

// Queries
export { getEvent, listEvents } from './queries/events';
export type { EventItem } from './queries/events';
export { listVolunteerRoles, listEventVolunteers } from './queries/volunteers';
export type { EventVolunteerItem } from './queries/volunteers';
