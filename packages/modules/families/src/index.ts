export const MODULE_KEY = 'families';
export const MODULE_NAME = 'Families';

// Validation
export * from './validation';

// Commands
export { createFamily } from './commands/create-family';
export { updateFamily } from './commands/update-family';
export { deleteFamily } from './commands/delete-family';
export { addFamilyMember, removeFamilyMember, updateFamilyMemberRole } from './commands/family-members';

// Queries
export { getFamily } from './queries/get-family';
export { listFamilies } from './queries/list-families';
export type { FamilyListItem } from './queries/list-families';
