export const MODULE_KEY = 'membership';
export const MODULE_NAME = 'Membership';

// Validation
export * from './validation';

// Commands
export { registerMember, DEFAULT_MEMBER_ROLE } from './commands/register-member';
export { updateMember } from './commands/update-member';
export { deleteMember } from './commands/delete-member';
export { addPhone, updatePhone, deletePhone } from './commands/phones';
export {
  createMembershipType,
  updateMembershipType,
  deleteMembershipType,
} from './commands/membership-types';
export { assignMembershipType, updateMembershipAssignment } from './commands/membership-assignments';

// Queries
export { getMember, listPhones } from './queries/get-member';
export { listMembers } from './queries/list-members';
export type { MemberListItem } from './queries/list-members';
export { getMembershipType, listMembershipTypes, listMemberAssignments } from './queries/membership-types';
export type { MembershipTypeListItem, MemberAssignment } from './queries/membership-types';
