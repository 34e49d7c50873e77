export const MODULE_KEY = 'groups';
export const MODULE_NAME = 'Groups';

// Validation
export * from './validation';

// Commands
export { createGroup } from './commands/create-group';
export { updateGroup } from './commands/update-group';
export { deleteGroup } from './commands/delete-group';
export { addGroupMember, removeGroupMember } from './commands/group-members';
export { sendGroupMessage } from './commands/send-group-message';
export { createGroupType, updateGroupType, deleteGroupType } from './commands/group-types';

// Queries
export { getGroup } from './queries/get-group';
export { listGroups } from './queries/list-groups';
export type { GroupListItem } from './queries/list-groups';
export { listGroupMembers, listGroupMessages } from './queries/group-activity';
export type { GroupMemberItem, GroupMessageItem } from './queries/group-activity';
export { getGroupType, listGroupTypes } from './queries/group-types';
export type { GroupTypeListItem } from './queries/group-types';
