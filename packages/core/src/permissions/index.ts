export interface PermissionEngine {
  getUserPermissions(memberId: string): Promise<Set<string>>;
  hasPermission(memberId: string, permission: string): Promise<boolean>;
  invalidateCache(memberId: string): Promise<void>;
  /** Role grants changed: every cached member may be affected. */
  invalidateAll(): Promise<void>;
}

export { DefaultPermissionEngine, getPermissionEngine, setPermissionEngine, matchPermission } from './engine';
export { requirePermission } from './middleware';
export type { PermissionCache } from './cache';
export { InMemoryPermissionCache, getPermissionCache, setPermissionCache } from './cache';
export {
  createPermission,
  updatePermission,
  deletePermission,
  createRole,
  updateRole,
  deleteRole,
  assignPermissionToRole,
  removePermissionFromRole,
  assignRoleToMember,
  removeRoleFromMember,
} from './commands';
export {
  getPermission,
  listPermissions,
  getRole,
  listRoles,
  getMemberRoles,
  getEffectivePermissions,
} from './queries';
export type { NamedRef, PermissionListRow, RoleListRow } from './queries';
export * from './validation';
