import { AuthorizationError } from '@shepherd/shared';
import type { RequestContext } from '../auth/context';
import { getPermissionEngine } from './engine';

export function requirePermission(permission: string) {
  return async (ctx: RequestContext): Promise<void> => {
    const hasAccess = await getPermissionEngine().hasPermission(ctx.user.id, permission);
    if (!hasAccess) {
      throw new AuthorizationError(`Missing required permission: ${permission}`);
    }
  };
}
