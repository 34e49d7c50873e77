import { AsyncLocalStorage } from 'node:async_hooks';
import type { AuthUser } from './index';

export interface RequestContext {
  user: AuthUser;
  requestId: string;
  /** Branch selected by the caller (`x-branch-id` header), when any. */
  branchId?: string;
  ipAddress?: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext {
  const ctx = requestContext.getStore();
  if (!ctx) {
    throw new Error('No request context available. Ensure middleware has been applied.');
  }
  return ctx;
}
