import type { RequestContext } from '../auth/context';
import { getAuditLogger } from './index';

type Changes = Record<string, { old: unknown; new: unknown }>;

/**
 * Log an audit entry using the current request context.
 * This is the primary way to audit-log from route handlers and commands.
 */
export async function auditLog(
  ctx: RequestContext,
  action: string,
  entityType: string,
  entityId: string,
  changes?: Changes,
  metadata?: Record<string, unknown>,
): Promise<void> {
  await getAuditLogger().log({
    userId: ctx.user.id,
    action,
    entityType,
    entityId,
    changes,
    metadata: {
      requestId: ctx.requestId,
      ...metadata,
    },
    ipAddress: ctx.ipAddress,
  });
}

export async function logMemberAction(
  ctx: RequestContext,
  action: string,
  memberId: string,
  changes?: Changes,
): Promise<void> {
  await auditLog(ctx, `member.${action}`, 'member', memberId, changes);
}

/** Budget, contribution and expense writes; tagged so they can be pulled out for review. */
export async function logFinancialAction(
  ctx: RequestContext,
  action: string,
  entityType: string,
  entityId: string,
  metadata?: Record<string, unknown>,
): Promise<void> {
  await auditLog(ctx, action, entityType, entityId, undefined, {
    category: 'financial',
    ...metadata,
  });
}

export async function logApproval(
  ctx: RequestContext,
  entityType: string,
  entityId: string,
  decision: string,
  comments?: string | null,
): Promise<void> {
  await auditLog(ctx, `${entityType}.${decision.toLowerCase()}`, entityType, entityId, undefined, {
    category: 'approval',
    decision,
    comments: comments ?? null,
  });
}

export async function logLogin(params: {
  username: string;
  memberId: string | null;
  success: boolean;
  ipAddress?: string;
  reason?: string;
}): Promise<void> {
  await getAuditLogger().log({
    userId: params.memberId,
    action: params.success ? 'auth.login' : 'auth.login_failed',
    entityType: 'member',
    entityId: params.memberId ?? params.username,
    metadata: {
      username: params.username,
      ...(params.reason ? { reason: params.reason } : {}),
    },
    ipAddress: params.ipAddress,
  });
}
