export type { AuthUser, TokenPair, RequestContext } from './auth';
export {
  requestContext,
  getRequestContext,
  authenticate,
  getClientIp,
  withMiddleware,
  withPublicMiddleware,
  errorResponse,
  signAccessToken,
  signRefreshToken,
  verifyAccessToken,
  verifyRefreshToken,
  login,
  refreshSession,
  logout,
  loginSchema,
  refreshSchema,
} from './auth';
export type {
  RouteHandler,
  PublicRouteHandler,
  MiddlewareOptions,
  HandlerContext,
  PublicContext,
  SessionResult,
  LoginInput,
  RefreshInput,
} from './auth';

// ── Permissions & roles ─────────────────────────────────────────
export type { PermissionEngine, PermissionCache } from './permissions';
export * from './permissions';

// ── Audit ───────────────────────────────────────────────────────
export type { AuditEntry, AuditLogger } from './audit';
export {
  DrizzleAuditLogger,
  getAuditLogger,
  setAuditLogger,
  auditLog,
  logMemberAction,
  logFinancialAction,
  logApproval,
  logLogin,
  computeChanges,
  getEntityLogs,
  getUserActivity,
  searchAuditLogs,
  cleanupAuditLogs,
} from './audit';

// ── Notifications ───────────────────────────────────────────────
export { publishWithNotifications, buildNotification } from './notifications';
export type { Notification, NotificationChannel } from './notifications';

// ── Messaging ───────────────────────────────────────────────────
export * from './messaging';

// ── Security ────────────────────────────────────────────────────
export * from './security';

// ── Config & observability ──────────────────────────────────────
export { getConfig, resetConfig, requireSecret } from './config';
export type { AppConfig } from './config';
export { logger, log, setLogLevel, serializeError } from './observability/logger';
export type { LogLevel, LogEntry } from './observability/logger';
