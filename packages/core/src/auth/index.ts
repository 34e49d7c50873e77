export interface AuthUser {
  id: string;
  username: string;
  roles: string[];
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}

export { requestContext, getRequestContext } from './context';
export type { RequestContext } from './context';
export { signAccessToken, signRefreshToken, verifyAccessToken, verifyRefreshToken } from './tokens';
export type { AccessTokenClaims, RefreshTokenClaims } from './tokens';
export { authenticate, getClientIp } from './middleware';
export { withMiddleware, withPublicMiddleware } from './with-middleware';
export { errorResponse } from './with-middleware';
export type { RouteHandler, PublicRouteHandler, MiddlewareOptions, HandlerContext, PublicContext } from './with-middleware';
export { login, refreshSession, logout } from './session';
export type { SessionResult } from './session';
export { loginSchema, refreshSchema } from './validation';
export type { LoginInput, RefreshInput } from './validation';
