import { AuthenticationError } from '@shepherd/shared';
import { verifyAccessToken } from './tokens';
import type { AuthUser } from './index';

export async function authenticate(request: Request): Promise<AuthUser> {
  const authHeader = request.headers.get('authorization');

  if (!authHeader) {
    throw new AuthenticationError();
  }

  if (!authHeader.startsWith('Bearer ')) {
    throw new AuthenticationError('Invalid authorization format');
  }

  const token = authHeader.slice(7);
  if (!token) {
    throw new AuthenticationError('Invalid authorization format');
  }

  const claims = verifyAccessToken(token);
  return { id: claims.sub, username: claims.username, roles: claims.roles };
}

/** Client IP from x-forwarded-for or x-real-ip. */
export function getClientIp(request: Request): string {
  const forwarded = request.headers.get('x-forwarded-for');
  return forwarded?.split(',')[0]?.trim() || request.headers.get('x-real-ip') || 'unknown';
}
