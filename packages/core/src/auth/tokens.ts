import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AuthenticationError, generateUlid } from '@shepherd/shared';
import { getConfig, requireSecret } from '../config';

const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  username: z.string(),
  roles: z.array(z.string()),
  type: z.literal('access'),
});

const refreshClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  type: z.literal('refresh'),
});

export type AccessTokenClaims = z.infer<typeof accessClaimsSchema>;
export type RefreshTokenClaims = z.infer<typeof refreshClaimsSchema>;

export function signAccessToken(user: { id: string; username: string; roles: string[] }): string {
  return jwt.sign(
    { username: user.username, roles: user.roles, type: 'access' },
    requireSecret('JWT_SECRET'),
    {
      algorithm: 'HS256',
      subject: user.id,
      expiresIn: getConfig().ACCESS_TOKEN_TTL_SECONDS,
    },
  );
}

/** Every refresh token carries a fresh `jti` so two issued in the same second still differ. */
export function signRefreshToken(memberId: string): string {
  return jwt.sign({ type: 'refresh' }, requireSecret('JWT_REFRESH_SECRET'), {
    algorithm: 'HS256',
    subject: memberId,
    jwtid: generateUlid(),
    expiresIn: getConfig().REFRESH_TOKEN_TTL_SECONDS,
  });
}

function decode(token: string, secret: string): unknown {
  try {
    return jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError || error instanceof jwt.JsonWebTokenError) {
      throw new AuthenticationError('Invalid or expired token');
    }
    throw error;
  }
}

export function verifyAccessToken(token: string): AccessTokenClaims {
  const parsed = accessClaimsSchema.safeParse(decode(token, requireSecret('JWT_SECRET')));
  if (!parsed.success) {
    throw new AuthenticationError('Invalid or expired token');
  }
  return parsed.data;
}

export function verifyRefreshToken(token: string): RefreshTokenClaims {
  const parsed = refreshClaimsSchema.safeParse(decode(token, requireSecret('JWT_REFRESH_SECRET')));
  if (!parsed.success) {
    throw new AuthenticationError('Invalid or expired token');
  }
  return parsed.data;
}
