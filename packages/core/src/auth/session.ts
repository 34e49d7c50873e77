import { eq, and, isNull } from 'drizzle-orm';
import { db, sql, members, memberCredentials, refreshTokens } from '@shepherd/db';
import type { Executor } from '@shepherd/db';
import { AuthenticationError, hashToken, parseInput, verifySecret } from '@shepherd/shared';
import { getConfig } from '../config';
import { logLogin } from '../audit';
import { logger } from '../observability/logger';
import { enforceRateLimit, clearRateLimit, RATE_LIMITS } from '../security/rate-limiter';
import { signAccessToken, signRefreshToken, verifyRefreshToken } from './tokens';
import { loginSchema, refreshSchema } from './validation';
import type { LoginInput, RefreshInput } from './validation';
import type { AuthUser, TokenPair } from './index';

export interface SessionResult extends TokenPair {
  user: AuthUser;
}

async function loadRoleNames(executor: Executor, memberId: string): Promise<string[]> {
  const rows = await executor.execute<{ name: string }>(sql`
    SELECT r.name
    FROM member_roles mr
    JOIN roles r ON r.id = mr.role_id
    WHERE mr.member_id = ${memberId}
    ORDER BY r.name
  `);
  return Array.from(rows).map((r) => r.name);
}

async function issueTokens(executor: Executor, user: AuthUser): Promise<TokenPair> {
  const { ACCESS_TOKEN_TTL_SECONDS, REFRESH_TOKEN_TTL_SECONDS } = getConfig();
  const accessToken = signAccessToken(user);
  const refreshToken = signRefreshToken(user.id);

  await executor.insert(refreshTokens).values({
    memberId: user.id,
    tokenHash: hashToken(refreshToken),
    expiresAt: new Date(Date.now() + REFRESH_TOKEN_TTL_SECONDS * 1000),
  });

  return { accessToken, refreshToken, expiresIn: ACCESS_TOKEN_TTL_SECONDS };
}

/**
 * Username/password login. Attempts are limited per client address and the
 * counter is cleared on success. Every failure answers "Invalid credentials".
 */
export async function login(
  input: LoginInput,
  meta: { ipAddress?: string } = {},
): Promise<SessionResult> {
  const { username, password } = parseInput(loginSchema, input);
  const rateLimitKey = `login:${meta.ipAddress ?? 'unknown'}`;
  enforceRateLimit(rateLimitKey, RATE_LIMITS.login);

  const credential = await db.query.memberCredentials.findFirst({
    where: eq(memberCredentials.username, username),
  });
  const member = credential
    ? await db.query.members.findFirst({ where: eq(members.id, credential.memberId) })
    : undefined;

  const fail = async (reason: string): Promise<never> => {
    await logLogin({
      username,
      memberId: member?.id ?? null,
      success: false,
      ipAddress: meta.ipAddress,
      reason,
    });
    throw new AuthenticationError('Invalid credentials');
  };

  if (!credential || !member) return fail('unknown username');
  if (member.deleted || member.membershipStatus !== 'Active') return fail('member inactive');
  if (!verifySecret(password, credential.passwordHash)) return fail('bad password');

  const user: AuthUser = { id: member.id, username, roles: await loadRoleNames(db, member.id) };
  const tokens = await db.transaction(async (tx) => {
    const issued = await issueTokens(tx, user);
    await tx
      .update(memberCredentials)
      .set({ lastLoginAt: new Date() })
      .where(eq(memberCredentials.id, credential.id));
    return issued;
  });

  clearRateLimit(rateLimitKey);
  await logLogin({ username, memberId: member.id, success: true, ipAddress: meta.ipAddress });
  logger.info('Member logged in', { userId: member.id });

  return { ...tokens, user };
}

/** Rotates the refresh token: the presented one is revoked and a new pair issued. */
export async function refreshSession(input: RefreshInput): Promise<SessionResult> {
  const { refreshToken } = parseInput(refreshSchema, input);
  const claims = verifyRefreshToken(refreshToken);

  return db.transaction(async (tx) => {
    const stored = await tx.query.refreshTokens.findFirst({
      where: and(eq(refreshTokens.tokenHash, hashToken(refreshToken)), isNull(refreshTokens.revokedAt)),
    });
    if (!stored || stored.memberId !== claims.sub || stored.expiresAt.getTime() <= Date.now()) {
      throw new AuthenticationError('Invalid or expired token');
    }

    const member = await tx.query.members.findFirst({ where: eq(members.id, stored.memberId) });
    const credential = await tx.query.memberCredentials.findFirst({
      where: eq(memberCredentials.memberId, stored.memberId),
    });
    if (!member || !credential || member.deleted || member.membershipStatus !== 'Active') {
      throw new AuthenticationError('Invalid or expired token');
    }

    await tx.update(refreshTokens).set({ revokedAt: new Date() }).where(eq(refreshTokens.id, stored.id));

    const user: AuthUser = {
      id: member.id,
      username: credential.username,
      roles: await loadRoleNames(tx, member.id),
    };
    const tokens = await issueTokens(tx, user);
    return { ...tokens, user };
  });
}

/** Revokes the refresh token. Unknown or already revoked tokens are ignored. */
export async function logout(input: RefreshInput): Promise<void> {
  const { refreshToken } = parseInput(refreshSchema, input);
  await db
    .update(refreshTokens)
    .set({ revokedAt: new Date() })
    .where(and(eq(refreshTokens.tokenHash, hashToken(refreshToken)), isNull(refreshTokens.revokedAt)));
}
