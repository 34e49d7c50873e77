import { randomBytes, scryptSync, timingSafeEqual, createHash } from 'node:crypto';

export function hashSecret(secret: string): string {
  const salt = randomBytes(16).toString('hex');
  const digest = scryptSync(secret, salt, 64).toString('hex');
  return `scrypt$${salt}$${digest}`;
}

export function verifySecret(secret: string, hash: string): boolean {
  const [algo, salt, digest] = hash.split('$');
  if (algo !== 'scrypt' || !salt || !digest) return false;
  const candidate = scryptSync(secret, salt, 64);
  const expected = Buffer.from(digest, 'hex');
  if (candidate.length !== expected.length) return false;
  return timingSafeEqual(candidate, expected);
}

/** Lookup key for opaque tokens stored server-side. */
export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}
