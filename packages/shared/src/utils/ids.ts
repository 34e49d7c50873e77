import { monotonicFactory } from 'ulid';
import { ValidationError } from '../errors';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

export function generateUlid(): string {
  return ulid();
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}

/** Route params arrive as free text; reject anything that cannot be a row id. */
export function assertUlid(value: string | undefined, field = 'id'): string {
  if (!value || !isValidUlid(value)) {
    throw new ValidationError(`Invalid ${field}`, [{ field, message: 'Must be a valid id' }]);
  }
  return value;
}
