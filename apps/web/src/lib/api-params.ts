/**
 * Shared helpers for reading API route input.
 * Bodies and query strings go through the module's zod schema so handlers
 * receive typed, coerced values and every route reports the same
 * ValidationError shape.
 */
import type { z } from 'zod';
import { ValidationError, parseInput } from '@shepherd/shared';

/**
 * Parse the JSON body against `schema`.
 * A malformed body is a ValidationError, not a 500.
 */
export async function parseBody<S extends z.ZodTypeAny>(
  request: Request,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  return parseInput(schema, body);
}

/**
 * Parse the query string against `schema`. Repeated keys keep the last value;
 * empty values are treated as absent.
 */
export function parseQuery<S extends z.ZodTypeAny>(request: Request, schema: S): z.output<S> {
  return parseInput(schema, searchParamsToObject(new URL(request.url).searchParams));
}

export function searchParamsToObject(params: URLSearchParams): Record<string, string> {
  const out: Record<string, string> = {};
  params.forEach((value, key) => {
    if (value !== '') out[key] = value;
  });
  return out;
}

/**
 * Parse a `limit` query parameter with a maximum cap.
 * Returns a safe integer between 1 and `max`, defaulting to `defaultValue`.
 */
export function parseLimit(
  value: string | null,
  max = 100,
  defaultValue = 50,
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) return defaultValue;
  return Math.min(parsed, max);
}

/**
 * Parse an ISO date string query parameter.
 * Returns the string if it looks like a valid date, or undefined.
 */
export function parseDate(value: string | null): string | undefined {
  if (!value) return undefined;
  if (/^\d{4}-\d{2}-\d{2}/.test(value)) return value;
  return undefined;
}

/**
 * Parse a numeric query parameter.
 * Returns the number or undefined if absent/invalid.
 */
export function parseNumber(value: string | null): number | undefined {
  if (!value) return undefined;
  const n = Number(value);
  return isNaN(n) ? undefined : n;
}
