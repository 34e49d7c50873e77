import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '@shepherd/shared';
import { parseBody, parseDate, parseLimit, parseNumber, parseQuery, searchParamsToObject } from '../api-params';

const schema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  name: z.string().optional(),
});

describe('parseQuery', () => {
  it('coerces and applies defaults', () => {
    expect(parseQuery(new Request('http://localhost/x?page=3&name=choir'), schema)).toEqual({ page: 3, name: 'choir' });
    expect(parseQuery(new Request('http://localhost/x'), schema)).toEqual({ page: 1 });
  });

  it('throws a ValidationError naming the field', () => {
    try {
      parseQuery(new Request('http://localhost/x?page=0'), schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details?.[0].field).toBe('page');
      }
    }
  });
});

describe('searchParamsToObject', () => {
  it('drops empty values and keeps the last repeat', () => {
    expect(searchParamsToObject(new URLSearchParams('a=1&b=&a=2'))).toEqual({ a: '2' });
  });
});

describe('parseBody', () => {
  it('parses a JSON body', async () => {
    const request = new Request('http://localhost/x', { method: 'POST', body: '{"name":"choir"}' });
    await expect(parseBody(request, schema)).resolves.toEqual({ page: 1, name: 'choir' });
  });

  it('rejects a body that is not JSON', async () => {
    const request = new Request('http://localhost/x', { method: 'POST', body: '{' });
    await expect(parseBody(request, schema)).rejects.toThrow('Request body must be valid JSON');
  });
});

describe('parseLimit', () => {
  it('defaults, floors at the default and caps at max', () => {
    expect(parseLimit(null)).toBe(50);
    expect(parseLimit('0')).toBe(50);
    expect(parseLimit('abc', 100, 10)).toBe(10);
    expect(parseLimit('250')).toBe(100);
    expect(parseLimit('20')).toBe(20);
  });
});

describe('parseDate / parseNumber', () => {
  it('accepts ISO dates only', () => {
    expect(parseDate('2026-04-01')).toBe('2026-04-01');
    expect(parseDate('04/01/2026')).toBeUndefined();
    expect(parseDate(null)).toBeUndefined();
  });

  it('returns undefined for non-numbers', () => {
    expect(parseNumber('12')).toBe(12);
    expect(parseNumber('twelve')).toBeUndefined();
    expect(parseNumber('')).toBeUndefined();
  });
});
