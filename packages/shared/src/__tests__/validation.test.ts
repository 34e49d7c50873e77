import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { paginationSchema, isoDateSchema, positiveAmountSchema, parseInput } from '../validation';
import { ValidationError } from '../errors';

describe('validation helpers', () => {
  it('coerces and defaults pagination params', () => {
    expect(paginationSchema.parse({})).toEqual({ page: 1, limit: 10 });
    expect(paginationSchema.parse({ page: '2', limit: '25' })).toEqual({ page: 2, limit: 25 });
  });

  it('rejects a page size above 100', () => {
    expect(paginationSchema.safeParse({ limit: 101 }).success).toBe(false);
  });

  it('validates ISO dates', () => {
    expect(isoDateSchema.safeParse('2026-01-31').success).toBe(true);
    expect(isoDateSchema.safeParse('2026-01-32').success).toBe(false);
  });

  it('requires positive amounts', () => {
    expect(positiveAmountSchema.safeParse(0).success).toBe(false);
    expect(positiveAmountSchema.parse('12.50')).toBe(12.5);
  });

  it('maps zod issues to ValidationError details', () => {
    const schema = z.object({ name: z.string().min(1), address: z.object({ city: z.string() }) });
    try {
      parseInput(schema, { name: '', address: {} });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      const details = (err as ValidationError).details ?? [];
      expect(details.map((d) => d.field)).toEqual(['name', 'address.city']);
    }
  });
});
