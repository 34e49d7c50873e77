import { describe, it, expect } from 'vitest';
import { paginate, buildPagination, toPaginatedResult } from '../utils/pagination';

describe('pagination', () => {
  it('computes offsets', () => {
    expect(paginate(3, 20)).toEqual({ page: 3, limit: 20, offset: 40 });
  });

  it('falls back to page 1 and the default size for bad input', () => {
    expect(paginate(0, -5)).toEqual({ page: 1, limit: 10, offset: 0 });
    expect(paginate(1.5, 10)).toEqual({ page: 1, limit: 10, offset: 0 });
  });

  it('caps the page size at 100', () => {
    expect(paginate(1, 500).limit).toBe(100);
  });

  it('rounds the page count up', () => {
    expect(buildPagination(1, 10, 21)).toEqual({ page: 1, limit: 10, total: 21, pages: 3 });
    expect(buildPagination(1, 10, 0).pages).toBe(0);
  });

  it('wraps rows with their pagination block', () => {
    expect(toPaginatedResult(['a', 'b'], 2, 2, 4)).toEqual({
      data: ['a', 'b'],
      pagination: { page: 2, limit: 2, total: 4, pages: 2 },
    });
  });
});
