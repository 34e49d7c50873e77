import { describe, it, expect } from 'vitest';
import { PgDialect } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { containsPattern, whereAll } from '../sql-helpers';

const dialect = new PgDialect();

describe('whereAll', () => {
  it('matches every row without conditions', () => {
    expect(dialect.sqlToQuery(whereAll([])).sql).toBe('TRUE');
  });

  it('joins conditions with AND in order', () => {
    const query = dialect.sqlToQuery(whereAll([sql`a = ${1}`, sql`b = ${'x'}`]));
    expect(query.sql).toBe('a = $1 AND b = $2');
    expect(query.params).toEqual([1, 'x']);
  });
});

describe('containsPattern', () => {
  it('wraps plain text in wildcards', () => {
    expect(containsPattern('ama')).toBe('%ama%');
  });

  it('escapes LIKE wildcards and the escape character', () => {
    expect(containsPattern('50%_off\\')).toBe('%50\\%\\_off\\\\%');
  });
});
