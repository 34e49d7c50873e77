import { sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';

/** Joins raw filter fragments with AND; an empty list matches every row. */
export function whereAll(conditions: SQL[]): SQL {
  if (conditions.length === 0) return sql`TRUE`;
  return conditions.reduce((acc, cond) => sql`${acc} AND ${cond}`);
}

/** `%text%` for ILIKE with the wildcard characters in `text` matched literally. */
export function containsPattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}
