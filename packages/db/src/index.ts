export { db, sql, schema } from './client';
export type { Database, Transaction, Executor } from './client';
export { whereAll, containsPattern } from './sql-helpers';
export * from './schema';
