import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

// Use globalThis to persist the DB pool across Next.js hot reloads in dev.
// Without this, each hot reload creates a new pool without closing the old one.
const globalForDb = globalThis as unknown as { __shepherd_db?: DrizzleDB };

function getDb(): DrizzleDB {
  if (!globalForDb.__shepherd_db) {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    const client = postgres(connectionString, {
      max: parseInt(process.env.DB_POOL_MAX || '10', 10),
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    globalForDb.__shepherd_db = drizzle(client, { schema });
  }
  return globalForDb.__shepherd_db;
}

/** Lazily connects on first property access, so importing never opens a pool. */
export const db: DrizzleDB = new Proxy({} as DrizzleDB, {
  get(_target, prop, receiver) {
    const instance = getDb();
    const value = Reflect.get(instance, prop, receiver);
    if (typeof value === 'function') {
      return value.bind(instance);
    }
    return value;
  },
});

export type Database = DrizzleDB;

/** The handle a `db.transaction` callback receives. */
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

/** Anything a query can run against: the pool or an open transaction. */
export type Executor = Database | Transaction;

export { sql, schema };
