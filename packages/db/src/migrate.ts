import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';
import path from 'node:path';

// Run from packages/db (npm run db:migrate).
const MIGRATIONS_FOLDER = path.resolve(process.cwd(), 'migrations');

async function applyMigrations(): Promise<void> {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  console.log(`Applying migrations from ${MIGRATIONS_FOLDER} to ${url.replace(/:[^:@]+@/, ':***@')}`);
  const client = postgres(url, { max: 1, onnotice: () => undefined });
  try {
    await migrate(drizzle(client), { migrationsFolder: MIGRATIONS_FOLDER });
    console.log('Schema is up to date.');
  } finally {
    await client.end();
  }
}

applyMigrations().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
