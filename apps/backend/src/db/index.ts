import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import pg from 'pg';
import { config } from '../config/index.js';
import * as schema from './schema/index.js';

const { Pool } = pg;

// Shared pg connection pool: reused across all queries
export const pool = new Pool({
  connectionString: config.databaseUrl,
});

// Drizzle instance with full schema for typed queries
export const db = drizzle(pool, { schema });

// Driver-agnostic handle. Services take this so they run unchanged on the
// node-postgres pool, inside a transaction, or on the in-process test database.
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;
