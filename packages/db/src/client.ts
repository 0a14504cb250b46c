import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { schema } from './schemas/index.js';

export type Database = NodePgDatabase<typeof schema>;

// pg connects lazily, so importing this module never opens a socket on its own.
export const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  max: Number(process.env.DATABASE_MAX_CONNECTIONS ?? 10),
  connectionTimeoutMillis: Number(process.env.DATABASE_CONNECTION_TIMEOUT_MS ?? 5000),
});

export const db: Database = drizzle({ client: pool, schema });
