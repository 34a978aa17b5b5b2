import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import * as schema from './schema.js';

let pool: Pool | undefined;

export const getPool = (connectionString = process.env.DATABASE_URL) => {
  if (!pool) {
    if (!connectionString) throw new Error('DATABASE_URL is not set');
    pool = new Pool({ connectionString });
  }
  return pool;
};

export const getDb = (connectionString?: string) => drizzle(getPool(connectionString), { schema });

export type DbClient = ReturnType<typeof getDb>;

export type DbTransaction = Parameters<Parameters<DbClient['transaction']>[0]>[0];
