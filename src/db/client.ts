import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import { loadConfig } from '../config.js';
import * as schema from './schema.js';

let pool: Pool | undefined;

export const getPool = () => {
  if (!pool) {
    const { databaseUrl } = loadConfig();
    if (!databaseUrl) throw new Error('DATABASE_URL is not set');
    pool = new Pool({ connectionString: databaseUrl });
  }
  return pool;
};

export const getDb = () => drizzle(getPool(), { schema });

export type DbClient = ReturnType<typeof getDb>;

export const closePool = async () => {
  if (!pool) return;
  const current = pool;
  pool = undefined;
  await current.end();
};
