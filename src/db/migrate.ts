import { join } from 'node:path';
import type { PoolClient } from 'pg';

import { loadConfig } from '../config.js';
import { closePool, getPool } from './client.js';
import { connectWithRetry, pendingMigrations, readMigrations } from './migrations.js';
import type { Migration } from './migrations.js';

const MIGRATIONS_DIR = join(process.cwd(), 'drizzle');
const LEDGER_TABLE = '__tallyboard_migrations';

const appliedNames = async (client: PoolClient) => {
  await client.query(
    `CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (name TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW())`
  );
  const { rows } = await client.query<{ name: string }>(`SELECT name FROM ${LEDGER_TABLE}`);
  return rows.map((row) => row.name);
};

const applyMigration = async (client: PoolClient, migration: Migration) => {
  await client.query('BEGIN');
  try {
    await client.query(migration.sql);
    await client.query(`INSERT INTO ${LEDGER_TABLE} (name) VALUES ($1)`, [migration.name]);
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  }
};

const run = async () => {
  const config = loadConfig();
  const client = await connectWithRetry<PoolClient>(getPool(), config.migrateRetries, config.migrateRetryDelayMs);
  try {
    const pending = pendingMigrations(readMigrations(MIGRATIONS_DIR), await appliedNames(client));
    for (const migration of pending) {
      console.log('migration_applying', { name: migration.name });
      await applyMigration(client, migration);
    }
    console.log('migrations_up_to_date', { applied: pending.length });
  } finally {
    client.release();
    await closePool();
  }
};

run().catch((err) => {
  console.error('migrate_failed', err);
  process.exitCode = 1;
});
