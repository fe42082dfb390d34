import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { setTimeout as sleep } from 'timers/promises';

export interface Migration {
  name: string;
  sql: string;
}

/** SQL files in `dir`, ordered by file name. */
export const readMigrations = (dir: string): Migration[] =>
  readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .map((name) => ({ name, sql: readFileSync(join(dir, name), 'utf8') }));

export const pendingMigrations = (migrations: Migration[], applied: Iterable<string>): Migration[] => {
  const done = new Set(applied);
  return migrations.filter((migration) => !done.has(migration.name));
};

export interface Connectable<C> {
  connect(): Promise<C>;
}

/** Retries `connect` with a linear backoff; the last failure is rethrown. */
export const connectWithRetry = async <C>(pool: Connectable<C>, attempts: number, delayMs: number): Promise<C> => {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      if (attempt >= attempts) throw err;
      console.warn('db_connect_retry', {
        attempt,
        attempts,
        delayMs: delayMs * attempt,
        message: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs * attempt);
    }
  }
};
