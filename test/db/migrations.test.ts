import { test } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import { connectWithRetry, pendingMigrations, readMigrations } from '../../src/db/migrations.js';

test('readMigrations loads the checked-in SQL in name order', () => {
  const migrations = readMigrations(join(process.cwd(), 'drizzle'));
  assert.deepEqual(
    migrations.map((migration) => migration.name),
    ['0000_collections.sql']
  );
  assert.match(migrations[0].sql, /CREATE TABLE/i);
});

test('pendingMigrations skips names already recorded', () => {
  const migrations = [
    { name: '0000_a.sql', sql: 'select 1' },
    { name: '0001_b.sql', sql: 'select 2' },
  ];
  assert.deepEqual(
    pendingMigrations(migrations, ['0000_a.sql']).map((migration) => migration.name),
    ['0001_b.sql']
  );
  assert.deepEqual(pendingMigrations(migrations, ['0000_a.sql', '0001_b.sql']), []);
});

test('connectWithRetry retries until a connection is handed out', async () => {
  let calls = 0;
  const pool = {
    connect: async () => {
      calls += 1;
      if (calls < 3) throw new Error('connection refused');
      return 'client';
    },
  };
  assert.equal(await connectWithRetry<string>(pool, 5, 1), 'client');
  assert.equal(calls, 3);
});

test('connectWithRetry rethrows the last failure once attempts run out', async () => {
  let calls = 0;
  const pool = {
    connect: async (): Promise<string> => {
      calls += 1;
      throw new Error(`refused ${calls}`);
    },
  };
  await assert.rejects(connectWithRetry<string>(pool, 2, 1), { message: 'refused 2' });
  assert.equal(calls, 2);
});
