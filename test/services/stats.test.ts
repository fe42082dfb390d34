import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'timers/promises';

import type { RulesInput, TeamRecord } from '../../src/engine/types.js';
import { MatchesRepository } from '../../src/repositories/matches.js';
import { TeamsRepository } from '../../src/repositories/teams.js';
import { StatsService } from '../../src/services/stats.js';
import { MemoryStorage } from '../../src/store/memory.js';
import type { CollectionKey, CollectionListener, CollectionStorage } from '../../src/store/types.js';
import { createTestContext } from '../helpers/context.js';

let storage: MemoryStorage;
let matches: MatchesRepository;
let alpha: TeamRecord;
let bravo: TeamRecord;

const toTwo: RulesInput = { mode: 'points', sport: 'ESPORTS_CS', points: { target: 2, winByTwo: false } };

beforeEach(async () => {
  storage = new MemoryStorage();
  const context = createTestContext();
  const teams = new TeamsRepository(storage, context);
  matches = new MatchesRepository(storage, teams, context);
  alpha = await teams.create({ name: 'Alpha', sport: 'ESPORTS_CS' });
  bravo = await teams.create({ name: 'Bravo', sport: 'ESPORTS_CS' });
});

test('the summary loads lazily from storage', async () => {
  const match = await matches.create({ sport: 'ESPORTS_CS', teamAId: alpha.id, teamBId: bravo.id, rules: toTwo });
  await matches.score(match.id, 'B');
  await matches.score(match.id, 'B');

  const stats = new StatsService(matches, storage);
  const record = await stats.record(bravo.id, 'ESPORTS_CS');
  assert.equal(record?.wins, 1);
  assert.equal(record?.currentStreak, 1);
  assert.equal((await stats.record(alpha.id, 'ESPORTS_CS'))?.losses, 1);
  assert.equal(await stats.record(alpha.id, 'FOOTBALL'), null);
  assert.equal(await stats.overview('FOOTBALL'), null);
});

test('changes to the matches collection rebuild the summary', async () => {
  const stats = new StatsService(matches, storage);
  stats.start();
  assert.deepEqual((await stats.summary()).teamRecords, []);

  const match = await matches.create({ sport: 'ESPORTS_CS', teamAId: alpha.id, teamBId: bravo.id, rules: toTwo });
  await matches.score(match.id, 'A');
  const final = await matches.score(match.id, 'A');
  await stats.settled();

  const summary = await stats.summary();
  assert.equal(summary.generatedAt, final.match.updatedAt);
  assert.deepEqual(
    summary.teamRecords.map((record) => `${record.teamName}:${record.wins}-${record.losses}`),
    ['Alpha:1-0', 'Bravo:0-1']
  );
  assert.equal((await stats.recordsForTeam(alpha.id)).length, 1);
  assert.deepEqual(
    (await stats.topWinStreaks()).map((record) => record.teamName),
    ['Alpha']
  );

  stats.stop();
  await matches.rematch(match.id);
  assert.equal((await stats.summary()).generatedAt, final.match.updatedAt);
});

test('in-progress matches can be excluded per request', async () => {
  const stats = new StatsService(matches, storage);
  stats.start();
  const first = await matches.create({ sport: 'ESPORTS_CS', teamAId: alpha.id, teamBId: bravo.id, rules: toTwo });
  await matches.score(first.id, 'A');
  await matches.score(first.id, 'A');
  const second = await matches.create({ sport: 'ESPORTS_CS', teamAId: alpha.id, teamBId: bravo.id, rules: toTwo });
  await matches.score(second.id, 'B');
  await stats.settled();

  assert.equal((await stats.overview('ESPORTS_CS'))?.matches, 2);
  const finishedOnly = await stats.summary({ includeInProgress: false });
  assert.equal(finishedOnly.sportOverviews[0].matches, 1);
  assert.equal((await stats.summary()).sportOverviews[0].matches, 2);

  const digest = await stats.sportDigest();
  assert.deepEqual(digest.map((entry) => entry.sport), ['ESPORTS_CS']);
  stats.stop();
});

// Reads the inner collection right away, then holds the result back.
class DelayedStorage implements CollectionStorage {
  readonly kind = 'memory';

  constructor(
    private readonly inner: MemoryStorage,
    private readonly delays: number[]
  ) {}

  async load(key: CollectionKey) {
    const items = await this.inner.load(key);
    if (key === 'matches') await sleep(this.delays.shift() ?? 0);
    return items;
  }

  save(key: CollectionKey, items: readonly unknown[]) {
    return this.inner.save(key, items);
  }

  clear(key: CollectionKey) {
    return this.inner.clear(key);
  }

  clearAll() {
    return this.inner.clearAll();
  }

  onChange(listener: CollectionListener) {
    return this.inner.onChange(listener);
  }
}

test('a slow rebuild never replaces the one for a later change', async () => {
  const slow = new DelayedStorage(storage, [30, 0]);
  const reader = new MatchesRepository(slow, new TeamsRepository(slow, createTestContext()));
  const stats = new StatsService(reader, slow);
  stats.start();

  const match = await matches.create({ sport: 'ESPORTS_CS', teamAId: alpha.id, teamBId: bravo.id, rules: toTwo });
  const scored = await matches.score(match.id, 'A');
  await stats.settled();
  await sleep(40);

  const summary = await stats.summary();
  assert.equal(summary.generatedAt, scored.match.updatedAt);
  assert.equal((await stats.record(alpha.id, 'ESPORTS_CS'))?.pointsFor, 1);
  stats.stop();
});
