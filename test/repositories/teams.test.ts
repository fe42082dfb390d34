import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { TeamsRepository } from '../../src/repositories/teams.js';
import { PlayerLookupError, TeamLookupError } from '../../src/store/errors.js';
import { MemoryStorage } from '../../src/store/memory.js';
import { createTestContext, isoAt, makeTeam } from '../helpers/context.js';

let storage: MemoryStorage;
let teams: TeamsRepository;

beforeEach(() => {
  storage = new MemoryStorage();
  teams = new TeamsRepository(storage, createTestContext());
});

test('create sanitizes input and assigns the first free color', async () => {
  await teams.create({ name: 'Zebras', sport: 'FOOTBALL', colorIndex: 0 });
  const created = await teams.create({
    name: '  Red \n Lions ',
    sport: 'HOCKEY',
    players: [{ name: 'Sam', nickname: ' ' }],
  });

  assert.equal(created.name, 'Red Lions');
  assert.equal(created.colorIndex, 1);
  assert.equal(created.badgeName, 'sf:shield.fill');
  assert.equal(created.players[0].nickname, null);
  assert.deepEqual(
    (await teams.list()).map((team) => team.name),
    ['Red Lions', 'Zebras']
  );
});

test('teams sort by name, then sport label', async () => {
  await teams.create({ name: 'beta', sport: 'VOLLEYBALL' });
  await teams.create({ name: 'Beta', sport: 'BASKETBALL' });
  await teams.create({ name: 'Alpha', sport: 'TENNIS' });
  const listed = await teams.list();
  assert.deepEqual(
    listed.map((team) => `${team.name}|${team.sport}`),
    ['Alpha|TENNIS', 'Beta|BASKETBALL', 'beta|VOLLEYBALL']
  );
});

test('invalid and duplicate stored records are dropped on load', async () => {
  const alpha = makeTeam('team-a', 'Alpha');
  await storage.save('teams', [alpha, { ...alpha, name: 'Shadow' }, { id: 'x', sport: 'CURLING' }]);
  const listed = await teams.list();
  assert.deepEqual(
    listed.map((team) => team.name),
    ['Alpha']
  );
});

test('setters update a team by id and stamp updatedAt', async () => {
  const team = await teams.create({ name: 'Alpha', sport: 'FOOTBALL' });
  const renamed = await teams.rename(team.id, 'Alpha United');
  assert.equal(renamed.name, 'Alpha United');
  assert.notEqual(renamed.updatedAt, team.updatedAt);
  assert.equal((await teams.setSport(team.id, 'BASKETBALL')).sport, 'BASKETBALL');
  assert.equal((await teams.setBadge(team.id, 'sf:trophy.fill')).badgeName, 'sf:trophy.fill');
  assert.equal((await teams.setColor(team.id, 13)).colorIndex, 3);
  assert.equal((await teams.require(team.id)).name, 'Alpha United');
});

test('unknown ids raise lookup errors', async () => {
  await assert.rejects(teams.require('missing'), TeamLookupError);
  await assert.rejects(teams.rename('missing', 'x'), TeamLookupError);
  await assert.rejects(teams.delete('missing'), TeamLookupError);
  const team = await teams.create({ name: 'Alpha', sport: 'FOOTBALL' });
  await assert.rejects(teams.removePlayer(team.id, 'ghost'), PlayerLookupError);
});

test('duplicate copies the roster under a new id and color', async () => {
  const team = await teams.create({ name: 'Alpha', sport: 'FOOTBALL', players: [{ name: 'Sam' }] });
  const copy = await teams.duplicate(team.id);
  assert.notEqual(copy.id, team.id);
  assert.equal(copy.name, 'Alpha Copy');
  assert.equal(copy.colorIndex, 1);
  assert.deepEqual(copy.players, team.players);
  assert.equal((await teams.list()).length, 2);
});

test('player management', async () => {
  const team = await teams.create({ name: 'Alpha', sport: 'FOOTBALL' });
  const { player } = await teams.addPlayer(team.id, { name: 'Sam Rivers' });
  const { player: updated } = await teams.updatePlayer(team.id, player.id, { nickname: 'Riv' });
  assert.equal(updated.nickname, 'Riv');
  assert.equal(updated.name, 'Sam Rivers');

  const stored = await teams.require(team.id);
  assert.deepEqual(stored.players, [updated]);

  const emptied = await teams.removePlayer(team.id, player.id);
  assert.deepEqual(emptied.players, []);
});

test('queries filter by sport and search text', async () => {
  await teams.create({ name: 'Spinners', sport: 'TABLE_TENNIS' });
  await teams.create({ name: 'Blockers', sport: 'VOLLEYBALL', players: [{ name: 'Kai', nickname: 'Wall' }] });
  assert.deepEqual(
    (await teams.forSport('VOLLEYBALL')).map((team) => team.name),
    ['Blockers']
  );
  assert.deepEqual(
    (await teams.search('wall')).map((team) => team.name),
    ['Blockers']
  );
  assert.equal((await teams.search('   ')).length, 2);
});

test('badge suggestion prefers the least used recommended symbol', async () => {
  assert.equal(await teams.suggestBadgeName(), 'sf:shield.fill');
  await teams.create({ name: 'Alpha', sport: 'FOOTBALL' });
  assert.equal(await teams.suggestBadgeName(), 'sf:flag.filled.and.flag.crossed');
});

test('bulk replace and remove', async () => {
  await teams.replaceAll([makeTeam('team-b', 'Bravo'), makeTeam('team-a', 'Alpha'), makeTeam('team-a', 'Again')]);
  const listed = await teams.list();
  assert.deepEqual(
    listed.map((team) => team.id),
    ['team-a', 'team-b']
  );
  assert.equal(listed[1].createdAt, isoAt(0));
  await teams.removeAll();
  assert.deepEqual(await teams.list(), []);
});

test('overlapping writes keep every change', async () => {
  const team = await teams.create({ name: 'Alpha', sport: 'FOOTBALL' });
  await Promise.all([
    teams.addPlayer(team.id, { name: 'Sam Rivers' }),
    teams.addPlayer(team.id, { name: 'Jo Park' }),
    teams.create({ name: 'Bravo', sport: 'FOOTBALL' }),
  ]);

  const stored = await teams.require(team.id);
  assert.deepEqual(
    stored.players.map((player) => player.name),
    ['Sam Rivers', 'Jo Park']
  );
  assert.equal((await teams.list()).length, 2);
});
