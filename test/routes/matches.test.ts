import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

process.env.NODE_ENV = 'test';
delete process.env.DATABASE_URL;

const { createTestApp } = await import('../helpers/app.js');

let agent: ReturnType<typeof request>;
let alphaId: string;
let bravoId: string;

const createTeam = async (name: string) => {
  const res = await agent.post('/v1/teams').send({ name, sport: 'ESPORTS_CS' });
  assert.equal(res.status, 201, res.text);
  const teamId: string = res.body.team_id;
  return teamId;
};

const createMatch = async (payload: Record<string, unknown> = {}) => {
  const res = await agent.post('/v1/matches').send({
    sport: 'ESPORTS_CS',
    team_a_id: alphaId,
    team_b_id: bravoId,
    rules: { mode: 'points', points: { target: 2 } },
    ...payload,
  });
  assert.equal(res.status, 201, res.text);
  const matchId: string = res.body.match_id;
  return matchId;
};

beforeEach(async () => {
  const { app } = createTestApp();
  agent = request(app);
  alphaId = await createTeam('Alpha');
  bravoId = await createTeam('Bravo');
});

test('POST /v1/matches answers with the normalized rules and an empty board', async () => {
  const res = await agent.post('/v1/matches').send({
    sport: 'ESPORTS_CS',
    team_a_id: alphaId,
    team_b_id: bravoId,
    rules: { mode: 'points', points: { target: 2 } },
  });
  assert.equal(res.status, 201, res.text);
  assert.deepEqual(res.body.rules, {
    mode: 'points',
    sport: 'ESPORTS_CS',
    description: 'To 2',
    points: { target: 2, win_by_two: false },
  });
  assert.equal(res.body.team_a.name, 'Alpha');
  assert.deepEqual(res.body.score, { a: 0, b: 0 });
  assert.equal(res.body.status, 'in_progress');
  assert.equal(res.body.progress, '0 : 0');
  assert.equal(res.body.can_undo, false);
  assert.deepEqual(res.body.events, []);
});

test('matches without rules use the sport preset', async () => {
  const res = await agent.post('/v1/matches').send({ sport: 'VOLLEYBALL', team_a_id: alphaId, team_b_id: bravoId });
  assert.equal(res.status, 201, res.text);
  assert.equal(res.body.rules.description, 'Bo5, set 25, +2');
  assert.deepEqual(res.body.scoring, {
    mode: 'sets',
    index: 0,
    scores_a: [0],
    scores_b: [0],
    sets_won_a: 0,
    sets_won_b: 0,
  });
});

test('match creation errors map to 400 and 404', async () => {
  const same = await agent.post('/v1/matches').send({ sport: 'ESPORTS_CS', team_a_id: alphaId, team_b_id: alphaId });
  assert.equal(same.status, 400);
  assert.deepEqual(same.body, {
    error: 'invalid_participants',
    code: 'same_team',
    message: 'A match needs two different teams',
  });

  const unknown = await agent.post('/v1/matches').send({ sport: 'ESPORTS_CS', team_a_id: alphaId, team_b_id: 'ghost' });
  assert.equal(unknown.status, 404);
  assert.equal(unknown.body.error, 'team_not_found');

  const invalid = await agent.post('/v1/matches').send({ sport: 'ESPORTS_CS', team_a_id: alphaId });
  assert.equal(invalid.status, 400);
  assert.equal(invalid.body.error, 'validation_error');
});

test('scoring to the target finishes the match and later scores are rejected', async () => {
  const matchId = await createMatch();

  const first = await agent.post(`/v1/matches/${matchId}/score`).send({ side: 'A' });
  assert.equal(first.status, 200, first.text);
  assert.equal(first.body.applied, true);
  assert.equal(first.body.reason, null);
  assert.equal(first.body.match.progress, '1 : 0');

  const second = await agent.post(`/v1/matches/${matchId}/score`).send({ side: 'A' });
  assert.equal(second.body.match.winner, 'A');
  assert.equal(second.body.match.status, 'won');
  assert.equal(second.body.match.finished, true);
  assert.deepEqual(
    second.body.match.events.map((event: { kind: string }) => event.kind),
    ['score', 'score', 'matchEnd']
  );

  const rejected = await agent.post(`/v1/matches/${matchId}/score`).send({ side: 'B' });
  assert.equal(rejected.status, 200);
  assert.equal(rejected.body.applied, false);
  assert.equal(rejected.body.reason, 'match_finished');

  const badSide = await agent.post(`/v1/matches/${matchId}/score`).send({ side: 'C' });
  assert.equal(badSide.status, 400);
});

test('undo and redo walk the history', async () => {
  const matchId = await createMatch();
  await agent.post(`/v1/matches/${matchId}/set-score`).send({ score_a: 1, score_b: 1 });
  await agent.post(`/v1/matches/${matchId}/notes`).send({ text: 'Timeout Bravo' });

  const undone = await agent.post(`/v1/matches/${matchId}/undo`).send();
  assert.equal(undone.body.applied, true);
  assert.equal(undone.body.match.events.length, 1);
  assert.equal(undone.body.match.can_redo, true);

  const redone = await agent.post(`/v1/matches/${matchId}/redo`).send();
  assert.equal(redone.body.match.events[1].text, 'Timeout Bravo');

  const nothing = await agent.post(`/v1/matches/${matchId}/redo`).send();
  assert.equal(nothing.body.applied, false);
  assert.equal(nothing.body.reason, 'nothing_to_redo');

  const reset = await agent.post(`/v1/matches/${matchId}/reset`).send();
  assert.deepEqual(reset.body.match.score, { a: 0, b: 0 });
  assert.equal(reset.body.match.can_undo, true);
});

test('timed matches tick and close periods', async () => {
  const res = await agent.post('/v1/matches').send({
    sport: 'FOOTBALL',
    team_a_id: alphaId,
    team_b_id: bravoId,
    rules: { mode: 'timed', time: { periods: 2, seconds_per_period: 60, allow_draw: true } },
  });
  const matchId: string = res.body.match_id;
  assert.equal(res.body.progress, 'P1/2  01:00 — 0 : 0');

  const ticked = await agent.post(`/v1/matches/${matchId}/tick`).send({ seconds: 15 });
  assert.equal(ticked.body.match.progress, 'P1/2  00:45 — 0 : 0');

  await agent.post(`/v1/matches/${matchId}/end-period`).send();
  const ended = await agent.post(`/v1/matches/${matchId}/end-period`).send();
  assert.equal(ended.body.match.status, 'drawn');
  assert.equal(ended.body.match.winner, null);

  const wrongMode = await agent.post(`/v1/matches/${matchId}/reset-set`).send();
  assert.equal(wrongMode.body.reason, 'wrong_mode');
});

test('GET /v1/matches lists newest first and filters', async () => {
  const first = await createMatch();
  const second = await createMatch({ team_a_id: bravoId, team_b_id: alphaId });
  await agent.post(`/v1/matches/${first}/score`).send({ side: 'A', delta: 2 });

  const all = await agent.get('/v1/matches');
  assert.deepEqual(
    all.body.matches.map((match: { match_id: string }) => match.match_id),
    [first, second]
  );
  assert.equal(all.body.matches[0].events, undefined);

  const finished = await agent.get('/v1/matches').query({ status: 'finished' });
  assert.deepEqual(
    finished.body.matches.map((match: { match_id: string }) => match.match_id),
    [first]
  );

  const limited = await agent.get('/v1/matches').query({ limit: 1, include_events: 'true' });
  assert.equal(limited.body.matches.length, 1);
  assert.equal(limited.body.matches[0].events.length, 2);

  const invalid = await agent.get('/v1/matches').query({ status: 'paused' });
  assert.equal(invalid.status, 400);
});

test('rematch creates a fresh match and delete removes one', async () => {
  const matchId = await createMatch();

  const rematch = await agent.post(`/v1/matches/${matchId}/rematch`).send({ swapped: true });
  assert.equal(rematch.status, 201, rematch.text);
  assert.equal(rematch.body.team_a.team_id, bravoId);
  assert.equal(rematch.body.rules.description, 'To 2');

  const removed = await agent.delete(`/v1/matches/${matchId}`);
  assert.equal(removed.status, 204);

  const missing = await agent.get(`/v1/matches/${matchId}`);
  assert.equal(missing.status, 404);
  assert.deepEqual(missing.body, { error: 'match_not_found', message: `Match not found: ${matchId}` });

  const mutation = await agent.post(`/v1/matches/${matchId}/undo`).send();
  assert.equal(mutation.status, 404);
});
