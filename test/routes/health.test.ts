import { test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

process.env.NODE_ENV = 'test';
delete process.env.DATABASE_URL;

const { createTestApp } = await import('../helpers/app.js');

test('GET /health reports the storage backend', async () => {
  const { app } = createTestApp();
  const res = await request(app).get('/health');
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true, storage: 'memory' });
});

test('GET /v1/sports lists every sport with its default rules', async () => {
  const { app } = createTestApp();
  const res = await request(app).get('/v1/sports');
  assert.equal(res.status, 200);
  assert.equal(res.body.sports.length, 10);
  assert.deepEqual(res.body.sports[0], {
    sport: 'FOOTBALL',
    key: 'football',
    label: 'Football',
    short_label: 'Football',
    supports_sets: false,
    uses_timer_by_default: true,
    default_rules: {
      mode: 'timed',
      sport: 'FOOTBALL',
      description: '2×45m',
      time: { periods: 2, seconds_per_period: 2700, allow_draw: true, overtime_seconds: null, stop_on_score: false },
    },
  });
  assert.equal(res.body.presets.length, 3);
});

test('GET /v1/rules/defaults/:sport validates the sport', async () => {
  const { app } = createTestApp();
  const hockey = await request(app).get('/v1/rules/defaults/HOCKEY');
  assert.equal(hockey.body.description, '3×20m + OT');
  assert.equal(hockey.body.time.overtime_seconds, 300);

  const unknown = await request(app).get('/v1/rules/defaults/CURLING');
  assert.equal(unknown.status, 400);
  assert.equal(unknown.body.error, 'validation_error');
});
