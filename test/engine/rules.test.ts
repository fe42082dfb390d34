import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  defaultRulesFor,
  describeRules,
  genericRulePresets,
  rulesAllowDraw,
  usesSets,
  usesTimer,
  validateRules,
  withMode,
  withPoints,
  withSets,
  withTime,
} from '../../src/engine/rules.js';
import { SPORTS } from '../../src/engine/sports.js';

test('validateRules clamps every numeric field into range', () => {
  assert.deepEqual(validateRules({ mode: 'points', sport: 'ESPORTS_CS', points: { target: 5000, winByTwo: true } }), {
    mode: 'points',
    sport: 'ESPORTS_CS',
    points: { target: 999, winByTwo: true },
  });

  assert.deepEqual(validateRules({ mode: 'sets', sport: 'VOLLEYBALL', sets: { setsToWin: 0, pointsPerSet: 10.6 } }), {
    mode: 'sets',
    sport: 'VOLLEYBALL',
    sets: { setsToWin: 1, pointsPerSet: 11, winByTwo: true },
  });

  assert.deepEqual(
    validateRules({ mode: 'timed', sport: 'HOCKEY', time: { periods: 20, secondsPerPeriod: 10, allowDraw: false } }),
    {
      mode: 'timed',
      sport: 'HOCKEY',
      time: { periods: 12, secondsPerPeriod: 30, allowDraw: false, overtimeSeconds: 300, stopOnScore: false },
    }
  );
});

test('validateRules fills a missing sub-config with the mode fallback', () => {
  assert.deepEqual(validateRules({ mode: 'sets', sport: 'VOLLEYBALL' }), {
    mode: 'sets',
    sport: 'VOLLEYBALL',
    sets: { setsToWin: 2, pointsPerSet: 25, winByTwo: true },
  });
  assert.deepEqual(validateRules({ mode: 'points', sport: 'FOOTBALL', sets: { setsToWin: 3 } }), {
    mode: 'points',
    sport: 'FOOTBALL',
    points: { target: 21, winByTwo: false },
  });
});

test('validateRules drops overtime when draws are allowed', () => {
  const rules = validateRules({
    mode: 'timed',
    sport: 'FOOTBALL',
    time: { periods: 2, secondsPerPeriod: 2700, allowDraw: true, overtimeSeconds: 600 },
  });
  assert.equal(rules.mode === 'timed' ? rules.time.overtimeSeconds : undefined, null);
});

test('non-finite numbers collapse to the lower bound', () => {
  const rules = validateRules({ mode: 'points', sport: 'ESPORTS_CS', points: { target: Number.NaN } });
  assert.deepEqual(rules, { mode: 'points', sport: 'ESPORTS_CS', points: { target: 1, winByTwo: false } });
});

test('validateRules is idempotent for every sport default', () => {
  for (const sport of SPORTS) {
    const rules = defaultRulesFor(sport);
    assert.deepEqual(validateRules(rules), rules, sport);
  }
});

test('sport defaults and their descriptions', () => {
  assert.equal(describeRules(defaultRulesFor('VOLLEYBALL')), 'Bo5, set 25, +2');
  assert.equal(describeRules(defaultRulesFor('TABLE_TENNIS')), 'Bo5, set 11, +2');
  assert.equal(describeRules(defaultRulesFor('BADMINTON')), 'Bo3, set 21, +2');
  assert.equal(describeRules(defaultRulesFor('TENNIS')), 'Bo3, set 6, +2');
  assert.equal(describeRules(defaultRulesFor('FOOTBALL')), '2×45m');
  assert.equal(describeRules(defaultRulesFor('BASKETBALL')), '4×10m + OT');
  assert.equal(describeRules(defaultRulesFor('HOCKEY')), '3×20m + OT');
  assert.equal(describeRules(defaultRulesFor('ESPORTS_CS')), 'To 13');
  assert.equal(describeRules(defaultRulesFor('ESPORTS_DOTA')), 'Bo3, set 1');
  assert.equal(describeRules(defaultRulesFor('ESPORTS_LOL')), 'Bo3, set 1');
  assert.equal(describeRules(withPoints(defaultRulesFor('ESPORTS_CS'), 21, true)), 'To 21 (win by 2)');
});

test('derived flags follow the mode', () => {
  const football = defaultRulesFor('FOOTBALL');
  const basketball = defaultRulesFor('BASKETBALL');
  const volleyball = defaultRulesFor('VOLLEYBALL');
  assert.equal(rulesAllowDraw(football), true);
  assert.equal(rulesAllowDraw(basketball), false);
  assert.equal(rulesAllowDraw(volleyball), false);
  assert.equal(usesTimer(football), true);
  assert.equal(usesSets(volleyball), true);
  assert.equal(usesSets(football), false);
});

test('withMode switches to the fallback of the new mode and keeps the sport', () => {
  const switched = withMode(defaultRulesFor('BADMINTON'), 'points');
  assert.deepEqual(switched, { mode: 'points', sport: 'BADMINTON', points: { target: 21, winByTwo: false } });
});

test('withSets and withTime re-validate their values', () => {
  const base = defaultRulesFor('FOOTBALL');
  assert.deepEqual(withSets(base, 12, 0, false), {
    mode: 'sets',
    sport: 'FOOTBALL',
    sets: { setsToWin: 9, pointsPerSet: 1, winByTwo: false },
  });
  assert.deepEqual(withTime(base, { periods: 4, secondsPerPeriod: 600, allowDraw: false }), {
    mode: 'timed',
    sport: 'FOOTBALL',
    time: { periods: 4, secondsPerPeriod: 600, allowDraw: false, overtimeSeconds: 300, stopOnScore: false },
  });
});

test('generic presets cover each mode once', () => {
  assert.deepEqual(
    genericRulePresets().map((rules) => rules.mode),
    ['points', 'sets', 'timed']
  );
});
