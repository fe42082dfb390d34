import type {
  MatchRules,
  PointsRule,
  RulesInput,
  RulesMode,
  SetsRule,
  Sport,
  TimeRule,
} from './types.js';

export const HARD_MAX_POINTS = 999;
export const HARD_MAX_SETS = 9;
export const HARD_MAX_PERIODS = 12;
export const HARD_MAX_PERIOD_SECONDS = 4 * 60 * 60;
export const MIN_PERIOD_SECONDS = 30;
const DEFAULT_OVERTIME_SECONDS = 5 * 60;

const FALLBACK_POINTS: PointsRule = { target: 21, winByTwo: false };
const FALLBACK_SETS: SetsRule = { setsToWin: 2, pointsPerSet: 25, winByTwo: true };
const FALLBACK_TIME: TimeRule = {
  periods: 2,
  secondsPerPeriod: 45 * 60,
  allowDraw: true,
  overtimeSeconds: null,
  stopOnScore: false,
};

const clamp = (value: number, lo: number, hi: number) => Math.min(Math.max(value, lo), hi);

// Non-finite input collapses to the lower bound.
const clampInt = (value: number | undefined, fallback: number, lo: number, hi: number) => {
  const raw = value ?? fallback;
  if (!Number.isFinite(raw)) return lo;
  return clamp(Math.round(raw), lo, hi);
};

const normalizePoints = (input: Partial<PointsRule> | null | undefined): PointsRule => {
  const base = input ?? FALLBACK_POINTS;
  return {
    target: clampInt(base.target, FALLBACK_POINTS.target, 1, HARD_MAX_POINTS),
    winByTwo: base.winByTwo ?? FALLBACK_POINTS.winByTwo,
  };
};

const normalizeSets = (input: Partial<SetsRule> | null | undefined): SetsRule => {
  const base = input ?? FALLBACK_SETS;
  return {
    setsToWin: clampInt(base.setsToWin, FALLBACK_SETS.setsToWin, 1, HARD_MAX_SETS),
    pointsPerSet: clampInt(base.pointsPerSet, FALLBACK_SETS.pointsPerSet, 1, HARD_MAX_POINTS),
    winByTwo: base.winByTwo ?? FALLBACK_SETS.winByTwo,
  };
};

const normalizeTime = (input: Partial<TimeRule> | null | undefined): TimeRule => {
  const base = input ?? FALLBACK_TIME;
  const allowDraw = base.allowDraw ?? FALLBACK_TIME.allowDraw;
  const overtime = base.overtimeSeconds;
  return {
    periods: clampInt(base.periods, FALLBACK_TIME.periods, 1, HARD_MAX_PERIODS),
    secondsPerPeriod: clampInt(
      base.secondsPerPeriod,
      FALLBACK_TIME.secondsPerPeriod,
      MIN_PERIOD_SECONDS,
      HARD_MAX_PERIOD_SECONDS
    ),
    allowDraw,
    overtimeSeconds: allowDraw
      ? null
      : overtime === null || overtime === undefined
        ? DEFAULT_OVERTIME_SECONDS
        : clampInt(overtime, DEFAULT_OVERTIME_SECONDS, MIN_PERIOD_SECONDS, HARD_MAX_PERIOD_SECONDS),
    stopOnScore: base.stopOnScore ?? FALLBACK_TIME.stopOnScore,
  };
};

/**
 * Normalizes a rules value so that exactly the sub-config matching `mode` is
 * present, with clamped values. Never rejects; idempotent.
 */
export const validateRules = (input: RulesInput | MatchRules): MatchRules => {
  const loose: RulesInput = input;
  switch (loose.mode) {
    case 'points':
      return { mode: 'points', sport: loose.sport, points: normalizePoints(loose.points) };
    case 'sets':
      return { mode: 'sets', sport: loose.sport, sets: normalizeSets(loose.sets) };
    case 'timed':
      return { mode: 'timed', sport: loose.sport, time: normalizeTime(loose.time) };
  }
};

const pointsRules = (sport: Sport, target: number, winByTwo: boolean) =>
  validateRules({ mode: 'points', sport, points: { target, winByTwo } });

const setsRules = (sport: Sport, setsToWin: number, pointsPerSet: number, winByTwo: boolean) =>
  validateRules({ mode: 'sets', sport, sets: { setsToWin, pointsPerSet, winByTwo } });

const timedRules = (sport: Sport, time: Partial<TimeRule>) =>
  validateRules({ mode: 'timed', sport, time });

export const defaultRulesFor = (sport: Sport): MatchRules => {
  switch (sport) {
    case 'VOLLEYBALL':
      return setsRules(sport, 3, 25, true);
    case 'TABLE_TENNIS':
      return setsRules(sport, 3, 11, true);
    case 'BADMINTON':
      return setsRules(sport, 2, 21, true);
    case 'TENNIS':
      // games to 6 stand in for a full tennis set
      return setsRules(sport, 2, 6, true);
    case 'FOOTBALL':
      return timedRules(sport, { periods: 2, secondsPerPeriod: 45 * 60, allowDraw: true });
    case 'BASKETBALL':
      return timedRules(sport, {
        periods: 4,
        secondsPerPeriod: 10 * 60,
        allowDraw: false,
        overtimeSeconds: 5 * 60,
      });
    case 'HOCKEY':
      return timedRules(sport, {
        periods: 3,
        secondsPerPeriod: 20 * 60,
        allowDraw: false,
        overtimeSeconds: 5 * 60,
      });
    case 'ESPORTS_CS':
      return pointsRules(sport, 13, false);
    case 'ESPORTS_DOTA':
    case 'ESPORTS_LOL':
      // best-of-three series, one "point" per map
      return setsRules(sport, 2, 1, false);
  }
};

export const genericRulePresets = (): MatchRules[] => [
  pointsRules('FOOTBALL', 11, true),
  setsRules('VOLLEYBALL', 2, 15, true),
  timedRules('BASKETBALL', {
    periods: 4,
    secondsPerPeriod: 8 * 60,
    allowDraw: false,
    overtimeSeconds: 3 * 60,
  }),
];

const toInput = (rules: MatchRules): RulesInput => {
  switch (rules.mode) {
    case 'points':
      return { mode: rules.mode, sport: rules.sport, points: rules.points };
    case 'sets':
      return { mode: rules.mode, sport: rules.sport, sets: rules.sets };
    case 'timed':
      return { mode: rules.mode, sport: rules.sport, time: rules.time };
  }
};

// Switching to a mode with no sub-config yet picks up the mode's fallback.
export const withMode = (rules: MatchRules, mode: RulesMode): MatchRules =>
  validateRules({ ...toInput(rules), mode });

export const withPoints = (rules: MatchRules, target: number, winByTwo: boolean): MatchRules =>
  validateRules({ mode: 'points', sport: rules.sport, points: { target, winByTwo } });

export const withSets = (
  rules: MatchRules,
  setsToWin: number,
  pointsPerSet: number,
  winByTwo: boolean
): MatchRules =>
  validateRules({ mode: 'sets', sport: rules.sport, sets: { setsToWin, pointsPerSet, winByTwo } });

export const withTime = (
  rules: MatchRules,
  time: Pick<TimeRule, 'periods' | 'secondsPerPeriod' | 'allowDraw'> &
    Partial<Pick<TimeRule, 'overtimeSeconds' | 'stopOnScore'>>
): MatchRules =>
  validateRules({
    mode: 'timed',
    sport: rules.sport,
    time: {
      periods: time.periods,
      secondsPerPeriod: time.secondsPerPeriod,
      allowDraw: time.allowDraw,
      overtimeSeconds: time.overtimeSeconds ?? null,
      stopOnScore: time.stopOnScore ?? false,
    },
  });

export const rulesAllowDraw = (rules: MatchRules) => rules.mode === 'timed' && rules.time.allowDraw;
export const usesTimer = (rules: MatchRules) => rules.mode === 'timed';
export const usesSets = (rules: MatchRules) => rules.mode === 'sets';

export const describeRules = (rules: MatchRules): string => {
  switch (rules.mode) {
    case 'points':
      return rules.points.winByTwo
        ? `To ${rules.points.target} (win by 2)`
        : `To ${rules.points.target}`;
    case 'sets': {
      const bestOf = rules.sets.setsToWin * 2 - 1;
      const winByTwo = rules.sets.winByTwo ? ', +2' : '';
      return `Bo${bestOf}, set ${rules.sets.pointsPerSet}${winByTwo}`;
    }
    case 'timed': {
      const minutes = Math.floor(rules.time.secondsPerPeriod / 60);
      const base = `${rules.time.periods}×${minutes}m`;
      return rules.time.allowDraw ? base : `${base} + OT`;
    }
  }
};
