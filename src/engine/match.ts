import { randomUUID } from 'node:crypto';

import { validateRules } from './rules.js';
import type {
  EngineContext,
  Match,
  MatchEvent,
  MatchEventKind,
  MatchOutcome,
  MatchRules,
  MatchSnapshot,
  OperationResult,
  RejectionReason,
  RulesInput,
  ScoringState,
  SetsRule,
  SetsState,
  Side,
  Sport,
  TeamRecord,
  TimedState,
  TimeRule,
} from './types.js';

export const UNDO_LIMIT = 100;
const MIN_OVERTIME_SECONDS = 30;
const FALLBACK_OVERTIME_SECONDS = 60;

export const systemContext: EngineContext = {
  now: () => new Date(),
  newId: () => randomUUID(),
};

const initialScoring = (rules: MatchRules): ScoringState => {
  switch (rules.mode) {
    case 'points':
      return { mode: 'points', scoreA: 0, scoreB: 0 };
    case 'sets':
      return { mode: 'sets', index: 0, scoresA: [0], scoresB: [0], setsWonA: 0, setsWonB: 0 };
    case 'timed':
      return {
        mode: 'timed',
        currentPeriod: 0,
        remainingSeconds: Array.from({ length: Math.max(1, rules.time.periods) }, () =>
          Math.max(0, rules.time.secondsPerPeriod)
        ),
        scoreA: 0,
        scoreB: 0,
      };
  }
};

export interface CreateMatchInput {
  sport: Sport;
  teamA: TeamRecord;
  teamB: TeamRecord;
  rules: RulesInput | MatchRules;
  id?: string;
}

export const createMatch = (input: CreateMatchInput, context: EngineContext = systemContext): Match => {
  const rules = validateRules(input.rules);
  const timestamp = context.now().toISOString();
  return {
    id: input.id ?? context.newId(),
    createdAt: timestamp,
    updatedAt: timestamp,
    sport: input.sport,
    rules,
    teamA: input.teamA,
    teamB: input.teamB,
    scoring: initialScoring(rules),
    winner: null,
    events: [],
    undoStack: [],
    redoStack: [],
  };
};

/* -------------------------------------------------------------------------- */
/* Derivations                                                                */
/* -------------------------------------------------------------------------- */

const regularPeriods = (match: Match) => (match.rules.mode === 'timed' ? match.rules.time.periods : 0);

/**
 * True once a timed match has run out its last slot: the clock of the final
 * period (regular or overtime) reads zero and no further slot was opened.
 */
export const isTimedRegulationExhausted = (match: Match): boolean => {
  const state = match.scoring;
  if (state.mode !== 'timed') return false;
  const lastSlot = state.remainingSeconds.length - 1;
  return (
    state.currentPeriod >= regularPeriods(match) - 1 &&
    state.currentPeriod >= lastSlot &&
    (state.remainingSeconds[state.currentPeriod] ?? 0) === 0
  );
};

export const isFinished = (match: Match): boolean => {
  if (match.winner !== null) return true;
  if (match.rules.mode !== 'timed' || match.scoring.mode !== 'timed') return false;
  if (!isTimedRegulationExhausted(match)) return false;
  return match.scoring.scoreA !== match.scoring.scoreB || match.rules.time.allowDraw;
};

export const matchOutcome = (match: Match): MatchOutcome => {
  if (match.winner !== null) return { status: 'won', winner: match.winner };
  return isFinished(match) ? { status: 'drawn' } : { status: 'in_progress' };
};

export const currentScoreTuple = (match: Match): { a: number; b: number } => {
  const state = match.scoring;
  switch (state.mode) {
    case 'points':
    case 'timed':
      return { a: state.scoreA, b: state.scoreB };
    case 'sets':
      return { a: state.scoresA[state.index] ?? 0, b: state.scoresB[state.index] ?? 0 };
  }
};

const pad2 = (value: number) => String(value).padStart(2, '0');

export const progressDescription = (match: Match): string => {
  const state = match.scoring;
  switch (state.mode) {
    case 'points':
      return `${state.scoreA} : ${state.scoreB}`;
    case 'sets': {
      if (match.rules.mode !== 'sets') return 'Sets';
      const { a, b } = currentScoreTuple(match);
      const bestOf = match.rules.sets.setsToWin * 2 - 1;
      return `Set ${state.index + 1} — ${a} : ${b}  (W ${state.setsWonA}–${state.setsWonB}, Bo${bestOf})`;
    }
    case 'timed': {
      if (match.rules.mode !== 'timed') return 'Timed';
      const remaining = Math.max(0, state.remainingSeconds[state.currentPeriod] ?? 0);
      const clock = `${pad2(Math.floor(remaining / 60))}:${pad2(remaining % 60)}`;
      return `P${state.currentPeriod + 1}/${match.rules.time.periods}  ${clock} — ${state.scoreA} : ${state.scoreB}`;
    }
  }
};

/* -------------------------------------------------------------------------- */
/* Event log + snapshots                                                      */
/* -------------------------------------------------------------------------- */

interface EventDraft {
  kind: MatchEventKind;
  side?: Side | null;
  value?: number | null;
  text?: string | null;
}

class EventWriter {
  readonly events: MatchEvent[];

  constructor(
    base: MatchEvent[],
    private readonly context: EngineContext,
    private readonly timestamp: string
  ) {
    this.events = [...base];
  }

  append(draft: EventDraft) {
    this.events.push({
      id: this.context.newId(),
      timestamp: this.timestamp,
      kind: draft.kind,
      side: draft.side ?? null,
      value: draft.value ?? null,
      text: draft.text ?? null,
    });
  }
}

const sharedPrefixLength = (left: MatchEvent[], right: MatchEvent[]) => {
  const limit = Math.min(left.length, right.length);
  let idx = 0;
  while (idx < limit && left[idx].id === right[idx].id) idx += 1;
  return idx;
};

/** Captures `match` relative to the log it will be restored onto. */
const snapshotOf = (match: Match, liveEvents: MatchEvent[]): MatchSnapshot => ({
  scoring: match.scoring,
  winner: match.winner,
  eventsCount: match.events.length,
  updatedAt: match.updatedAt,
  trailingEvents: match.events.slice(sharedPrefixLength(match.events, liveEvents)),
});

const restoreEvents = (live: MatchEvent[], snapshot: MatchSnapshot) => [
  ...live.slice(0, snapshot.eventsCount - snapshot.trailingEvents.length),
  ...snapshot.trailingEvents,
];

const pushBounded = (stack: MatchSnapshot[], snapshot: MatchSnapshot) => {
  const next = [...stack, snapshot];
  return next.length > UNDO_LIMIT ? next.slice(next.length - UNDO_LIMIT) : next;
};

const reject = (match: Match, reason: RejectionReason): OperationResult => ({
  applied: false,
  match,
  reason,
});

interface Transition {
  scoring: ScoringState;
  winner: Side | null;
  events: MatchEvent[];
}

// Records undo history and clears redo for every successful mutation.
const commit = (previous: Match, next: Transition, timestamp: string): OperationResult => ({
  applied: true,
  match: {
    ...previous,
    scoring: next.scoring,
    winner: next.winner,
    events: next.events,
    updatedAt: timestamp,
    undoStack: pushBounded(previous.undoStack, snapshotOf(previous, next.events)),
    redoStack: [],
  },
});

const mutate = (
  match: Match,
  context: EngineContext,
  apply: (writer: EventWriter) => { scoring: ScoringState; winner: Side | null }
): OperationResult => {
  const timestamp = context.now().toISOString();
  const writer = new EventWriter(match.events, context, timestamp);
  const { scoring, winner } = apply(writer);
  return commit(match, { scoring, winner, events: writer.events }, timestamp);
};

/* -------------------------------------------------------------------------- */
/* Mode-specific rules                                                        */
/* -------------------------------------------------------------------------- */

const floorAdd = (value: number, delta: number) => Math.max(0, value + delta);
const scoreKind = (delta: number): MatchEventKind => (delta > 0 ? 'score' : 'unscore');

const pointsWinner = (a: number, b: number, target: number, winByTwo: boolean): Side | null => {
  if (a < target && b < target) return null;
  if (a === b) return null;
  if (winByTwo && Math.abs(a - b) < 2) return null;
  return a > b ? 'A' : 'B';
};

const setWinner = (a: number, b: number, cfg: SetsRule): Side | null =>
  pointsWinner(a, b, cfg.pointsPerSet, cfg.winByTwo);

const replaceAt = (values: number[], index: number, value: number) => {
  const next = [...values];
  while (next.length <= index) next.push(0);
  next[index] = value;
  return next;
};

const adjustAt = (values: number[], index: number, delta: number) =>
  replaceAt(values, index, floorAdd(values[index] ?? 0, delta));

const settleSet = (
  state: SetsState,
  cfg: SetsRule,
  writer: EventWriter
): { scoring: SetsState; winner: Side | null } => {
  const a = state.scoresA[state.index] ?? 0;
  const b = state.scoresB[state.index] ?? 0;
  const setSide = setWinner(a, b, cfg);
  if (!setSide) return { scoring: state, winner: null };

  const setsWonA = state.setsWonA + (setSide === 'A' ? 1 : 0);
  const setsWonB = state.setsWonB + (setSide === 'B' ? 1 : 0);
  writer.append({ kind: 'setWin', side: setSide });

  const matchSide: Side | null =
    setsWonA >= cfg.setsToWin ? 'A' : setsWonB >= cfg.setsToWin ? 'B' : null;
  if (matchSide) {
    writer.append({ kind: 'matchEnd', side: matchSide });
    return { scoring: { ...state, setsWonA, setsWonB }, winner: matchSide };
  }

  return {
    scoring: {
      mode: 'sets',
      index: state.index + 1,
      scoresA: [...state.scoresA, 0],
      scoresB: [...state.scoresB, 0],
      setsWonA,
      setsWonB,
    },
    winner: null,
  };
};

/**
 * Closes the current period. Moves to the next regular period, ends the
 * match, leaves it drawn, or opens an overtime slot on a tie without draws.
 */
const closePeriod = (
  state: TimedState,
  cfg: TimeRule,
  writer: EventWriter
): { scoring: TimedState; winner: Side | null } => {
  const closing = state.currentPeriod;
  const remainingSeconds = replaceAt(state.remainingSeconds, closing, 0);
  writer.append({ kind: 'periodEnd', value: closing });

  if (closing + 1 < cfg.periods) {
    writer.append({ kind: 'periodStart', value: closing + 1 });
    return { scoring: { ...state, remainingSeconds, currentPeriod: closing + 1 }, winner: null };
  }

  if (state.scoreA !== state.scoreB) {
    const winner: Side = state.scoreA > state.scoreB ? 'A' : 'B';
    writer.append({ kind: 'matchEnd', side: winner });
    return { scoring: { ...state, remainingSeconds }, winner };
  }

  if (cfg.allowDraw) {
    return { scoring: { ...state, remainingSeconds }, winner: null };
  }

  const overtime = Math.max(MIN_OVERTIME_SECONDS, cfg.overtimeSeconds ?? FALLBACK_OVERTIME_SECONDS);
  writer.append({ kind: 'periodStart', value: closing + 1 });
  return {
    scoring: {
      ...state,
      remainingSeconds: [...remainingSeconds, overtime],
      currentPeriod: closing + 1,
    },
    winner: null,
  };
};

/* -------------------------------------------------------------------------- */
/* Operations                                                                 */
/* -------------------------------------------------------------------------- */

export const score = (
  match: Match,
  side: Side,
  delta = 1,
  context: EngineContext = systemContext
): OperationResult => {
  if (delta === 0 || !Number.isFinite(delta)) return reject(match, 'zero_delta');
  if (isFinished(match)) return reject(match, 'match_finished');

  const state = match.scoring;
  const rules = match.rules;

  if (state.mode === 'points' && rules.mode === 'points') {
    return mutate(match, context, (writer) => {
      const scoreA = side === 'A' ? floorAdd(state.scoreA, delta) : state.scoreA;
      const scoreB = side === 'B' ? floorAdd(state.scoreB, delta) : state.scoreB;
      writer.append({ kind: scoreKind(delta), side, value: delta });
      const winner = pointsWinner(scoreA, scoreB, rules.points.target, rules.points.winByTwo);
      if (winner) writer.append({ kind: 'matchEnd', side: winner });
      return { scoring: { mode: 'points', scoreA, scoreB }, winner };
    });
  }

  if (state.mode === 'sets' && rules.mode === 'sets') {
    return mutate(match, context, (writer) => {
      const scoresA = side === 'A' ? adjustAt(state.scoresA, state.index, delta) : state.scoresA;
      const scoresB = side === 'B' ? adjustAt(state.scoresB, state.index, delta) : state.scoresB;
      writer.append({ kind: scoreKind(delta), side, value: delta });
      return settleSet({ ...state, scoresA, scoresB }, rules.sets, writer);
    });
  }

  if (state.mode === 'timed') {
    return mutate(match, context, (writer) => {
      writer.append({ kind: scoreKind(delta), side, value: delta });
      return {
        scoring: {
          ...state,
          scoreA: side === 'A' ? floorAdd(state.scoreA, delta) : state.scoreA,
          scoreB: side === 'B' ? floorAdd(state.scoreB, delta) : state.scoreB,
        },
        winner: null,
      };
    });
  }

  return reject(match, 'wrong_mode');
};

export const setScore = (
  match: Match,
  scoreA: number,
  scoreB: number,
  context: EngineContext = systemContext
): OperationResult => {
  if (!Number.isFinite(scoreA) || !Number.isFinite(scoreB)) return reject(match, 'invalid_score');
  if (isFinished(match)) return reject(match, 'match_finished');

  const a = Math.max(0, Math.trunc(scoreA));
  const b = Math.max(0, Math.trunc(scoreB));
  const state = match.scoring;
  const rules = match.rules;

  return mutate(match, context, (writer) => {
    switch (state.mode) {
      case 'points': {
        writer.append({ kind: 'note', text: `Score set to ${a}:${b}` });
        const winner =
          rules.mode === 'points'
            ? pointsWinner(a, b, rules.points.target, rules.points.winByTwo)
            : null;
        if (winner) writer.append({ kind: 'matchEnd', side: winner });
        return { scoring: { mode: 'points', scoreA: a, scoreB: b }, winner };
      }
      case 'sets':
        writer.append({ kind: 'note', text: `Set score set to ${a}:${b}` });
        return {
          scoring: {
            ...state,
            scoresA: replaceAt(state.scoresA, state.index, a),
            scoresB: replaceAt(state.scoresB, state.index, b),
          },
          winner: null,
        };
      case 'timed':
        writer.append({ kind: 'note', text: `Timed score set to ${a}:${b}` });
        return { scoring: { ...state, scoreA: a, scoreB: b }, winner: null };
    }
  });
};

export const tick = (
  match: Match,
  seconds = 1,
  context: EngineContext = systemContext
): OperationResult => {
  if (!(seconds > 0) || !Number.isFinite(seconds)) return reject(match, 'non_positive_seconds');
  const state = match.scoring;
  const rules = match.rules;
  if (state.mode !== 'timed' || rules.mode !== 'timed') return reject(match, 'wrong_mode');
  if (isFinished(match)) return reject(match, 'match_finished');
  if (state.currentPeriod < 0 || state.currentPeriod >= state.remainingSeconds.length) {
    return reject(match, 'period_out_of_range');
  }

  return mutate(match, context, (writer) => {
    const remaining = Math.max(0, (state.remainingSeconds[state.currentPeriod] ?? 0) - seconds);
    const ticked: TimedState = {
      ...state,
      remainingSeconds: replaceAt(state.remainingSeconds, state.currentPeriod, remaining),
    };
    if (remaining > 0) return { scoring: ticked, winner: null };
    return closePeriod(ticked, rules.time, writer);
  });
};

export const endPeriod = (match: Match, context: EngineContext = systemContext): OperationResult => {
  const state = match.scoring;
  const rules = match.rules;
  if (state.mode !== 'timed' || rules.mode !== 'timed') return reject(match, 'wrong_mode');
  if (isFinished(match)) return reject(match, 'match_finished');
  if (state.currentPeriod < 0 || state.currentPeriod >= state.remainingSeconds.length) {
    return reject(match, 'period_out_of_range');
  }

  return mutate(match, context, (writer) => closePeriod(state, rules.time, writer));
};

// Notes are accepted on finished matches too.
export const addNote = (match: Match, text: string, context: EngineContext = systemContext): OperationResult =>
  mutate(match, context, (writer) => {
    writer.append({ kind: 'note', text });
    return { scoring: match.scoring, winner: match.winner };
  });

export const resetCurrentSet = (match: Match, context: EngineContext = systemContext): OperationResult => {
  const state = match.scoring;
  if (state.mode !== 'sets') return reject(match, 'wrong_mode');
  if (isFinished(match)) return reject(match, 'match_finished');

  return mutate(match, context, (writer) => {
    writer.append({ kind: 'note', text: 'Current set reset' });
    return {
      scoring: {
        ...state,
        scoresA: replaceAt(state.scoresA, state.index, 0),
        scoresB: replaceAt(state.scoresB, state.index, 0),
      },
      winner: null,
    };
  });
};

export const resetAll = (match: Match, context: EngineContext = systemContext): OperationResult => {
  const timestamp = context.now().toISOString();
  return commit(match, { scoring: initialScoring(match.rules), winner: null, events: [] }, timestamp);
};

export const rematch = (
  match: Match,
  swapped = false,
  context: EngineContext = systemContext
): Match =>
  createMatch(
    {
      sport: match.sport,
      teamA: swapped ? match.teamB : match.teamA,
      teamB: swapped ? match.teamA : match.teamB,
      rules: match.rules,
    },
    context
  );

export const undo = (match: Match): OperationResult => {
  const snapshot = match.undoStack[match.undoStack.length - 1];
  if (!snapshot) return reject(match, 'nothing_to_undo');

  const events = restoreEvents(match.events, snapshot);
  return {
    applied: true,
    match: {
      ...match,
      scoring: snapshot.scoring,
      winner: snapshot.winner,
      updatedAt: snapshot.updatedAt,
      events,
      undoStack: match.undoStack.slice(0, -1),
      redoStack: pushBounded(match.redoStack, snapshotOf(match, events)),
    },
  };
};

export const redo = (match: Match): OperationResult => {
  const snapshot = match.redoStack[match.redoStack.length - 1];
  if (!snapshot) return reject(match, 'nothing_to_redo');

  const events = restoreEvents(match.events, snapshot);
  return {
    applied: true,
    match: {
      ...match,
      scoring: snapshot.scoring,
      winner: snapshot.winner,
      updatedAt: snapshot.updatedAt,
      events,
      undoStack: pushBounded(match.undoStack, snapshotOf(match, events)),
      redoStack: match.redoStack.slice(0, -1),
    },
  };
};

export const canUndo = (match: Match) => match.undoStack.length > 0;
export const canRedo = (match: Match) => match.redoStack.length > 0;
