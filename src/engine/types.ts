export type Sport =
  | 'FOOTBALL'
  | 'BASKETBALL'
  | 'VOLLEYBALL'
  | 'TENNIS'
  | 'TABLE_TENNIS'
  | 'HOCKEY'
  | 'BADMINTON'
  | 'ESPORTS_CS'
  | 'ESPORTS_DOTA'
  | 'ESPORTS_LOL';

export type Side = 'A' | 'B';
export type RulesMode = 'points' | 'sets' | 'timed';

export interface PointsRule { target: number; winByTwo: boolean; }

export interface SetsRule { setsToWin: number; pointsPerSet: number; winByTwo: boolean; }

export interface TimeRule {
  periods: number;
  secondsPerPeriod: number;
  allowDraw: boolean;
  overtimeSeconds: number | null;
  stopOnScore: boolean;
}

export interface PointsRules { mode: 'points'; sport: Sport; points: PointsRule; }
export interface SetsRules { mode: 'sets'; sport: Sport; sets: SetsRule; }
export interface TimedRules { mode: 'timed'; sport: Sport; time: TimeRule; }

export type MatchRules = PointsRules | SetsRules | TimedRules;

/**
 * Loose rules shape accepted by validation. Any sub-config may be missing or
 * belong to another mode; `validateRules` settles it.
 */
export interface RulesInput {
  mode: RulesMode;
  sport: Sport;
  points?: Partial<PointsRule> | null;
  sets?: Partial<SetsRule> | null;
  time?: Partial<TimeRule> | null;
}

export interface PointsState { mode: 'points'; scoreA: number; scoreB: number; }

export interface SetsState {
  mode: 'sets';
  index: number;
  scoresA: number[];
  scoresB: number[];
  setsWonA: number;
  setsWonB: number;
}

export interface TimedState {
  mode: 'timed';
  currentPeriod: number;
  remainingSeconds: number[];
  scoreA: number;
  scoreB: number;
}

export type ScoringState = PointsState | SetsState | TimedState;

export type MatchEventKind =
  | 'score'
  | 'unscore'
  | 'setWin'
  | 'periodStart'
  | 'periodEnd'
  | 'matchEnd'
  | 'note';

export interface MatchEvent {
  id: string;
  timestamp: string;
  kind: MatchEventKind;
  side: Side | null;
  value: number | null;
  text: string | null;
}

export interface MatchSnapshot {
  scoring: ScoringState;
  winner: Side | null;
  eventsCount: number;
  updatedAt: string;
  // Events the restored log needs beyond the prefix it shares with the live log.
  trailingEvents: MatchEvent[];
}

export interface PlayerRecord {
  id: string;
  name: string;
  nickname: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface TeamRecord {
  id: string;
  name: string;
  sport: Sport;
  colorIndex: number;
  badgeName: string;
  players: PlayerRecord[];
  createdAt: string;
  updatedAt: string;
}

export interface Match {
  id: string;
  createdAt: string;
  updatedAt: string;
  sport: Sport;
  rules: MatchRules;
  teamA: TeamRecord;
  teamB: TeamRecord;
  scoring: ScoringState;
  winner: Side | null;
  events: MatchEvent[];
  undoStack: MatchSnapshot[];
  redoStack: MatchSnapshot[];
}

export interface EngineContext {
  now: () => Date;
  newId: () => string;
}

export type RejectionReason =
  | 'match_finished'
  | 'zero_delta'
  | 'invalid_score'
  | 'non_positive_seconds'
  | 'wrong_mode'
  | 'period_out_of_range'
  | 'nothing_to_undo'
  | 'nothing_to_redo';

export interface OperationApplied {
  applied: true;
  match: Match;
}

export interface OperationRejected {
  applied: false;
  match: Match;
  reason: RejectionReason;
}

export type OperationResult = OperationApplied | OperationRejected;

export type MatchOutcome =
  | { status: 'in_progress' }
  | { status: 'won'; winner: Side }
  | { status: 'drawn' };
