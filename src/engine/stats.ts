import { isFinished } from './match.js';
import { compareNames } from './participants.js';
import { compareSportLabels } from './sports.js';
import type { Match, RulesMode, Side, Sport, TeamRecord } from './types.js';

export interface TeamStatsRecord {
  teamId: string;
  teamName: string;
  sport: Sport;
  games: number;
  wins: number;
  losses: number;
  draws: number;
  /** Points, sets won or goals depending on the match mode. */
  pointsFor: number;
  pointsAgainst: number;
  /** Positive for a run of wins, negative for a run of losses. */
  currentStreak: number;
  longestWinStreak: number;
  winRate: number;
  avgFor: number;
  avgAgainst: number;
  avgMargin: number;
}

export interface SportOverview {
  sport: Sport;
  matches: number;
  finished: number;
  draws: number;
  avgTotalPoints: number;
  modeShare: Partial<Record<RulesMode, number>>;
}

export interface StatsSummary {
  generatedAt: string | null;
  teamRecords: TeamStatsRecord[];
  sportOverviews: SportOverview[];
}

export interface BuildStatsOptions {
  includeInProgress?: boolean;
  generatedAt?: string | null;
}

export interface NormalizedScore {
  a: number;
  b: number;
  finished: boolean;
  draw: boolean;
}

/**
 * Reduces a match to the score pair the aggregator works with. Sets mode
 * counts sets won. Returns null when the match is skipped.
 */
export const normalizeMatchScore = (match: Match, includeInProgress: boolean): NormalizedScore | null => {
  const state = match.scoring;
  const finished = isFinished(match);
  if (!finished && !includeInProgress) return null;

  switch (state.mode) {
    case 'points':
      return { a: state.scoreA, b: state.scoreB, finished, draw: false };
    case 'sets':
      return { a: state.setsWonA, b: state.setsWonB, finished, draw: false };
    case 'timed': {
      const allowDraw = match.rules.mode === 'timed' && match.rules.time.allowDraw;
      return {
        a: state.scoreA,
        b: state.scoreB,
        finished,
        draw: finished && state.scoreA === state.scoreB && allowDraw,
      };
    }
  }
};

interface TeamAccumulator {
  teamId: string;
  teamName: string;
  sport: Sport;
  games: number;
  wins: number;
  losses: number;
  draws: number;
  pointsFor: number;
  pointsAgainst: number;
  currentStreak: number;
  longestWinStreak: number;
}

interface SportAccumulator {
  sport: Sport;
  matches: number;
  finished: number;
  draws: number;
  sumTotalPoints: number;
  modeCount: Map<RulesMode, number>;
}

const teamKey = (teamId: string, sport: Sport) => `${teamId}|${sport}`;

const feedTeam = (
  teams: Map<string, TeamAccumulator>,
  team: TeamRecord,
  match: Match,
  scores: NormalizedScore,
  side: Side
) => {
  const key = teamKey(team.id, match.sport);
  let record = teams.get(key);
  if (!record) {
    record = {
      teamId: team.id,
      teamName: team.name,
      sport: match.sport,
      games: 0,
      wins: 0,
      losses: 0,
      draws: 0,
      pointsFor: 0,
      pointsAgainst: 0,
      currentStreak: 0,
      longestWinStreak: 0,
    };
    teams.set(key, record);
  }

  const forMe = side === 'A' ? scores.a : scores.b;
  const forOpponent = side === 'A' ? scores.b : scores.a;
  record.pointsFor += Math.max(0, forMe);
  record.pointsAgainst += Math.max(0, forOpponent);

  // running totals count in-progress matches; results do not
  if (!scores.finished) return;

  record.games += 1;
  if (scores.draw) {
    record.draws += 1;
    record.currentStreak = 0;
    return;
  }

  const won = match.winner === side || (match.winner === null && forMe > forOpponent);
  if (won) {
    record.wins += 1;
    record.currentStreak = record.currentStreak >= 0 ? record.currentStreak + 1 : 1;
    record.longestWinStreak = Math.max(record.longestWinStreak, record.currentStreak);
  } else {
    record.losses += 1;
    record.currentStreak = record.currentStreak <= 0 ? record.currentStreak - 1 : -1;
  }
};

const feedSport = (sports: Map<Sport, SportAccumulator>, match: Match, scores: NormalizedScore) => {
  let acc = sports.get(match.sport);
  if (!acc) {
    acc = { sport: match.sport, matches: 0, finished: 0, draws: 0, sumTotalPoints: 0, modeCount: new Map() };
    sports.set(match.sport, acc);
  }
  acc.matches += 1;
  if (scores.finished) acc.finished += 1;
  if (scores.draw) acc.draws += 1;
  acc.sumTotalPoints += Math.max(0, scores.a + scores.b);
  acc.modeCount.set(match.rules.mode, (acc.modeCount.get(match.rules.mode) ?? 0) + 1);
};

const finishTeam = (acc: TeamAccumulator): TeamStatsRecord => {
  const avgFor = acc.games > 0 ? acc.pointsFor / acc.games : 0;
  const avgAgainst = acc.games > 0 ? acc.pointsAgainst / acc.games : 0;
  return {
    ...acc,
    winRate: acc.games > 0 ? acc.wins / acc.games : 0,
    avgFor,
    avgAgainst,
    avgMargin: avgFor - avgAgainst,
  };
};

const finishSport = (acc: SportAccumulator): SportOverview => {
  const total = Math.max(1, acc.matches);
  const modeShare: Partial<Record<RulesMode, number>> = {};
  for (const [mode, count] of acc.modeCount) {
    modeShare[mode] = count / total;
  }
  return {
    sport: acc.sport,
    matches: acc.matches,
    finished: acc.finished,
    draws: acc.draws,
    avgTotalPoints: acc.matches > 0 ? acc.sumTotalPoints / acc.matches : 0,
    modeShare,
  };
};

const latestUpdate = (matches: Match[]) =>
  matches.reduce<string | null>(
    (latest, match) => (latest === null || match.updatedAt > latest ? match.updatedAt : latest),
    null
  );

const byCreatedAt = (a: Match, b: Match) => (a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0);

/**
 * Folds the full match history into team and sport summaries. Stateless:
 * the same input always produces the same summary.
 */
export const buildStatsSummary = (matches: Match[], options: BuildStatsOptions = {}): StatsSummary => {
  const includeInProgress = options.includeInProgress ?? true;
  const teams = new Map<string, TeamAccumulator>();
  const sports = new Map<Sport, SportAccumulator>();

  // streaks depend on chronological order
  const ordered = [...matches].sort(byCreatedAt);

  for (const match of ordered) {
    const scores = normalizeMatchScore(match, includeInProgress);
    if (!scores) continue;
    feedSport(sports, match, scores);
    feedTeam(teams, match.teamA, match, scores, 'A');
    feedTeam(teams, match.teamB, match, scores, 'B');
  }

  const teamRecords = [...teams.values()].map(finishTeam).sort((a, b) => {
    const byName = compareNames(a.teamName, b.teamName);
    return byName !== 0 ? byName : compareSportLabels(a.sport, b.sport);
  });

  const sportOverviews = [...sports.values()]
    .map(finishSport)
    .sort((a, b) => compareSportLabels(a.sport, b.sport));

  return {
    generatedAt: options.generatedAt === undefined ? latestUpdate(matches) : options.generatedAt,
    teamRecords,
    sportOverviews,
  };
};

/* -------------------------------------------------------------------------- */
/* Leaderboards                                                               */
/* -------------------------------------------------------------------------- */

const rankBy =
  (metric: (record: TeamStatsRecord) => number) => (lhs: TeamStatsRecord, rhs: TeamStatsRecord) => {
    const diff = metric(rhs) - metric(lhs);
    if (diff !== 0) return diff;
    if (lhs.games !== rhs.games) return rhs.games - lhs.games;
    return compareNames(lhs.teamName, rhs.teamName);
  };

export interface LeaderboardOptions {
  limit?: number;
  sport?: Sport;
}

const forSport = (records: TeamStatsRecord[], sport?: Sport) =>
  sport ? records.filter((record) => record.sport === sport) : records;

export const topTeamsByWinRate = (
  summary: StatsSummary,
  options: LeaderboardOptions & { minGames?: number } = {}
): TeamStatsRecord[] => {
  const minGames = options.minGames ?? 1;
  return forSport(summary.teamRecords, options.sport)
    .filter((record) => record.games >= minGames)
    .sort(rankBy((record) => record.winRate))
    .slice(0, Math.max(0, options.limit ?? 10));
};

export const topWinStreaks = (summary: StatsSummary, options: LeaderboardOptions = {}): TeamStatsRecord[] =>
  forSport(summary.teamRecords, options.sport)
    .filter((record) => record.currentStreak > 0)
    .sort(rankBy((record) => record.currentStreak))
    .slice(0, Math.max(0, options.limit ?? 10));

export const sportDigest = (summary: StatsSummary) =>
  [...summary.sportOverviews]
    .sort((a, b) => compareSportLabels(a.sport, b.sport))
    .map((overview) => ({
      sport: overview.sport,
      matches: overview.matches,
      avgTotal: overview.avgTotalPoints,
      modeShare: overview.modeShare,
    }));

export const indexTeamRecords = (summary: StatsSummary) => {
  const index = new Map<string, Map<Sport, TeamStatsRecord>>();
  for (const record of summary.teamRecords) {
    const bySport = index.get(record.teamId) ?? new Map<Sport, TeamStatsRecord>();
    bySport.set(record.sport, record);
    index.set(record.teamId, bySport);
  }
  return index;
};

export const indexSportOverviews = (summary: StatsSummary) =>
  new Map(summary.sportOverviews.map((overview) => [overview.sport, overview] as const));
