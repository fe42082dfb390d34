import {
  canRedo,
  canUndo,
  currentScoreTuple,
  isFinished,
  matchOutcome,
  progressDescription,
} from '../../engine/match.js';
import { playerDisplayName, teamInitials, teamSlug } from '../../engine/participants.js';
import { describeRules } from '../../engine/rules.js';
import { getSportProfile } from '../../engine/sports.js';
import type { SportOverview, StatsSummary, TeamStatsRecord } from '../../engine/stats.js';
import type {
  Match,
  MatchEvent,
  MatchRules,
  PlayerRecord,
  ScoringState,
  Sport,
  TeamRecord,
} from '../../engine/types.js';
import type { MatchMutation } from '../../repositories/matches.js';

export const toSportResponse = (sport: Sport) => {
  const profile = getSportProfile(sport);
  return {
    sport,
    key: profile.key,
    label: profile.label,
    short_label: profile.shortLabel,
    supports_sets: profile.supportsSets,
    uses_timer_by_default: profile.usesTimerByDefault,
  };
};

export const toRulesResponse = (rules: MatchRules) => {
  const base = { mode: rules.mode, sport: rules.sport, description: describeRules(rules) };
  switch (rules.mode) {
    case 'points':
      return {
        ...base,
        points: { target: rules.points.target, win_by_two: rules.points.winByTwo },
      };
    case 'sets':
      return {
        ...base,
        sets: {
          sets_to_win: rules.sets.setsToWin,
          points_per_set: rules.sets.pointsPerSet,
          win_by_two: rules.sets.winByTwo,
        },
      };
    case 'timed':
      return {
        ...base,
        time: {
          periods: rules.time.periods,
          seconds_per_period: rules.time.secondsPerPeriod,
          allow_draw: rules.time.allowDraw,
          overtime_seconds: rules.time.overtimeSeconds,
          stop_on_score: rules.time.stopOnScore,
        },
      };
  }
};

export const toPlayerResponse = (player: PlayerRecord) => ({
  player_id: player.id,
  name: player.name,
  nickname: player.nickname,
  display_name: playerDisplayName(player),
  created_at: player.createdAt,
  updated_at: player.updatedAt,
});

export const toTeamResponse = (team: TeamRecord) => ({
  team_id: team.id,
  name: team.name,
  sport: team.sport,
  color_index: team.colorIndex,
  badge_name: team.badgeName,
  initials: teamInitials(team),
  slug: teamSlug(team),
  players: team.players.map(toPlayerResponse),
  created_at: team.createdAt,
  updated_at: team.updatedAt,
});

const toScoringResponse = (scoring: ScoringState) => {
  switch (scoring.mode) {
    case 'points':
      return { mode: scoring.mode, score_a: scoring.scoreA, score_b: scoring.scoreB };
    case 'sets':
      return {
        mode: scoring.mode,
        index: scoring.index,
        scores_a: scoring.scoresA,
        scores_b: scoring.scoresB,
        sets_won_a: scoring.setsWonA,
        sets_won_b: scoring.setsWonB,
      };
    case 'timed':
      return {
        mode: scoring.mode,
        current_period: scoring.currentPeriod,
        remaining_seconds: scoring.remainingSeconds,
        score_a: scoring.scoreA,
        score_b: scoring.scoreB,
      };
  }
};

const toEventResponse = (event: MatchEvent) => ({
  event_id: event.id,
  timestamp: event.timestamp,
  kind: event.kind,
  side: event.side,
  value: event.value,
  text: event.text,
});

export const toMatchResponse = (match: Match, options: { includeEvents?: boolean } = {}) => {
  const response: Record<string, unknown> = {
    match_id: match.id,
    sport: match.sport,
    rules: toRulesResponse(match.rules),
    team_a: toTeamResponse(match.teamA),
    team_b: toTeamResponse(match.teamB),
    scoring: toScoringResponse(match.scoring),
    score: currentScoreTuple(match),
    winner: match.winner,
    status: matchOutcome(match).status,
    finished: isFinished(match),
    progress: progressDescription(match),
    can_undo: canUndo(match),
    can_redo: canRedo(match),
    created_at: match.createdAt,
    updated_at: match.updatedAt,
  };

  if (options.includeEvents ?? true) {
    response.events = match.events.map(toEventResponse);
  }

  return response;
};

export const toMutationResponse = (mutation: MatchMutation) => ({
  applied: mutation.applied,
  reason: mutation.reason ?? null,
  match: toMatchResponse(mutation.match),
});

export const toTeamStatsResponse = (record: TeamStatsRecord) => ({
  team_id: record.teamId,
  team_name: record.teamName,
  sport: record.sport,
  games: record.games,
  wins: record.wins,
  losses: record.losses,
  draws: record.draws,
  points_for: record.pointsFor,
  points_against: record.pointsAgainst,
  current_streak: record.currentStreak,
  longest_win_streak: record.longestWinStreak,
  win_rate: record.winRate,
  avg_for: record.avgFor,
  avg_against: record.avgAgainst,
  avg_margin: record.avgMargin,
});

export const toSportOverviewResponse = (overview: SportOverview) => ({
  sport: overview.sport,
  matches: overview.matches,
  finished: overview.finished,
  draws: overview.draws,
  avg_total_points: overview.avgTotalPoints,
  mode_share: overview.modeShare,
});

export const toStatsSummaryResponse = (summary: StatsSummary) => ({
  generated_at: summary.generatedAt,
  team_records: summary.teamRecords.map(toTeamStatsResponse),
  sport_overviews: summary.sportOverviews.map(toSportOverviewResponse),
});
