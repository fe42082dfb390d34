import type { Express } from 'express';
import { z } from 'zod';

import type { TeamsRepository } from '../repositories/teams.js';
import type { StatsService } from '../services/stats.js';
import {
  toSportOverviewResponse,
  toStatsSummaryResponse,
  toTeamStatsResponse,
} from './helpers/responders.js';
import { BooleanParam, parseBooleanParam, SportEnum } from './helpers/schemas.js';

const SummaryQuerySchema = z.object({ include_in_progress: BooleanParam });

const WinRateQuerySchema = z.object({
  sport: SportEnum.optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
  min_games: z.coerce.number().int().min(0).optional(),
});

const StreakQuerySchema = z.object({
  sport: SportEnum.optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

const TeamStatsQuerySchema = z.object({ sport: SportEnum.optional() });

interface StatsRouteDeps {
  stats: StatsService;
  teams: TeamsRepository;
}

export const registerStatsRoutes = (app: Express, deps: StatsRouteDeps) => {
  const { stats, teams } = deps;

  app.get('/v1/stats', async (req, res, next) => {
    const parsed = SummaryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const includeInProgress = parseBooleanParam(parsed.data.include_in_progress) ?? undefined;

    try {
      const summary = await stats.summary({ includeInProgress });
      return res.send(toStatsSummaryResponse(summary));
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/stats/leaderboards/win-rate', async (req, res, next) => {
    const parsed = WinRateQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const records = await stats.topTeamsByWinRate({
        sport: parsed.data.sport,
        limit: parsed.data.limit,
        minGames: parsed.data.min_games,
      });
      return res.send({ leaderboard: records.map(toTeamStatsResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/stats/leaderboards/streaks', async (req, res, next) => {
    const parsed = StreakQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const records = await stats.topWinStreaks({ sport: parsed.data.sport, limit: parsed.data.limit });
      return res.send({ leaderboard: records.map(toTeamStatsResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/stats/sports/:sport', async (req, res, next) => {
    const parsed = SportEnum.safeParse(req.params.sport);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const overview = await stats.overview(parsed.data);
      return res.send({ sport: parsed.data, overview: overview ? toSportOverviewResponse(overview) : null });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/stats/teams/:team_id', async (req, res, next) => {
    const parsed = TeamStatsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const teamId = req.params.team_id;

    try {
      // Teams that were deleted keep their history; only unknown ids with no records are 404s.
      const sport = parsed.data.sport;
      const single = sport ? await stats.record(teamId, sport) : null;
      const records = sport ? (single ? [single] : []) : await stats.recordsForTeam(teamId);
      if (!records.length) await teams.require(teamId);
      return res.send({ team_id: teamId, records: records.map(toTeamStatsResponse) });
    } catch (err) {
      return next(err);
    }
  });
};
