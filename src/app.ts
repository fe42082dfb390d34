import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import type { EngineContext } from './engine/types.js';
import { systemContext } from './engine/match.js';
import { MatchesRepository } from './repositories/matches.js';
import { TeamsRepository } from './repositories/teams.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMatchRoutes } from './routes/matches.js';
import { registerSportRoutes } from './routes/sports.js';
import { registerStatsRoutes } from './routes/stats.js';
import { registerTeamRoutes } from './routes/teams.js';
import { StatsService } from './services/stats.js';
import type { CollectionStorage } from './store/index.js';
import {
  InvalidParticipantsError,
  MatchLookupError,
  PlayerLookupError,
  TeamLookupError,
} from './store/errors.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    // eslint-disable-next-line no-console
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof TeamLookupError) {
    return {
      status: 404,
      body: {
        error: 'team_not_found',
        message: err.message,
        ...(err.context.missing?.length ? { context: err.context } : {}),
      },
    };
  }

  if (err instanceof MatchLookupError) {
    return { status: 404, body: { error: 'match_not_found', message: err.message } };
  }

  if (err instanceof PlayerLookupError) {
    return { status: 404, body: { error: 'player_not_found', message: err.message } };
  }

  if (err instanceof InvalidParticipantsError) {
    return { status: 400, body: { error: 'invalid_participants', code: err.code, message: err.message } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export interface AppServices {
  storage: CollectionStorage;
  teams: TeamsRepository;
  matches: MatchesRepository;
  stats: StatsService;
}

export interface CreateAppOptions {
  context?: EngineContext;
  statsIncludeInProgress?: boolean;
}

export const createServices = (storage: CollectionStorage, options: CreateAppOptions = {}): AppServices => {
  const context = options.context ?? systemContext;
  const teams = new TeamsRepository(storage, context);
  const matches = new MatchesRepository(storage, teams, context);
  const stats = new StatsService(matches, storage, { includeInProgress: options.statsIncludeInProgress });
  stats.start();
  return { storage, teams, matches, stats };
};

export const createApp = (storage: CollectionStorage, options: CreateAppOptions = {}) => {
  const services = createServices(storage, options);
  const app: Express = express();
  app.use(express.json());

  registerHealthRoutes(app, { storage });
  registerSportRoutes(app);
  registerTeamRoutes(app, { teams: services.teams });
  registerMatchRoutes(app, { matches: services.matches });
  registerStatsRoutes(app, { stats: services.stats, teams: services.teams });

  app.use(errorHandler);

  return { app, services };
};
