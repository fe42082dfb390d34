import type { Express } from 'express';
import { z } from 'zod';

import type { TeamsRepository } from '../repositories/teams.js';
import { toPlayerResponse, toTeamResponse } from './helpers/responders.js';
import { SportEnum } from './helpers/schemas.js';

const PlayerCreateSchema = z.object({
  name: z.string().trim().min(1),
  nickname: z.string().nullable().optional(),
});

const TeamCreateSchema = z.object({
  name: z.string().trim().min(1),
  sport: SportEnum,
  badge_name: z.string().optional(),
  color_index: z.number().int().optional(),
  players: z.array(PlayerCreateSchema).optional(),
});

const TeamUpdateSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    sport: SportEnum.optional(),
    badge_name: z.string().optional(),
    color_index: z.number().int().optional(),
  })
  .refine(
    (data) =>
      data.name !== undefined ||
      data.sport !== undefined ||
      data.badge_name !== undefined ||
      data.color_index !== undefined,
    { message: 'At least one field is required', path: ['name'] }
  );

const PlayerUpdateSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    nickname: z.string().nullable().optional(),
  })
  .refine((data) => data.name !== undefined || data.nickname !== undefined, {
    message: 'At least one field is required',
    path: ['name'],
  });

const TeamListQuerySchema = z.object({
  sport: SportEnum.optional(),
  q: z.string().optional(),
});

const DuplicateSchema = z.object({ name_suffix: z.string().optional() });

interface TeamRouteDeps {
  teams: TeamsRepository;
}

export const registerTeamRoutes = (app: Express, deps: TeamRouteDeps) => {
  const { teams } = deps;

  app.post('/v1/teams', async (req, res, next) => {
    const parsed = TeamCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const team = await teams.create({
        name: parsed.data.name,
        sport: parsed.data.sport,
        badgeName: parsed.data.badge_name,
        colorIndex: parsed.data.color_index,
        players: parsed.data.players,
      });
      return res.status(201).send(toTeamResponse(team));
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/teams', async (req, res, next) => {
    const parsed = TeamListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const { sport, q } = parsed.data;
      const found = q ? await teams.search(q) : await teams.list();
      const filtered = sport ? found.filter((team) => team.sport === sport) : found;
      return res.send({ teams: filtered.map(toTeamResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/teams/:team_id', async (req, res, next) => {
    try {
      const team = await teams.require(req.params.team_id);
      return res.send(toTeamResponse(team));
    } catch (err) {
      return next(err);
    }
  });

  app.patch('/v1/teams/:team_id', async (req, res, next) => {
    const parsed = TeamUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const teamId = req.params.team_id;
    const { name, sport, badge_name, color_index } = parsed.data;

    try {
      let team = await teams.require(teamId);
      if (name !== undefined) team = await teams.rename(teamId, name);
      if (sport !== undefined) team = await teams.setSport(teamId, sport);
      if (badge_name !== undefined) team = await teams.setBadge(teamId, badge_name);
      if (color_index !== undefined) team = await teams.setColor(teamId, color_index);
      return res.send(toTeamResponse(team));
    } catch (err) {
      return next(err);
    }
  });

  app.delete('/v1/teams/:team_id', async (req, res, next) => {
    try {
      await teams.delete(req.params.team_id);
      return res.status(204).send();
    } catch (err) {
      return next(err);
    }
  });

  app.post('/v1/teams/:team_id/duplicate', async (req, res, next) => {
    const parsed = DuplicateSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const copy = await teams.duplicate(req.params.team_id, parsed.data.name_suffix);
      return res.status(201).send(toTeamResponse(copy));
    } catch (err) {
      return next(err);
    }
  });

  app.post('/v1/teams/:team_id/players', async (req, res, next) => {
    const parsed = PlayerCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const { team, player } = await teams.addPlayer(req.params.team_id, parsed.data);
      return res.status(201).send({ team: toTeamResponse(team), player: toPlayerResponse(player) });
    } catch (err) {
      return next(err);
    }
  });

  app.patch('/v1/teams/:team_id/players/:player_id', async (req, res, next) => {
    const parsed = PlayerUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const { team, player } = await teams.updatePlayer(req.params.team_id, req.params.player_id, parsed.data);
      return res.send({ team: toTeamResponse(team), player: toPlayerResponse(player) });
    } catch (err) {
      return next(err);
    }
  });

  app.delete('/v1/teams/:team_id/players/:player_id', async (req, res, next) => {
    try {
      const team = await teams.removePlayer(req.params.team_id, req.params.player_id);
      return res.send(toTeamResponse(team));
    } catch (err) {
      return next(err);
    }
  });
};
