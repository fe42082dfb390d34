import type { Express, RequestHandler } from 'express';
import { z } from 'zod';

import { isFinished } from '../engine/match.js';
import type { MatchesRepository, MatchMutation } from '../repositories/matches.js';
import { toMatchResponse, toMutationResponse } from './helpers/responders.js';
import { BooleanParam, parseBooleanParam, RulesBodySchema, SideEnum, SportEnum, toRulesInput } from './helpers/schemas.js';

const MatchCreateSchema = z.object({
  sport: SportEnum,
  team_a_id: z.string().min(1),
  team_b_id: z.string().min(1),
  rules: RulesBodySchema.optional(),
});

const MatchListQuerySchema = z.object({
  sport: SportEnum.optional(),
  team_id: z.string().optional(),
  status: z.enum(['in_progress', 'finished']).optional(),
  q: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
  include_events: BooleanParam,
});

const ScoreSchema = z.object({
  side: SideEnum,
  delta: z.number().int().optional(),
});

const SetScoreSchema = z.object({
  score_a: z.number().int().min(0),
  score_b: z.number().int().min(0),
});

const TickSchema = z.object({ seconds: z.number().optional() });

const NoteSchema = z.object({ text: z.string().min(1) });

const RematchSchema = z.object({ swapped: z.boolean().optional() });

const EmptySchema = z.object({});

interface MatchRouteDeps {
  matches: MatchesRepository;
}

/**
 * Wraps a match operation: validates the body, runs the mutation and answers
 * with `{ applied, reason, match }`. Rejected operations still answer 200.
 */
const mutationHandler =
  <T extends z.ZodTypeAny>(
    schema: T,
    run: (matchId: string, body: z.infer<T>) => Promise<MatchMutation>
  ): RequestHandler<{ match_id: string }> =>
  async (req, res, next) => {
    const parsed = schema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const mutation = await run(req.params.match_id, parsed.data);
      return res.send(toMutationResponse(mutation));
    } catch (err) {
      return next(err);
    }
  };

export const registerMatchRoutes = (app: Express, deps: MatchRouteDeps) => {
  const { matches } = deps;

  app.post('/v1/matches', async (req, res, next) => {
    const parsed = MatchCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { sport, team_a_id, team_b_id, rules } = parsed.data;

    try {
      const match = await matches.create({
        sport,
        teamAId: team_a_id,
        teamBId: team_b_id,
        rules: rules ? toRulesInput(sport, rules) : null,
      });
      return res.status(201).send(toMatchResponse(match));
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/matches', async (req, res, next) => {
    const parsed = MatchListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    const { sport, team_id, status, q, limit } = parsed.data;
    const includeEvents = parseBooleanParam(parsed.data.include_events) ?? false;

    try {
      let found = q ? await matches.search(q) : await matches.list();
      if (sport) found = found.filter((match) => match.sport === sport);
      if (team_id) found = found.filter((match) => match.teamA.id === team_id || match.teamB.id === team_id);
      if (status) found = found.filter((match) => isFinished(match) === (status === 'finished'));
      if (limit) found = found.slice(0, limit);
      return res.send({ matches: found.map((match) => toMatchResponse(match, { includeEvents })) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/matches/:match_id', async (req, res, next) => {
    try {
      const match = await matches.require(req.params.match_id);
      return res.send(toMatchResponse(match));
    } catch (err) {
      return next(err);
    }
  });

  app.delete('/v1/matches/:match_id', async (req, res, next) => {
    try {
      await matches.delete(req.params.match_id);
      return res.status(204).send();
    } catch (err) {
      return next(err);
    }
  });

  app.post(
    '/v1/matches/:match_id/score',
    mutationHandler(ScoreSchema, (id, body) => matches.score(id, body.side, body.delta ?? 1))
  );

  app.post(
    '/v1/matches/:match_id/set-score',
    mutationHandler(SetScoreSchema, (id, body) => matches.setScore(id, body.score_a, body.score_b))
  );

  app.post(
    '/v1/matches/:match_id/tick',
    mutationHandler(TickSchema, (id, body) => matches.tick(id, body.seconds ?? 1))
  );

  app.post('/v1/matches/:match_id/end-period', mutationHandler(EmptySchema, (id) => matches.endPeriod(id)));

  app.post(
    '/v1/matches/:match_id/notes',
    mutationHandler(NoteSchema, (id, body) => matches.addNote(id, body.text))
  );

  app.post('/v1/matches/:match_id/reset-set', mutationHandler(EmptySchema, (id) => matches.resetCurrentSet(id)));
  app.post('/v1/matches/:match_id/reset', mutationHandler(EmptySchema, (id) => matches.resetAll(id)));
  app.post('/v1/matches/:match_id/undo', mutationHandler(EmptySchema, (id) => matches.undo(id)));
  app.post('/v1/matches/:match_id/redo', mutationHandler(EmptySchema, (id) => matches.redo(id)));

  app.post('/v1/matches/:match_id/rematch', async (req, res, next) => {
    const parsed = RematchSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const match = await matches.rematch(req.params.match_id, parsed.data.swapped ?? false);
      return res.status(201).send(toMatchResponse(match));
    } catch (err) {
      return next(err);
    }
  });
};
