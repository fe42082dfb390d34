import type { Express } from 'express';
import { z } from 'zod';

import { defaultRulesFor, genericRulePresets } from '../engine/rules.js';
import { SPORTS } from '../engine/sports.js';
import { toRulesResponse, toSportResponse } from './helpers/responders.js';
import { SportEnum } from './helpers/schemas.js';

const RulesDefaultsParamsSchema = z.object({ sport: SportEnum });

export const registerSportRoutes = (app: Express) => {
  app.get('/v1/sports', (_req, res) => {
    res.send({
      sports: SPORTS.map((sport) => ({
        ...toSportResponse(sport),
        default_rules: toRulesResponse(defaultRulesFor(sport)),
      })),
      presets: genericRulePresets().map(toRulesResponse),
    });
  });

  app.get('/v1/rules/defaults/:sport', (req, res) => {
    const parsed = RulesDefaultsParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }
    return res.send(toRulesResponse(defaultRulesFor(parsed.data.sport)));
  });
};
