import { z } from 'zod';

import { SPORTS } from '../../engine/sports.js';
import type { RulesInput, Sport } from '../../engine/types.js';

export const SportEnum = z.enum(SPORTS);
export const SideEnum = z.enum(['A', 'B']);

export const RulesBodySchema = z.object({
  mode: z.enum(['points', 'sets', 'timed']),
  points: z
    .object({
      target: z.number().optional(),
      win_by_two: z.boolean().optional(),
    })
    .optional(),
  sets: z
    .object({
      sets_to_win: z.number().optional(),
      points_per_set: z.number().optional(),
      win_by_two: z.boolean().optional(),
    })
    .optional(),
  time: z
    .object({
      periods: z.number().optional(),
      seconds_per_period: z.number().optional(),
      allow_draw: z.boolean().optional(),
      overtime_seconds: z.number().nullable().optional(),
      stop_on_score: z.boolean().optional(),
    })
    .optional(),
});

export type RulesBody = z.infer<typeof RulesBodySchema>;

export const BooleanParam = z.union([z.string(), z.boolean()]).optional();

export const parseBooleanParam = (value: unknown): boolean | null => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }
  return null;
};

/** Maps a snake_case rules body to the loose engine input; validation clamps it later. */
export const toRulesInput = (sport: Sport, body: RulesBody): RulesInput => ({
  mode: body.mode,
  sport,
  points: body.points
    ? { target: body.points.target, winByTwo: body.points.win_by_two }
    : null,
  sets: body.sets
    ? {
        setsToWin: body.sets.sets_to_win,
        pointsPerSet: body.sets.points_per_set,
        winByTwo: body.sets.win_by_two,
      }
    : null,
  time: body.time
    ? {
        periods: body.time.periods,
        secondsPerPeriod: body.time.seconds_per_period,
        allowDraw: body.time.allow_draw,
        overtimeSeconds: body.time.overtime_seconds,
        stopOnScore: body.time.stop_on_score,
      }
    : null,
});
