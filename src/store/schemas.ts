import { z } from 'zod';

import { SPORTS } from '../engine/sports.js';
import type { Match, MatchRules, PlayerRecord, ScoringState, TeamRecord } from '../engine/types.js';

export const SportSchema = z.enum(SPORTS);
export const SideSchema = z.enum(['A', 'B']);
const Count = z.number().int().min(0);

export const PlayerRecordSchema: z.ZodType<PlayerRecord> = z.object({
  id: z.string().min(1),
  name: z.string(),
  nickname: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const TeamRecordSchema: z.ZodType<TeamRecord> = z.object({
  id: z.string().min(1),
  name: z.string(),
  sport: SportSchema,
  colorIndex: Count,
  badgeName: z.string(),
  players: z.array(PlayerRecordSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const MatchRulesSchema: z.ZodType<MatchRules> = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('points'),
    sport: SportSchema,
    points: z.object({ target: z.number().int(), winByTwo: z.boolean() }),
  }),
  z.object({
    mode: z.literal('sets'),
    sport: SportSchema,
    sets: z.object({ setsToWin: z.number().int(), pointsPerSet: z.number().int(), winByTwo: z.boolean() }),
  }),
  z.object({
    mode: z.literal('timed'),
    sport: SportSchema,
    time: z.object({
      periods: z.number().int(),
      secondsPerPeriod: z.number().int(),
      allowDraw: z.boolean(),
      overtimeSeconds: z.number().int().nullable(),
      stopOnScore: z.boolean(),
    }),
  }),
]);

export const ScoringStateSchema: z.ZodType<ScoringState> = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('points'), scoreA: Count, scoreB: Count }),
  z.object({
    mode: z.literal('sets'),
    index: Count,
    scoresA: z.array(Count),
    scoresB: z.array(Count),
    setsWonA: Count,
    setsWonB: Count,
  }),
  z.object({
    mode: z.literal('timed'),
    currentPeriod: Count,
    remainingSeconds: z.array(Count),
    scoreA: Count,
    scoreB: Count,
  }),
]);

export const MatchEventSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  kind: z.enum(['score', 'unscore', 'setWin', 'periodStart', 'periodEnd', 'matchEnd', 'note']),
  side: SideSchema.nullable(),
  value: z.number().nullable(),
  text: z.string().nullable(),
});

const MatchSnapshotSchema = z.object({
  scoring: ScoringStateSchema,
  winner: SideSchema.nullable(),
  eventsCount: Count,
  updatedAt: z.string(),
  trailingEvents: z.array(MatchEventSchema).default([]),
});

export const MatchSchema: z.ZodType<Match, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    createdAt: z.string(),
    updatedAt: z.string(),
    sport: SportSchema,
    rules: MatchRulesSchema,
    teamA: TeamRecordSchema,
    teamB: TeamRecordSchema,
    scoring: ScoringStateSchema,
    winner: SideSchema.nullable(),
    events: z.array(MatchEventSchema),
    undoStack: z.array(MatchSnapshotSchema).default([]),
    redoStack: z.array(MatchSnapshotSchema).default([]),
  })
  .refine((match) => match.rules.mode === match.scoring.mode, {
    message: 'scoring state does not match rules mode',
    path: ['scoring', 'mode'],
  });

export interface DecodedCollection<T> {
  items: T[];
  invalid: number;
  duplicates: number;
}

/** Parses every record, keeping the first occurrence of each id. */
export const decodeCollection = <T extends { id: string }>(
  raw: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): DecodedCollection<T> => {
  const seen = new Set<string>();
  const items: T[] = [];
  let invalid = 0;
  let duplicates = 0;

  for (const entry of raw) {
    const parsed = schema.safeParse(entry);
    if (!parsed.success) {
      invalid += 1;
      continue;
    }
    if (seen.has(parsed.data.id)) {
      duplicates += 1;
      continue;
    }
    seen.add(parsed.data.id);
    items.push(parsed.data);
  }

  return { items, invalid, duplicates };
};
