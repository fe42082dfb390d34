import * as engine from '../engine/match.js';
import { defaultRulesFor } from '../engine/rules.js';
import { getSportProfile } from '../engine/sports.js';
import type {
  EngineContext,
  Match,
  MatchRules,
  OperationResult,
  RejectionReason,
  RulesInput,
  Side,
  Sport,
} from '../engine/types.js';
import { InvalidParticipantsError, MatchLookupError } from '../store/errors.js';
import { decodeCollection, MatchSchema } from '../store/schemas.js';
import type { CollectionStorage } from '../store/types.js';
import type { TeamsRepository } from './teams.js';
import { WriteQueue } from './write-queue.js';

const MATCHES_KEY = 'matches';

export interface MatchMutation {
  match: Match;
  applied: boolean;
  reason?: RejectionReason;
}

export interface CreateMatchRequest {
  sport: Sport;
  teamAId: string;
  teamBId: string;
  rules?: RulesInput | MatchRules | null;
}

/** Newest first: updatedAt descending, then createdAt descending. */
export const sortByDateDesc = (matches: Match[]) =>
  [...matches].sort((a, b) => {
    if (a.updatedAt !== b.updatedAt) return a.updatedAt < b.updatedAt ? 1 : -1;
    if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
    return 0;
  });

const dedupById = (matches: Match[]) => {
  const seen = new Set<string>();
  return matches.filter((match) => {
    if (seen.has(match.id)) return false;
    seen.add(match.id);
    return true;
  });
};

const toMutation = (result: OperationResult): MatchMutation =>
  result.applied
    ? { match: result.match, applied: true }
    : { match: result.match, applied: false, reason: result.reason };

const findMatch = (matches: Match[], id: string) => {
  const match = matches.find((candidate) => candidate.id === id);
  if (!match) throw new MatchLookupError(`Match not found: ${id}`);
  return match;
};

export class MatchesRepository {
  private readonly writes = new WriteQueue();

  constructor(
    private readonly storage: CollectionStorage,
    private readonly teams: TeamsRepository,
    private readonly context: EngineContext = engine.systemContext
  ) {}

  async list(): Promise<Match[]> {
    const raw = await this.storage.load(MATCHES_KEY);
    const decoded = decodeCollection(raw, MatchSchema);
    if (decoded.invalid > 0) {
      console.warn('match_records_dropped', { invalid: decoded.invalid });
    }
    return sortByDateDesc(decoded.items);
  }

  async get(id: string): Promise<Match | null> {
    const matches = await this.list();
    return matches.find((match) => match.id === id) ?? null;
  }

  async require(id: string): Promise<Match> {
    const match = await this.get(id);
    if (!match) throw new MatchLookupError(`Match not found: ${id}`);
    return match;
  }

  /** Snapshots both teams as they are now. Rules default to the sport's preset. */
  async create(request: CreateMatchRequest): Promise<Match> {
    if (request.teamAId === request.teamBId) {
      throw new InvalidParticipantsError('A match needs two different teams', 'same_team');
    }
    const [teamA, teamB] = await Promise.all([
      this.teams.require(request.teamAId),
      this.teams.require(request.teamBId),
    ]);
    const rules = request.rules ?? defaultRulesFor(request.sport);
    const match = engine.createMatch(
      { sport: request.sport, teamA, teamB, rules: { ...rules, sport: request.sport } },
      this.context
    );
    return this.add(match);
  }

  async add(match: Match): Promise<Match> {
    return this.transact((matches) => ({ matches: [match, ...matches], result: match }));
  }

  score(id: string, side: Side, delta = 1) {
    return this.apply(id, (match) => engine.score(match, side, delta, this.context));
  }

  setScore(id: string, scoreA: number, scoreB: number) {
    return this.apply(id, (match) => engine.setScore(match, scoreA, scoreB, this.context));
  }

  tick(id: string, seconds = 1) {
    return this.apply(id, (match) => engine.tick(match, seconds, this.context));
  }

  endPeriod(id: string) {
    return this.apply(id, (match) => engine.endPeriod(match, this.context));
  }

  addNote(id: string, text: string) {
    return this.apply(id, (match) => engine.addNote(match, text, this.context));
  }

  resetCurrentSet(id: string) {
    return this.apply(id, (match) => engine.resetCurrentSet(match, this.context));
  }

  resetAll(id: string) {
    return this.apply(id, (match) => engine.resetAll(match, this.context));
  }

  undo(id: string) {
    return this.apply(id, (match) => engine.undo(match));
  }

  redo(id: string) {
    return this.apply(id, (match) => engine.redo(match));
  }

  async rematch(id: string, swapped = false): Promise<Match> {
    return this.transact((matches) => {
      const next = engine.rematch(findMatch(matches, id), swapped, this.context);
      return { matches: [next, ...matches], result: next };
    });
  }

  /** Replaces the stored match with the same id, inserting it when absent. */
  async update(match: Match): Promise<Match> {
    return this.transact((matches) => ({
      matches: [match, ...matches.filter((existing) => existing.id !== match.id)],
      result: match,
    }));
  }

  async delete(id: string): Promise<void> {
    return this.transact((matches) => {
      findMatch(matches, id);
      return { matches: matches.filter((match) => match.id !== id), result: undefined };
    });
  }

  async removeAll() {
    await this.writes.run(() => this.persist([]));
  }

  async replaceAll(matches: Match[]) {
    await this.writes.run(() => this.persist(matches));
  }

  async recent(limit = 10) {
    const matches = await this.list();
    return matches.slice(0, Math.max(0, limit));
  }

  async forSport(sport: Sport) {
    const matches = await this.list();
    return matches.filter((match) => match.sport === sport);
  }

  async forTeam(teamId: string) {
    const matches = await this.list();
    return matches.filter((match) => match.teamA.id === teamId || match.teamB.id === teamId);
  }

  async finished(isFinished = true) {
    const matches = await this.list();
    return matches.filter((match) => engine.isFinished(match) === isFinished);
  }

  /** Case-insensitive match on either team name or the sport labels. */
  async search(query: string) {
    const matches = await this.list();
    const q = query.trim().toLowerCase();
    if (!q.length) return matches;
    return matches.filter((match) => {
      const profile = getSportProfile(match.sport);
      return (
        match.teamA.name.toLowerCase().includes(q) ||
        match.teamB.name.toLowerCase().includes(q) ||
        profile.label.toLowerCase().includes(q) ||
        profile.shortLabel.toLowerCase().includes(q)
      );
    });
  }

  /** Most recent meeting of the two teams in either orientation, any sport. */
  async lastHeadToHead(teamA: string, teamB: string): Promise<Match | null> {
    const matches = await this.list();
    return (
      matches.find(
        (match) =>
          (match.teamA.id === teamA && match.teamB.id === teamB) ||
          (match.teamA.id === teamB && match.teamB.id === teamA)
      ) ?? null
    );
  }

  // Rejected operations are reported without touching storage.
  private apply(id: string, operation: (match: Match) => OperationResult): Promise<MatchMutation> {
    return this.writes.run(async () => {
      const matches = await this.list();
      const result = operation(findMatch(matches, id));
      if (result.applied) {
        await this.persist(matches.map((match) => (match.id === id ? result.match : match)));
      }
      return toMutation(result);
    });
  }

  // Load, change and save happen inside one queued task.
  private transact<T>(change: (matches: Match[]) => { matches: Match[]; result: T }): Promise<T> {
    return this.writes.run(async () => {
      const { matches, result } = change(await this.list());
      await this.persist(matches);
      return result;
    });
  }

  private async persist(matches: Match[]) {
    await this.storage.save(MATCHES_KEY, sortByDateDesc(dedupById(matches)));
  }
}
