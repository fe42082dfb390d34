import {
  addingPlayer,
  compareNames,
  createPlayer,
  createTeam,
  DEFAULT_BADGE,
  RECOMMENDED_BADGES,
  removingPlayer,
  sanitizeName,
  TEAM_PALETTE_SIZE,
  teamHasPlayer,
  teamMatchesQuery,
  updatingPlayer,
  withPlayerName,
  withPlayerNickname,
  withTeamBadgeName,
  withTeamColorIndex,
  withTeamName,
  withTeamSport,
  wrapColorIndex,
} from '../engine/participants.js';
import { systemContext } from '../engine/match.js';
import { compareSportLabels } from '../engine/sports.js';
import type { EngineContext, PlayerRecord, Sport, TeamRecord } from '../engine/types.js';
import { decodeCollection, TeamRecordSchema } from '../store/schemas.js';
import { PlayerLookupError, TeamLookupError } from '../store/errors.js';
import type { CollectionStorage } from '../store/types.js';
import { WriteQueue } from './write-queue.js';

const TEAMS_KEY = 'teams';

export interface CreateTeamInput {
  name: string;
  sport: Sport;
  badgeName?: string | null;
  colorIndex?: number | null;
  players?: { name: string; nickname?: string | null }[];
}

export interface PlayerPatch {
  name?: string;
  nickname?: string | null;
}

export const sortTeams = (teams: TeamRecord[]) =>
  [...teams].sort((a, b) => compareNames(a.name, b.name) || compareSportLabels(a.sport, b.sport));

const dedupById = <T extends { id: string }>(items: T[]) => {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.id)) return false;
    seen.add(item.id);
    return true;
  });
};

/** First palette slot no team is using; cycles back to 0 once all are taken. */
export const nextFreeColorIndex = (teams: TeamRecord[]) => {
  const used = new Set(teams.map((team) => wrapColorIndex(team.colorIndex)));
  for (let index = 0; index < TEAM_PALETTE_SIZE; index += 1) {
    if (!used.has(index)) return index;
  }
  return 0;
};

export const leastUsedBadge = (teams: TeamRecord[]) => {
  const counts = new Map<string, number>(RECOMMENDED_BADGES.map((name) => [name, 0]));
  for (const team of teams) {
    if (!team.badgeName.startsWith('sf:')) continue;
    const symbol = team.badgeName.slice(3);
    const count = counts.get(symbol);
    if (count !== undefined) counts.set(symbol, count + 1);
  }

  let best: string | null = null;
  let bestCount = Number.POSITIVE_INFINITY;
  for (const [symbol, count] of counts) {
    if (count < bestCount) {
      best = symbol;
      bestCount = count;
    }
  }
  return best ? `sf:${best}` : DEFAULT_BADGE;
};

const findTeam = (teams: TeamRecord[], id: string) => {
  const team = teams.find((candidate) => candidate.id === id);
  if (!team) {
    throw new TeamLookupError(`Team not found: ${id}`, { missing: [id] });
  }
  return team;
};

const replaceTeam = (teams: TeamRecord[], next: TeamRecord) =>
  teams.map((team) => (team.id === next.id ? next : team));

export class TeamsRepository {
  private readonly writes = new WriteQueue();

  constructor(
    private readonly storage: CollectionStorage,
    private readonly context: EngineContext = systemContext
  ) {}

  async list(): Promise<TeamRecord[]> {
    const raw = await this.storage.load(TEAMS_KEY);
    const decoded = decodeCollection(raw, TeamRecordSchema);
    if (decoded.invalid > 0) {
      console.warn('team_records_dropped', { invalid: decoded.invalid });
    }
    return sortTeams(decoded.items);
  }

  async get(id: string): Promise<TeamRecord | null> {
    const teams = await this.list();
    return teams.find((team) => team.id === id) ?? null;
  }

  async require(id: string): Promise<TeamRecord> {
    const team = await this.get(id);
    if (!team) {
      throw new TeamLookupError(`Team not found: ${id}`, { missing: [id] });
    }
    return team;
  }

  async create(input: CreateTeamInput): Promise<TeamRecord> {
    return this.transact((teams) => {
      const timestamp = this.timestamp();
      const players = (input.players ?? []).map((player) =>
        createPlayer({ id: this.context.newId(), name: player.name, nickname: player.nickname, timestamp })
      );
      const team = createTeam({
        id: this.context.newId(),
        name: input.name,
        sport: input.sport,
        colorIndex: input.colorIndex ?? nextFreeColorIndex(teams),
        badgeName: input.badgeName,
        players,
        timestamp,
      });
      return { teams: [...teams, team], result: team };
    });
  }

  /** Inserts an existing record as-is. A record whose id is already stored is ignored. */
  async add(team: TeamRecord): Promise<TeamRecord> {
    return this.transact((teams) => ({ teams: [...teams, team], result: team }));
  }

  async update(team: TeamRecord): Promise<TeamRecord> {
    return this.modify(team.id, () => team);
  }

  async rename(id: string, name: string) {
    return this.modify(id, (team, timestamp) => withTeamName(team, name, timestamp));
  }

  async setSport(id: string, sport: Sport) {
    return this.modify(id, (team, timestamp) => withTeamSport(team, sport, timestamp));
  }

  async setBadge(id: string, badgeName: string) {
    return this.modify(id, (team, timestamp) => withTeamBadgeName(team, badgeName, timestamp));
  }

  async setColor(id: string, colorIndex: number) {
    return this.modify(id, (team, timestamp) => withTeamColorIndex(team, colorIndex, timestamp));
  }

  async delete(id: string): Promise<void> {
    return this.transact((teams) => {
      findTeam(teams, id);
      return { teams: teams.filter((team) => team.id !== id), result: undefined };
    });
  }

  async duplicate(id: string, nameSuffix = ' Copy'): Promise<TeamRecord> {
    return this.transact((teams) => {
      const original = findTeam(teams, id);
      const copy = createTeam({
        id: this.context.newId(),
        name: `${original.name}${nameSuffix}`,
        sport: original.sport,
        colorIndex: nextFreeColorIndex(teams),
        badgeName: original.badgeName,
        players: original.players,
        timestamp: this.timestamp(),
      });
      return { teams: [...teams, copy], result: copy };
    });
  }

  async addPlayer(teamId: string, input: { name: string; nickname?: string | null }) {
    return this.transact((teams) => {
      const current = findTeam(teams, teamId);
      const timestamp = this.timestamp();
      const player = createPlayer({ id: this.context.newId(), name: input.name, nickname: input.nickname, timestamp });
      const team = addingPlayer(current, player, timestamp);
      return { teams: replaceTeam(teams, team), result: { team, player } };
    });
  }

  async updatePlayer(teamId: string, playerId: string, patch: PlayerPatch) {
    return this.transact((teams) => {
      const current = findTeam(teams, teamId);
      const existing = current.players.find((player) => player.id === playerId);
      if (!existing) {
        throw new PlayerLookupError(`Player not found: ${playerId}`);
      }
      const timestamp = this.timestamp();
      let player: PlayerRecord = existing;
      if (patch.name !== undefined) player = withPlayerName(player, patch.name, timestamp);
      if (patch.nickname !== undefined) player = withPlayerNickname(player, patch.nickname, timestamp);
      const team = updatingPlayer(current, player, timestamp);
      return { teams: replaceTeam(teams, team), result: { team, player } };
    });
  }

  async removePlayer(teamId: string, playerId: string) {
    return this.transact((teams) => {
      const current = findTeam(teams, teamId);
      if (!teamHasPlayer(current, playerId)) {
        throw new PlayerLookupError(`Player not found: ${playerId}`);
      }
      const team = removingPlayer(current, playerId, this.timestamp());
      return { teams: replaceTeam(teams, team), result: team };
    });
  }

  async forSport(sport: Sport) {
    const teams = await this.list();
    return teams.filter((team) => team.sport === sport);
  }

  async search(query: string) {
    const teams = await this.list();
    if (!sanitizeName(query).length) return teams;
    return teams.filter((team) => teamMatchesQuery(team, query));
  }

  async suggestColorIndex() {
    return nextFreeColorIndex(await this.list());
  }

  async suggestBadgeName() {
    return leastUsedBadge(await this.list());
  }

  async replaceAll(teams: TeamRecord[]) {
    await this.writes.run(() => this.persist(teams));
  }

  async removeAll() {
    await this.writes.run(() => this.persist([]));
  }

  private modify(id: string, apply: (team: TeamRecord, timestamp: string) => TeamRecord) {
    return this.transact((teams) => {
      const next = apply(findTeam(teams, id), this.timestamp());
      return { teams: replaceTeam(teams, next), result: next };
    });
  }

  // Load, change and save happen inside one queued task.
  private transact<T>(change: (teams: TeamRecord[]) => { teams: TeamRecord[]; result: T }): Promise<T> {
    return this.writes.run(async () => {
      const { teams, result } = change(await this.list());
      await this.persist(teams);
      return result;
    });
  }

  private async persist(teams: TeamRecord[]) {
    await this.storage.save(TEAMS_KEY, sortTeams(dedupById(teams)));
  }

  private timestamp() {
    return this.context.now().toISOString();
  }
}
