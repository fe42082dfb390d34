import { getSportProfile } from './sports.js';
import type { PlayerRecord, Sport, TeamRecord } from './types.js';

export const TEAM_PALETTE_SIZE = 10;
export const DEFAULT_BADGE = 'sf:shield.fill';

export const RECOMMENDED_BADGES = [
  'shield.fill',
  'flag.filled.and.flag.crossed',
  'hexagon.fill',
  'seal.fill',
  'star.circle.fill',
  'flame.circle.fill',
  'bolt.circle.fill',
  'trophy.fill',
  'crown.fill',
  'face.smiling.inverse',
] as const;

/** Newlines become spaces, whitespace runs collapse, ends are trimmed. */
export const sanitizeName = (raw: string) =>
  raw
    .replace(/[\r\n]/g, ' ')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');

export const sanitizeOptionalName = (raw: string | null | undefined) => {
  if (raw === null || raw === undefined) return null;
  const value = sanitizeName(raw);
  return value.length ? value : null;
};

export const sanitizeBadge = (raw: string) => {
  const value = sanitizeName(raw);
  return value.length ? value : DEFAULT_BADGE;
};

export const initialsOf = (text: string) => {
  const parts = text.trim().split(/\s+/).filter(Boolean);
  const letters: string[] = [];
  if (parts.length) letters.push(Array.from(parts[0])[0] ?? '');
  if (parts.length > 1) letters.push(Array.from(parts[parts.length - 1])[0] ?? '');
  const result = letters.join('').toUpperCase();
  if (!result.length) return (Array.from(text)[0] ?? '').toUpperCase();
  return result;
};

const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x00000100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

// FNV-1a 64 over the UTF-8 bytes of the text.
export const fnv1a64 = (text: string) => {
  let hash = FNV_OFFSET;
  for (const byte of Buffer.from(text, 'utf8')) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
};

export const stableColorIndex = (id: string, paletteSize = TEAM_PALETTE_SIZE) =>
  Number(fnv1a64(id.toUpperCase()) % BigInt(Math.max(1, paletteSize)));

export const wrapColorIndex = (index: number) => {
  const size = TEAM_PALETTE_SIZE;
  const mod = Math.trunc(index) % size;
  return mod >= 0 ? mod : mod + size;
};

export interface PlayerInit {
  id: string;
  name: string;
  nickname?: string | null;
  timestamp: string;
}

export const createPlayer = (init: PlayerInit): PlayerRecord => ({
  id: init.id,
  name: sanitizeName(init.name),
  nickname: sanitizeOptionalName(init.nickname),
  createdAt: init.timestamp,
  updatedAt: init.timestamp,
});

export const playerDisplayName = (player: PlayerRecord) => player.nickname ?? player.name;

export const playerMatchesQuery = (player: PlayerRecord, query: string) => {
  const q = query.toLowerCase();
  return player.name.toLowerCase().includes(q) || (player.nickname ?? '').toLowerCase().includes(q);
};

export const withPlayerName = (player: PlayerRecord, name: string, timestamp: string): PlayerRecord => ({
  ...player,
  name: sanitizeName(name),
  updatedAt: timestamp,
});

export const withPlayerNickname = (
  player: PlayerRecord,
  nickname: string | null,
  timestamp: string
): PlayerRecord => ({
  ...player,
  nickname: sanitizeOptionalName(nickname),
  updatedAt: timestamp,
});

export interface TeamInit {
  id: string;
  name: string;
  sport: Sport;
  colorIndex?: number | null;
  badgeName?: string | null;
  players?: PlayerRecord[];
  timestamp: string;
}

export const createTeam = (init: TeamInit): TeamRecord => ({
  id: init.id,
  name: sanitizeName(init.name),
  sport: init.sport,
  colorIndex: wrapColorIndex(init.colorIndex ?? stableColorIndex(init.id)),
  badgeName: sanitizeBadge(init.badgeName ?? DEFAULT_BADGE),
  players: init.players ?? [],
  createdAt: init.timestamp,
  updatedAt: init.timestamp,
});

export const isValidTeam = (team: TeamRecord) => team.name.trim().length > 0;

export const teamInitials = (team: TeamRecord) => initialsOf(team.name);

export const teamSlug = (team: TeamRecord) =>
  team.name
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .join('-');

export const teamHasPlayer = (team: TeamRecord, playerId: string) =>
  team.players.some((player) => player.id === playerId);

/** Case-insensitive match on team name, sport labels and roster names. */
export const teamMatchesQuery = (team: TeamRecord, query: string) => {
  const q = query.trim().toLowerCase();
  if (!q.length) return true;
  const profile = getSportProfile(team.sport);
  if (team.name.toLowerCase().includes(q)) return true;
  if (profile.label.toLowerCase().includes(q)) return true;
  if (profile.shortLabel.toLowerCase().includes(q)) return true;
  return team.players.some((player) => playerMatchesQuery(player, q));
};

export const withTeamName = (team: TeamRecord, name: string, timestamp: string): TeamRecord => ({
  ...team,
  name: sanitizeName(name),
  updatedAt: timestamp,
});

export const withTeamSport = (team: TeamRecord, sport: Sport, timestamp: string): TeamRecord => ({
  ...team,
  sport,
  updatedAt: timestamp,
});

export const withTeamColorIndex = (team: TeamRecord, colorIndex: number, timestamp: string): TeamRecord => ({
  ...team,
  colorIndex: wrapColorIndex(colorIndex),
  updatedAt: timestamp,
});

export const withTeamBadgeName = (team: TeamRecord, badgeName: string, timestamp: string): TeamRecord => ({
  ...team,
  badgeName: sanitizeBadge(badgeName),
  updatedAt: timestamp,
});

export const withTeamPlayers = (team: TeamRecord, players: PlayerRecord[], timestamp: string): TeamRecord => ({
  ...team,
  players,
  updatedAt: timestamp,
});

export const addingPlayer = (team: TeamRecord, player: PlayerRecord, timestamp: string): TeamRecord =>
  teamHasPlayer(team, player.id) ? team : withTeamPlayers(team, [...team.players, player], timestamp);

export const updatingPlayer = (team: TeamRecord, player: PlayerRecord, timestamp: string): TeamRecord =>
  teamHasPlayer(team, player.id)
    ? withTeamPlayers(
        team,
        team.players.map((existing) => (existing.id === player.id ? player : existing)),
        timestamp
      )
    : withTeamPlayers(team, [...team.players, player], timestamp);

export const removingPlayer = (team: TeamRecord, playerId: string, timestamp: string): TeamRecord =>
  withTeamPlayers(
    team,
    team.players.filter((player) => player.id !== playerId),
    timestamp
  );

export const compareNames = (a: string, b: string) =>
  a.localeCompare(b, undefined, { sensitivity: 'base' });
