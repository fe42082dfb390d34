import type { Sport } from './types.js';

export interface SportProfile {
  key: string;
  label: string;
  shortLabel: string;
  supportsSets: boolean;
  usesTimerByDefault: boolean;
}

const SPORT_PROFILES: Record<Sport, SportProfile> = {
  FOOTBALL: { key: 'football', label: 'Football', shortLabel: 'Football', supportsSets: false, usesTimerByDefault: true },
  BASKETBALL: { key: 'basketball', label: 'Basketball', shortLabel: 'Basketball', supportsSets: false, usesTimerByDefault: true },
  VOLLEYBALL: { key: 'volleyball', label: 'Volleyball', shortLabel: 'Volleyball', supportsSets: true, usesTimerByDefault: false },
  TENNIS: { key: 'tennis', label: 'Tennis', shortLabel: 'Tennis', supportsSets: true, usesTimerByDefault: false },
  TABLE_TENNIS: { key: 'tabletennis', label: 'Table Tennis', shortLabel: 'TT', supportsSets: true, usesTimerByDefault: false },
  HOCKEY: { key: 'hockey', label: 'Hockey', shortLabel: 'Hockey', supportsSets: false, usesTimerByDefault: true },
  BADMINTON: { key: 'badminton', label: 'Badminton', shortLabel: 'Badminton', supportsSets: true, usesTimerByDefault: false },
  ESPORTS_CS: { key: 'esports.cs', label: 'CS', shortLabel: 'CS', supportsSets: false, usesTimerByDefault: false },
  ESPORTS_DOTA: { key: 'esports.dota', label: 'Dota', shortLabel: 'Dota', supportsSets: false, usesTimerByDefault: false },
  ESPORTS_LOL: { key: 'esports.lol', label: 'LoL', shortLabel: 'LoL', supportsSets: false, usesTimerByDefault: false },
};

export const SPORTS = [
  'FOOTBALL',
  'BASKETBALL',
  'VOLLEYBALL',
  'TENNIS',
  'TABLE_TENNIS',
  'HOCKEY',
  'BADMINTON',
  'ESPORTS_CS',
  'ESPORTS_DOTA',
  'ESPORTS_LOL',
] as const satisfies readonly Sport[];

export const isSport = (value: string): value is Sport =>
  SPORTS.some((sport) => sport === value);

export const getSportProfile = (sport: Sport): SportProfile => SPORT_PROFILES[sport];

export const sportLabel = (sport: Sport) => SPORT_PROFILES[sport].label;

// Unknown keys fall back to football.
export const sportFromKey = (key: string): Sport => {
  const normalized = key.trim().toLowerCase();
  const found = SPORTS.find((sport) => SPORT_PROFILES[sport].key === normalized);
  return found ?? 'FOOTBALL';
};

export const compareSportLabels = (a: Sport, b: Sport) =>
  sportLabel(a).localeCompare(sportLabel(b), undefined, { sensitivity: 'base' });
