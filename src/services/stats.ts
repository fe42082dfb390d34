import {
  buildStatsSummary,
  indexSportOverviews,
  indexTeamRecords,
  sportDigest,
  topTeamsByWinRate,
  topWinStreaks,
} from '../engine/stats.js';
import type { LeaderboardOptions, SportOverview, StatsSummary, TeamStatsRecord } from '../engine/stats.js';
import type { Match, Sport } from '../engine/types.js';
import type { MatchesRepository } from '../repositories/matches.js';
import type { CollectionStorage } from '../store/types.js';

export interface StatsServiceOptions {
  includeInProgress?: boolean;
}

const EMPTY_SUMMARY: StatsSummary = { generatedAt: null, teamRecords: [], sportOverviews: [] };

/**
 * Keeps the latest summary of the persisted match history. Any change to the
 * `matches` collection triggers a rebuild once `start` has been called.
 */
export class StatsService {
  private current: StatsSummary = EMPTY_SUMMARY;
  private teamIndex = new Map<string, Map<Sport, TeamStatsRecord>>();
  private sportIndex = new Map<Sport, SportOverview>();
  private loaded = false;
  private pending: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly includeInProgress: boolean;

  constructor(
    private readonly matches: MatchesRepository,
    private readonly storage: CollectionStorage,
    options: StatsServiceOptions = {}
  ) {
    this.includeInProgress = options.includeInProgress ?? true;
  }

  start() {
    if (this.unsubscribe) return;
    this.unsubscribe = this.storage.onChange((key) => {
      if (key !== 'matches') return;
      // Refreshes run in change order so an older load never lands last.
      this.pending = (this.pending ?? Promise.resolve())
        .then(() => this.refreshFromStorage())
        .then(() => undefined)
        .catch((err) => {
          console.error('stats_refresh_failed', err);
        });
    });
  }

  stop() {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Resolves once the rebuild triggered by the latest change has finished. */
  async settled() {
    await this.pending;
  }

  async refreshFromStorage(): Promise<StatsSummary> {
    return this.refresh(await this.matches.list());
  }

  refresh(matches: Match[], includeInProgress = this.includeInProgress): StatsSummary {
    const summary = buildStatsSummary(matches, { includeInProgress });
    this.current = summary;
    this.teamIndex = indexTeamRecords(summary);
    this.sportIndex = indexSportOverviews(summary);
    this.loaded = true;
    return summary;
  }

  /**
   * The cached summary. A different `includeInProgress` than the service
   * default builds a one-off summary without replacing the cache.
   */
  async summary(options: { includeInProgress?: boolean } = {}): Promise<StatsSummary> {
    const includeInProgress = options.includeInProgress ?? this.includeInProgress;
    if (includeInProgress !== this.includeInProgress) {
      return buildStatsSummary(await this.matches.list(), { includeInProgress });
    }
    await this.ensureLoaded();
    return this.current;
  }

  async record(teamId: string, sport: Sport): Promise<TeamStatsRecord | null> {
    await this.ensureLoaded();
    return this.teamIndex.get(teamId)?.get(sport) ?? null;
  }

  async recordsForTeam(teamId: string): Promise<TeamStatsRecord[]> {
    await this.ensureLoaded();
    return this.current.teamRecords.filter((record) => record.teamId === teamId);
  }

  async overview(sport: Sport): Promise<SportOverview | null> {
    await this.ensureLoaded();
    return this.sportIndex.get(sport) ?? null;
  }

  async topTeamsByWinRate(options: LeaderboardOptions & { minGames?: number } = {}) {
    await this.ensureLoaded();
    return topTeamsByWinRate(this.current, options);
  }

  async topWinStreaks(options: LeaderboardOptions = {}) {
    await this.ensureLoaded();
    return topWinStreaks(this.current, options);
  }

  async sportDigest() {
    await this.ensureLoaded();
    return sportDigest(this.current);
  }

  private async ensureLoaded() {
    await this.pending;
    if (!this.loaded) await this.refreshFromStorage();
  }
}
