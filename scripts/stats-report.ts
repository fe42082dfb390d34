#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { createServices } from '../src/app.js';
import { loadConfig } from '../src/config.js';
import { closePool } from '../src/db/client.js';
import { sportLabel, SPORTS } from '../src/engine/sports.js';
import type { TeamStatsRecord } from '../src/engine/stats.js';
import type { Sport } from '../src/engine/types.js';
import { getStorage } from '../src/store/index.js';

const formatNumber = (value: number) => value.toLocaleString('en-US', { maximumFractionDigits: 2 });
const formatPercent = (value: number) => `${(value * 100).toFixed(1)}%`;

const formatTeamLine = (record: TeamStatsRecord) =>
  `- ${record.teamName} [${sportLabel(record.sport)}] :: games=${record.games} W-D-L=${record.wins}-${record.draws}-${record.losses} win_rate=${formatPercent(record.winRate)} streak=${record.currentStreak} avg_margin=${formatNumber(record.avgMargin)}`;

const services = () => createServices(getStorage(), { statsIncludeInProgress: loadConfig().statsIncludeInProgress });

const runSummary = async (includeInProgress: boolean) => {
  const { stats } = services();
  const summary = await stats.summary({ includeInProgress });
  if (!summary.teamRecords.length) {
    console.log('No matches recorded.');
    return;
  }

  console.log(`Summary as of ${summary.generatedAt ?? 'n/a'}`);
  for (const overview of summary.sportOverviews) {
    console.log(
      `${sportLabel(overview.sport)}: matches=${overview.matches} finished=${overview.finished} draws=${overview.draws} avg_total=${formatNumber(overview.avgTotalPoints)}`
    );
  }
  for (const record of summary.teamRecords) console.log(formatTeamLine(record));
};

const runWinRate = async (options: { sport?: Sport; limit: number; minGames: number }) => {
  const { stats } = services();
  const records = await stats.topTeamsByWinRate(options);
  if (!records.length) {
    console.log('No teams qualify.');
    return;
  }
  records.forEach((record, index) => console.log(`${index + 1}. ${formatTeamLine(record).slice(2)}`));
};

const runStreaks = async (options: { sport?: Sport; limit: number }) => {
  const { stats } = services();
  const records = await stats.topWinStreaks(options);
  if (!records.length) {
    console.log('No active win streaks.');
    return;
  }
  records.forEach((record, index) =>
    console.log(`${index + 1}. ${record.teamName} [${sportLabel(record.sport)}] streak=${record.currentStreak}`)
  );
};

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('stats-report')
    .command(
      'summary',
      'Print team records and sport overviews',
      (cmd) =>
        cmd.option('include-in-progress', {
          type: 'boolean',
          default: loadConfig().statsIncludeInProgress,
          describe: 'Count running totals of unfinished matches',
        }),
      (argv) => runSummary(argv.includeInProgress)
    )
    .command(
      'win-rate',
      'Leaderboard by win rate',
      (cmd) =>
        cmd
          .option('sport', { choices: SPORTS, describe: 'Restrict to one sport' })
          .option('limit', { type: 'number', default: 10 })
          .option('min-games', { type: 'number', default: 1, describe: 'Minimum finished games' }),
      (argv) => runWinRate({ sport: argv.sport, limit: argv.limit, minGames: argv.minGames })
    )
    .command(
      'streaks',
      'Leaderboard by current win streak',
      (cmd) =>
        cmd
          .option('sport', { choices: SPORTS, describe: 'Restrict to one sport' })
          .option('limit', { type: 'number', default: 10 }),
      (argv) => runStreaks({ sport: argv.sport, limit: argv.limit })
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error('stats_report_failed', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await closePool();
    } catch (err) {
      console.error('Failed to close database connection', err);
    }
  });
