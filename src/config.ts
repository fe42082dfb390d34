import dotenv from 'dotenv';

dotenv.config();

export const parsePositiveInteger = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const parseBoolean = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
};

export interface ServiceConfig {
  port: number;
  databaseUrl: string | null;
  statsIncludeInProgress: boolean;
  migrateRetries: number;
  migrateRetryDelayMs: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => ({
  port: parsePositiveInteger(env.PORT, 8080),
  databaseUrl: env.DATABASE_URL?.trim() ? env.DATABASE_URL.trim() : null,
  statsIncludeInProgress: parseBoolean(env.STATS_INCLUDE_IN_PROGRESS, true),
  migrateRetries: parsePositiveInteger(env.DB_MIGRATE_RETRIES, 10),
  migrateRetryDelayMs: parsePositiveInteger(env.DB_MIGRATE_RETRY_DELAY_MS, 5_000),
});
