/**
 * Configuration defaults (environment variable fallbacks)
 */

export const DEFAULT_DB_PATH = "data/catalog.db";

/** 30 minutes between cycles */
export const DEFAULT_JOB_INTERVAL_SECONDS = 1800;

export const DEFAULT_JOB_FIRST_DELAY_SECONDS = 10;

export const REQUIRED_ENV_VARS = [
  "TELEGRAM_BOT_TOKEN",
  "CHANNEL_CHAT_ID",
  "OMDB_API_KEY",
] as const;
