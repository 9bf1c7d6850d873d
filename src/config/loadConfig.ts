/**
 * Configuration loader — reads and validates the environment once at startup
 *
 * All problems are collected and reported together in a single ConfigError.
 */

import type { AppConfig, RunMode } from "@/types";
import {
  DEFAULT_DB_PATH,
  DEFAULT_JOB_FIRST_DELAY_SECONDS,
  DEFAULT_JOB_INTERVAL_SECONDS,
  REQUIRED_ENV_VARS,
} from "@/constants/config";
import {
  DEFAULT_EMBEDDING_BATCH_SIZE,
  DEFAULT_SIMILARITY_FLOOR,
} from "@/constants/matching";
import {
  OMDB_DEFAULT_BASE_URL,
  OMDB_DEFAULT_TIMEOUT_MS,
} from "@/constants/clients/omdb";
import {
  TELEGRAM_DEFAULT_API_BASE_URL,
  TELEGRAM_DEFAULT_TIMEOUT_MS,
} from "@/constants/clients/telegram";
import {
  EMBEDDING_DEFAULT_API_URL,
  EMBEDDING_DEFAULT_MODEL,
  EMBEDDING_DEFAULT_TIMEOUT_MS,
} from "@/constants/clients/embeddings";
import { ConfigError } from "@/errors";
import { parseLogLevel } from "@/logger";

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  problems: string[],
): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readRunMode(env: Env, problems: string[]): RunMode {
  const raw = (readString(env, "RUN_MODE") ?? "once").toLowerCase();
  if (raw === "once" || raw === "forever") {
    return raw;
  }
  problems.push(`RUN_MODE must be "once" or "forever" (got "${raw}")`);
  return "once";
}

function readSimilarityFloor(env: Env, problems: string[]): number {
  const raw = readString(env, "SIMILARITY_FLOOR");
  if (raw === undefined) {
    return DEFAULT_SIMILARITY_FLOOR;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < -1 || value > 1) {
    problems.push(`SIMILARITY_FLOOR must be a number in [-1, 1] (got "${raw}")`);
    return DEFAULT_SIMILARITY_FLOOR;
  }
  return value;
}

/**
 * Build the application config from environment variables
 *
 * @throws {ConfigError} When a required variable is missing or a value is invalid
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  for (const name of REQUIRED_ENV_VARS) {
    if (readString(env, name) === undefined) {
      problems.push(`${name} is required`);
    }
  }

  const config: AppConfig = {
    dbPath: readString(env, "DB_PATH") ?? DEFAULT_DB_PATH,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    runMode: readRunMode(env, problems),
    jobIntervalSeconds: readInteger(
      env,
      "JOB_INTERVAL",
      DEFAULT_JOB_INTERVAL_SECONDS,
      1,
      problems,
    ),
    jobFirstDelaySeconds: readInteger(
      env,
      "JOB_FIRST_DELAY",
      DEFAULT_JOB_FIRST_DELAY_SECONDS,
      0,
      problems,
    ),
    similarityFloor: readSimilarityFloor(env, problems),
    telegram: {
      botToken: readString(env, "TELEGRAM_BOT_TOKEN") ?? "",
      channelChatId: readString(env, "CHANNEL_CHAT_ID") ?? "",
      apiBaseUrl:
        readString(env, "TELEGRAM_API_BASE_URL") ?? TELEGRAM_DEFAULT_API_BASE_URL,
      timeoutMs: readInteger(
        env,
        "TELEGRAM_TIMEOUT_MS",
        TELEGRAM_DEFAULT_TIMEOUT_MS,
        1,
        problems,
      ),
    },
    omdb: {
      apiKey: readString(env, "OMDB_API_KEY") ?? "",
      baseUrl: readString(env, "OMDB_BASE_URL") ?? OMDB_DEFAULT_BASE_URL,
      timeoutMs: readInteger(
        env,
        "OMDB_TIMEOUT_MS",
        OMDB_DEFAULT_TIMEOUT_MS,
        1,
        problems,
      ),
    },
    embeddings: {
      apiUrl: readString(env, "EMBEDDING_API_URL") ?? EMBEDDING_DEFAULT_API_URL,
      apiKey: readString(env, "EMBEDDING_API_KEY"),
      model: readString(env, "EMBEDDING_MODEL") ?? EMBEDDING_DEFAULT_MODEL,
      timeoutMs: readInteger(
        env,
        "EMBEDDING_TIMEOUT_MS",
        EMBEDDING_DEFAULT_TIMEOUT_MS,
        1,
        problems,
      ),
      batchSize: readInteger(
        env,
        "EMBEDDING_BATCH_SIZE",
        DEFAULT_EMBEDDING_BATCH_SIZE,
        1,
        problems,
      ),
    },
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}
