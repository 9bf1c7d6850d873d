/**
 * Application configuration types
 */

import type { LogLevel } from "./logger";

export type RunMode = "once" | "forever";

export type TelegramConfig = {
  botToken: string;
  /** Chat id of the channel whose posts are catalogued */
  channelChatId: string;
  apiBaseUrl: string;
  timeoutMs: number;
};

export type OmdbConfig = {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
};

export type EmbeddingConfig = {
  /** Base URL of an OpenAI-compatible embeddings API (".../v1") */
  apiUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  batchSize: number;
};

export type AppConfig = {
  dbPath: string;
  logLevel: LogLevel;
  runMode: RunMode;
  /** Seconds between ingestion cycles in forever mode */
  jobIntervalSeconds: number;
  /** Seconds before the first cycle in forever mode */
  jobFirstDelaySeconds: number;
  similarityFloor: number;
  telegram: TelegramConfig;
  omdb: OmdbConfig;
  embeddings: EmbeddingConfig;
};
