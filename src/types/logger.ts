/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

/**
 * Logger interface for structured logging
 *
 * Matches the signature of the project logger module (@/logger) and of
 * loggers returned by withContext().
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
