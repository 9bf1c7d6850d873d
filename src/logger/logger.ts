/**
 * Micro-logger wrapper — minimal logging with level filtering
 * No external dependencies, wraps console.*
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants/logger";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve a LOG_LEVEL value, falling back to the default for unknown input
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/**
 * Change the active level at runtime (entrypoints apply the loaded config)
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Log message if level is enabled
 */
function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}

/**
 * Render an unknown thrown value for log meta
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
