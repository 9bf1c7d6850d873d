/**
 * Telegram Bot API client constants
 */

export const TELEGRAM_DEFAULT_API_BASE_URL = "https://api.telegram.org";

export const TELEGRAM_DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Maximum updates returned by one getUpdates call (Bot API limit)
 */
export const TELEGRAM_UPDATES_LIMIT = 100;

/**
 * Update kinds requested from getUpdates
 */
export const TELEGRAM_ALLOWED_UPDATES = ["channel_post", "message"] as const;
