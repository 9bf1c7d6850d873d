/**
 * Telegram Bot API shapes (subset used by the channel client)
 */

export type TelegramFile = {
  file_id: string;
  file_name?: string;
};

export type TelegramMessage = {
  message_id: number;
  chat: { id: number | string };
  caption?: string;
  document?: TelegramFile;
  video?: TelegramFile;
  audio?: TelegramFile;
};

/**
 * One update from getUpdates; posts in channels arrive as `channel_post`
 */
export type TelegramUpdate = {
  update_id: number;
  message?: TelegramMessage;
  channel_post?: TelegramMessage;
};

export type TelegramErrorBody = {
  error_code?: number;
  description?: string;
  parameters?: { retry_after?: number };
};
