/**
 * Telegram Bot API mappers
 */

import type { ChannelAttachment, ChannelMessage } from "@/types";
import type {
  TelegramErrorBody,
  TelegramFile,
  TelegramMessage,
  TelegramUpdate,
} from "@/types/clients/telegram";
import { FatalChannelError, TransientChannelError } from "@/errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseFile(value: unknown): TelegramFile | undefined {
  if (!isRecord(value) || typeof value.file_id !== "string") {
    return undefined;
  }
  return {
    file_id: value.file_id,
    file_name: typeof value.file_name === "string" ? value.file_name : undefined,
  };
}

function parseMessage(value: unknown): TelegramMessage | undefined {
  if (
    !isRecord(value) ||
    typeof value.message_id !== "number" ||
    !isRecord(value.chat)
  ) {
    return undefined;
  }

  const chatId = value.chat.id;
  if (typeof chatId !== "number" && typeof chatId !== "string") {
    return undefined;
  }

  return {
    message_id: value.message_id,
    chat: { id: chatId },
    caption: typeof value.caption === "string" ? value.caption : undefined,
    document: parseFile(value.document),
    video: parseFile(value.video),
    audio: parseFile(value.audio),
  };
}

/**
 * Narrow a getUpdates body to its update list
 *
 * Updates without a numeric update_id are dropped; they cannot move the cursor.
 *
 * @throws {TransientChannelError} if the body is not a successful Bot API response
 */
export function parseGetUpdatesResponse(body: unknown): TelegramUpdate[] {
  if (!isRecord(body) || body.ok !== true || !Array.isArray(body.result)) {
    throw new TransientChannelError("Malformed getUpdates response");
  }

  const updates: TelegramUpdate[] = [];
  for (const item of body.result) {
    if (!isRecord(item) || typeof item.update_id !== "number") {
      continue;
    }
    updates.push({
      update_id: item.update_id,
      message: parseMessage(item.message),
      channel_post: parseMessage(item.channel_post),
    });
  }

  return updates;
}

/**
 * Map an update to a channel message
 *
 * Updates from other chats, or without a post, still become messages (so the
 * cursor moves past them) but carry neither caption nor attachment.
 */
export function mapUpdateToChannelMessage(
  update: TelegramUpdate,
  channelChatId: string,
): ChannelMessage {
  const post = update.channel_post ?? update.message;
  if (!post || String(post.chat.id) !== channelChatId) {
    return { id: update.update_id };
  }

  const file = post.document ?? post.video ?? post.audio;
  const attachment: ChannelAttachment | undefined = file
    ? { handle: file.file_id, fileName: file.file_name }
    : undefined;

  return {
    id: update.update_id,
    caption: post.caption,
    attachment,
  };
}

/**
 * Parse a Bot API error body (as kept on HttpError.bodySnippet)
 */
export function parseTelegramErrorBody(
  bodySnippet: string | undefined,
): TelegramErrorBody | null {
  if (!bodySnippet) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(bodySnippet);
  } catch {
    // Truncated or non-JSON body (e.g. a proxy error page)
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const parameters = isRecord(parsed.parameters) ? parsed.parameters : undefined;
  return {
    error_code: typeof parsed.error_code === "number" ? parsed.error_code : undefined,
    description:
      typeof parsed.description === "string" ? parsed.description : undefined,
    parameters:
      parameters && typeof parameters.retry_after === "number"
        ? { retry_after: parameters.retry_after }
        : undefined,
  };
}

/**
 * Translate a Bot API failure into the channel error taxonomy
 *
 * - 429: rate limit, with the advised back-off (body, then Retry-After, then 1s)
 * - 401 / 403 / 404: bad token or no access to the channel
 * - 400 "chat not found": wrong channel id
 * - 409: another getUpdates consumer or a webhook owns the bot
 * - anything else: transient
 */
export function mapTelegramFailure(
  status: number,
  body: TelegramErrorBody | null,
  retryAfterHeaderSeconds: number | null,
): TransientChannelError | FatalChannelError {
  const description = body?.description ?? `HTTP ${status}`;

  if (status === 429) {
    const retryAfter =
      body?.parameters?.retry_after ?? retryAfterHeaderSeconds ?? 1;
    return new TransientChannelError(
      `Telegram rate limit: ${description}`,
      retryAfter,
    );
  }

  if (status === 401 || status === 403 || status === 404) {
    return new FatalChannelError(
      "UNAUTHORIZED",
      `Telegram rejected the bot or channel: ${description}`,
    );
  }

  if (status === 400 && description.toLowerCase().includes("chat not found")) {
    return new FatalChannelError(
      "UNAUTHORIZED",
      `Telegram channel not accessible: ${description}`,
    );
  }

  if (status === 409) {
    return new FatalChannelError(
      "DUPLICATE_CONSUMER",
      `Another consumer is reading this bot's updates: ${description}`,
    );
  }

  return new TransientChannelError(`Telegram request failed: ${description}`);
}
