/**
 * TelegramChannelClient — channel posts via the Bot API getUpdates method
 *
 * The bot must be an administrator of the channel to receive its posts.
 * Cursor ids are Telegram update ids; `getMessages(since)` asks for
 * `offset = since + 1`, which also confirms earlier updates to Telegram.
 */

import type { ChannelClient } from "@/interfaces";
import type { ChannelMessage, HttpQuery, HttpRequestFn } from "@/types";
import {
  httpRequest as defaultHttpRequest,
  HttpError,
  isTransportError,
} from "@/clients/http";
import {
  TELEGRAM_ALLOWED_UPDATES,
  TELEGRAM_DEFAULT_API_BASE_URL,
  TELEGRAM_DEFAULT_TIMEOUT_MS,
  TELEGRAM_UPDATES_LIMIT,
} from "@/constants/clients/telegram";
import { TransientChannelError } from "@/errors";
import {
  mapTelegramFailure,
  mapUpdateToChannelMessage,
  parseGetUpdatesResponse,
  parseTelegramErrorBody,
} from "./mappers";
import * as logger from "@/logger";

export interface TelegramChannelClientConfig {
  botToken: string;
  channelChatId: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class TelegramChannelClient implements ChannelClient {
  readonly streamKey: string;

  private readonly botToken: string;
  private readonly channelChatId: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: TelegramChannelClientConfig) {
    const missing: string[] = [];
    if (!config.botToken) missing.push("TELEGRAM_BOT_TOKEN");
    if (!config.channelChatId) missing.push("CHANNEL_CHAT_ID");
    if (missing.length > 0) {
      throw new Error(
        `Telegram configuration missing: ${missing.join(", ")}`,
      );
    }

    this.botToken = config.botToken;
    this.channelChatId = config.channelChatId;
    this.apiBaseUrl = (config.apiBaseUrl ?? TELEGRAM_DEFAULT_API_BASE_URL).replace(
      /\/+$/,
      "",
    );
    this.timeoutMs = config.timeoutMs ?? TELEGRAM_DEFAULT_TIMEOUT_MS;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.streamKey = `telegram:${config.channelChatId}`;
  }

  /**
   * Bot API method URL (contains the token: never log it)
   */
  private methodUrl(method: string): string {
    return `${this.apiBaseUrl}/bot${this.botToken}/${method}`;
  }

  async getMessages(since: number | null): Promise<ChannelMessage[]> {
    const query: HttpQuery = {
      limit: TELEGRAM_UPDATES_LIMIT,
      timeout: 0,
      allowed_updates: JSON.stringify(TELEGRAM_ALLOWED_UPDATES),
    };
    if (since !== null) {
      query.offset = since + 1;
    }

    let body: unknown;
    try {
      body = await this.httpRequest({
        method: "GET",
        url: this.methodUrl("getUpdates"),
        query,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      throw this.translateError(err);
    }

    const messages = parseGetUpdatesResponse(body)
      .map((update) => mapUpdateToChannelMessage(update, this.channelChatId))
      .sort((a, b) => a.id - b.id);

    logger.debug("Telegram updates fetched", {
      streamKey: this.streamKey,
      since,
      count: messages.length,
    });

    return messages;
  }

  private translateError(err: unknown): Error {
    if (err instanceof HttpError) {
      const retryAfterHeader = err.headers?.get("retry-after");
      const retryAfterSeconds = retryAfterHeader
        ? Number.parseInt(retryAfterHeader, 10)
        : NaN;
      return mapTelegramFailure(
        err.status,
        parseTelegramErrorBody(err.bodySnippet),
        Number.isFinite(retryAfterSeconds) ? retryAfterSeconds : null,
      );
    }

    if (isTransportError(err)) {
      return new TransientChannelError(
        `Telegram unreachable: ${err instanceof Error ? err.name : "unknown"}`,
      );
    }

    return new TransientChannelError(
      `Telegram request failed: ${err instanceof Error ? err.name : String(err)}`,
    );
  }
}
