/**
 * Channel error classes
 *
 * Channel clients translate their transport failures into these two classes;
 * the ingestion pipeline decides what each one does to a cycle.
 */

import type { FatalChannelReason } from "@/types";

/**
 * Failure that heals by waiting: rate limiting, network or server errors
 *
 * `retryAfterSeconds` is set when the channel advised a back-off.
 */
export class TransientChannelError extends Error {
  public readonly retryAfterSeconds: number | null;

  constructor(message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = "TransientChannelError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Failure that needs an operator: bad credentials or chat id, or a second
 * consumer on the same stream
 */
export class FatalChannelError extends Error {
  public readonly reason: FatalChannelReason;

  constructor(reason: FatalChannelReason, message: string) {
    super(message);
    this.name = "FatalChannelError";
    this.reason = reason;
  }
}
