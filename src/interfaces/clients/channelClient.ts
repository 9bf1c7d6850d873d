/**
 * ChannelClient interface — source of file postings
 */

import type { ChannelMessage } from "@/types";

export interface ChannelClient {
  /**
   * Stable identifier of the stream this client reads
   * Used as the cursor and lock key.
   */
  readonly streamKey: string;

  /**
   * Fetch messages with `id > since` (all available when `since` is null),
   * in ascending id order
   *
   * @throws {TransientChannelError} rate limited or channel unreachable
   * @throws {FatalChannelError} unauthorized, or another consumer is active
   */
  getMessages(since: number | null): Promise<ChannelMessage[]>;
}
