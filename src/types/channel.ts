/**
 * Channel type definitions
 */

/**
 * File attached to a channel message
 */
export type ChannelAttachment = {
  /** Opaque handle used by the source system to fetch the file again */
  handle: string;
  fileName?: string;
};

/**
 * Provider-agnostic channel message
 *
 * Messages are ordered by `id`; ids are strictly increasing within a stream.
 */
export type ChannelMessage = {
  id: number;
  caption?: string;
  attachment?: ChannelAttachment;
};

/**
 * Reasons a channel failure cannot heal on its own
 */
export type FatalChannelReason = "UNAUTHORIZED" | "DUPLICATE_CONSUMER";
