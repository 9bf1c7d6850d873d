export type { ChannelClient } from "./clients/channelClient";
export type { MetadataLookupClient } from "./clients/metadataLookupClient";
export type { EmbeddingProvider } from "./clients/embeddingProvider";
