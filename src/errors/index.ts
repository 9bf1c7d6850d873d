export { TransientChannelError, FatalChannelError } from "./channelErrors";
export { ExternalLookupFailure } from "./externalLookupFailure";
export { StorageError } from "./storageError";
export { ConfigError } from "./configError";
