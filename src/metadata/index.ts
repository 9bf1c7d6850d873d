export {
  MetadataResolver,
  formatMetadataSummary,
  isSentinelDescription,
} from "./metadataResolver";
