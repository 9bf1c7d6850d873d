export * from "./logger";
export * from "./db";
export * from "./catalog";
export * from "./channel";
export * from "./metadata";
export * from "./embeddings";
export * from "./ingestion";
export * from "./runLock";
export * from "./config";
export * from "./clients/http";
