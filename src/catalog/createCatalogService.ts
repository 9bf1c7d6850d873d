/**
 * Composition root — builds a CatalogService from configuration
 *
 * Opens the database, applies migrations and wires the real adapters.
 * Tests build the same graph with fakes instead.
 */

import type { AppConfig } from "@/types";
import type { Db } from "@/db";
import { closeDb, openDb, runMigrations } from "@/db";
import { TelegramChannelClient } from "@/clients/telegram";
import { OmdbClient } from "@/clients/omdb";
import { HttpEmbeddingProvider } from "@/clients/embeddings";
import { MetadataResolver } from "@/metadata";
import { IngestionPipeline } from "@/ingestion";
import { EmbeddingIndex, SemanticMatcher } from "@/matching";
import { CatalogService } from "./catalogService";
import * as logger from "@/logger";

export interface CatalogApp {
  db: Db;
  service: CatalogService;
  close: () => void;
}

export function createCatalogService(config: AppConfig): CatalogApp {
  const db = openDb(config.dbPath);

  try {
    const applied = runMigrations(db);
    if (applied.length > 0) {
      logger.info("Migrations applied", { applied });
    }
  } catch (err) {
    closeDb(db);
    throw err;
  }

  const channel = new TelegramChannelClient({
    botToken: config.telegram.botToken,
    channelChatId: config.telegram.channelChatId,
    apiBaseUrl: config.telegram.apiBaseUrl,
    timeoutMs: config.telegram.timeoutMs,
  });

  const resolver = new MetadataResolver(
    new OmdbClient({
      apiKey: config.omdb.apiKey,
      baseUrl: config.omdb.baseUrl,
      timeoutMs: config.omdb.timeoutMs,
    }),
  );

  const index = new EmbeddingIndex({
    provider: new HttpEmbeddingProvider({
      apiUrl: config.embeddings.apiUrl,
      apiKey: config.embeddings.apiKey,
      model: config.embeddings.model,
      timeoutMs: config.embeddings.timeoutMs,
    }),
    db,
    batchSize: config.embeddings.batchSize,
  });

  const service = new CatalogService({
    db,
    pipeline: new IngestionPipeline({ db, channel, resolver }),
    matcher: new SemanticMatcher({
      index,
      similarityFloor: config.similarityFloor,
    }),
    index,
  });

  return {
    db,
    service,
    close: () => closeDb(db),
  };
}
