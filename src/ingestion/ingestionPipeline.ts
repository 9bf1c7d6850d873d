/**
 * Ingestion pipeline — one pass over new channel messages
 *
 * Cycle:
 * 1. Acquire the stream lock (a held lock means a second consumer)
 * 2. Read the cursor, fetch messages above it
 * 3. Per message: stage an entry if it has an attachment, advance the cursor,
 *    then refresh the lock so a long cycle does not outlive its TTL
 * 4. Commit all staged entries as one batch (first write wins)
 *
 * The cursor moves per message, before the batch commit. A crash between the
 * two drops the staged entries of that cycle: they are never re-read. Within
 * a running process every failure is caught and reported in the result;
 * `runCycle()` never throws.
 */

import { randomUUID } from "crypto";
import type { ChannelClient } from "@/interfaces";
import type {
  CatalogEntry,
  ChannelMessage,
  CycleResult,
  CycleStatus,
  Logger,
  RunAccumulator,
} from "@/types";
import type { Db } from "@/db";
import {
  acquireRunLock,
  advanceCursor,
  getCursor,
  insertCatalogEntries,
  releaseRunLock,
} from "@/db";
import { CHANNEL_MAX_RETRY_AFTER_MS, CYCLE_ERROR_CODES } from "@/constants/ingestion";
import {
  FatalChannelError,
  StorageError,
  TransientChannelError,
} from "@/errors";
import type { MetadataResolver } from "@/metadata";
import { captionFromFileName, normalizeCaption } from "@/utils/text/canonicalKey";
import { describeDbError } from "@/utils/dbErrors";
import { createRunAccumulator, withRun } from "./runLifecycle";
import * as logger from "@/logger";

export interface IngestionPipelineDeps {
  db: Db;
  channel: ChannelClient;
  resolver: MetadataResolver;
  /** Lock owner id; one per pipeline instance by default */
  ownerId?: string;
  /** Injected for tests; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
  maxRetryAfterMs?: number;
}

type CycleErrorClassification = {
  status: CycleStatus;
  errorCode: string;
  retryAfterSeconds?: number;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Map a cycle failure to its status and persisted error code
 */
export function classifyCycleError(err: unknown): CycleErrorClassification {
  if (err instanceof TransientChannelError) {
    if (err.retryAfterSeconds !== null) {
      return {
        status: "rate_limited",
        errorCode: CYCLE_ERROR_CODES.RATE_LIMIT,
        retryAfterSeconds: err.retryAfterSeconds,
      };
    }
    return {
      status: "channel_unavailable",
      errorCode: CYCLE_ERROR_CODES.CHANNEL_UNAVAILABLE,
    };
  }

  if (err instanceof FatalChannelError) {
    return err.reason === "DUPLICATE_CONSUMER"
      ? {
          status: "duplicate_consumer",
          errorCode: CYCLE_ERROR_CODES.DUPLICATE_CONSUMER,
        }
      : { status: "unauthorized", errorCode: CYCLE_ERROR_CODES.UNAUTHORIZED };
  }

  if (err instanceof StorageError || describeDbError(err).code !== null) {
    return { status: "storage_error", errorCode: CYCLE_ERROR_CODES.STORAGE };
  }

  return { status: "failed", errorCode: CYCLE_ERROR_CODES.UNKNOWN };
}

export class IngestionPipeline {
  private readonly db: Db;
  private readonly channel: ChannelClient;
  private readonly resolver: MetadataResolver;
  private readonly ownerId: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly maxRetryAfterMs: number;
  private readonly log: Logger;
  private running = false;

  constructor(deps: IngestionPipelineDeps) {
    this.db = deps.db;
    this.channel = deps.channel;
    this.resolver = deps.resolver;
    this.ownerId = deps.ownerId ?? randomUUID();
    this.sleep = deps.sleep ?? defaultSleep;
    this.maxRetryAfterMs = deps.maxRetryAfterMs ?? CHANNEL_MAX_RETRY_AFTER_MS;
    this.log = logger.withContext({ streamKey: deps.channel.streamKey });
  }

  get streamKey(): string {
    return this.channel.streamKey;
  }

  async runCycle(): Promise<CycleResult> {
    const acc = createRunAccumulator();

    if (this.running) {
      this.log.warn("Ingestion cycle already running, skipping");
      return { status: "busy", runId: null, counters: acc.counters };
    }

    this.running = true;
    try {
      return await this.runLocked(acc);
    } finally {
      this.running = false;
    }
  }

  private async runLocked(acc: RunAccumulator): Promise<CycleResult> {
    const lock = acquireRunLock(this.db, this.streamKey, this.ownerId);
    if (!lock.ok) {
      if (lock.reason === "LOCKED") {
        this.log.error(
          "Another consumer holds the channel stream; aborting cycle",
          { ownerId: this.ownerId },
        );
        return { status: "duplicate_consumer", runId: null, counters: acc.counters };
      }

      this.log.error("Run lock unavailable; aborting cycle", {
        error: lock.error,
      });
      return { status: "storage_error", runId: null, counters: acc.counters };
    }

    try {
      return await this.runTracked(acc);
    } finally {
      try {
        releaseRunLock(this.db, this.streamKey, this.ownerId);
      } catch (err) {
        // The lock expires on its own after its TTL
        this.log.warn("Run lock release failed", describeDbError(err));
      }
    }
  }

  private async runTracked(acc: RunAccumulator): Promise<CycleResult> {
    let runId: number | null = null;

    try {
      await withRun(this.db, this.streamKey, acc, async (id) => {
        runId = id;
        try {
          await this.consume(acc);
        } catch (err) {
          acc.errorCode = classifyCycleError(err).errorCode;
          throw err;
        }
      });
    } catch (err) {
      return this.handleCycleError(err, runId, acc);
    }

    this.log.info("Ingestion cycle completed", { runId, ...acc.counters });
    return { status: "completed", runId, counters: acc.counters };
  }

  private async consume(acc: RunAccumulator): Promise<void> {
    let cursor: number | null;
    try {
      cursor = getCursor(this.db, this.streamKey);
    } catch (err) {
      throw new StorageError("cursor read", err);
    }

    const messages = await this.channel.getMessages(cursor);
    acc.counters.messages_fetched = messages.length;

    const staged: CatalogEntry[] = [];
    let interruption: StorageError | FatalChannelError | null = null;

    for (const message of messages) {
      if (cursor !== null && message.id <= cursor) {
        continue;
      }

      const entry = await this.stageMessage(message);
      if (entry) {
        staged.push(entry);
        acc.counters.entries_staged++;
      }

      try {
        advanceCursor(this.db, this.streamKey, message.id);
      } catch (err) {
        interruption = new StorageError("cursor advance", err);
        break;
      }
      acc.counters.messages_consumed++;

      interruption = this.refreshLock();
      if (interruption) {
        break;
      }
    }

    if (staged.length > 0) {
      const result = insertCatalogEntries(this.db, staged);
      acc.counters.entries_inserted = result.inserted;
      acc.counters.entries_skipped = result.skipped;
      acc.counters.entries_failed = result.failed;

      if (result.failed > 0 && !interruption) {
        interruption = new StorageError(
          "catalog insert",
          new Error(`${result.failed} of ${result.attempted} entries not persisted`),
        );
      }
    }

    if (interruption) {
      throw interruption;
    }
  }

  /**
   * Extend this owner's lock; a lock taken over by another owner ends the cycle
   */
  private refreshLock(): StorageError | FatalChannelError | null {
    const lock = acquireRunLock(this.db, this.streamKey, this.ownerId);
    if (lock.ok) {
      return null;
    }
    if (lock.reason === "LOCKED") {
      return new FatalChannelError(
        "DUPLICATE_CONSUMER",
        "Stream lock taken over by another consumer",
      );
    }
    return new StorageError("run lock refresh", new Error(lock.error ?? "unknown"));
  }

  /**
   * Build the catalog entry for a message, or null when it carries no file
   *
   * Without a caption the attachment's file name (minus its extension) is
   * canonicalized instead.
   */
  private async stageMessage(message: ChannelMessage): Promise<CatalogEntry | null> {
    if (!message.attachment) {
      this.log.debug("Message without attachment consumed", {
        messageId: message.id,
      });
      return null;
    }

    const caption = message.caption?.trim() ? message.caption : undefined;
    const canonicalKey = normalizeCaption(
      caption ?? captionFromFileName(message.attachment.fileName ?? ""),
    );
    if (canonicalKey === "") {
      this.log.warn("Empty canonical key accepted", { messageId: message.id });
    }

    const description = await this.resolver.resolve(caption, canonicalKey);

    return {
      canonicalKey,
      description,
      fileHandle: message.attachment.handle,
    };
  }

  private async handleCycleError(
    err: unknown,
    runId: number | null,
    acc: RunAccumulator,
  ): Promise<CycleResult> {
    const classification = classifyCycleError(err);
    const meta = {
      runId,
      errorCode: classification.errorCode,
      error: logger.describeError(err),
      ...acc.counters,
    };

    switch (classification.status) {
      case "rate_limited": {
        const retryAfterSeconds = classification.retryAfterSeconds ?? 0;
        const sleepMs = Math.min(retryAfterSeconds * 1000, this.maxRetryAfterMs);
        this.log.warn("Channel rate limit hit; backing off and aborting cycle", {
          ...meta,
          retryAfterSeconds,
          sleepMs,
        });
        await this.sleep(sleepMs);
        return {
          status: "rate_limited",
          runId,
          counters: acc.counters,
          retryAfterSeconds,
        };
      }
      case "channel_unavailable":
        this.log.warn("Channel unavailable; will retry next cycle", meta);
        break;
      case "duplicate_consumer":
        this.log.error("Another consumer is reading the channel; aborting cycle", meta);
        break;
      case "unauthorized":
        this.log.error("Channel authorization failed; operator action required", meta);
        break;
      case "storage_error":
        this.log.error("Storage error during ingestion cycle", meta);
        break;
      default:
        this.log.error("Ingestion cycle failed", meta);
    }

    return { status: classification.status, runId, counters: acc.counters };
  }
}
