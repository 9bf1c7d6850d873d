/**
 * Unit tests for cycle failure classification
 */

import { describe, it, expect } from "vitest";
import { classifyCycleError } from "@/ingestion";
import {
  FatalChannelError,
  StorageError,
  TransientChannelError,
} from "@/errors";

describe("classifyCycleError", () => {
  it("should treat a transient error with a back-off as a rate limit", () => {
    expect(classifyCycleError(new TransientChannelError("slow down", 5))).toEqual({
      status: "rate_limited",
      errorCode: "RATE_LIMIT",
      retryAfterSeconds: 5,
    });
  });

  it("should treat a transient error without back-off as an unavailable channel", () => {
    expect(classifyCycleError(new TransientChannelError("502"))).toEqual({
      status: "channel_unavailable",
      errorCode: "CHANNEL_UNAVAILABLE",
    });
  });

  it("should map fatal reasons", () => {
    expect(
      classifyCycleError(new FatalChannelError("UNAUTHORIZED", "401")).status,
    ).toBe("unauthorized");
    expect(
      classifyCycleError(new FatalChannelError("DUPLICATE_CONSUMER", "409")).status,
    ).toBe("duplicate_consumer");
  });

  it("should recognise storage failures, wrapped or raw", () => {
    const sqliteError = Object.assign(new Error("database or disk is full"), {
      code: "SQLITE_FULL",
    });

    expect(classifyCycleError(new StorageError("cursor advance", sqliteError))).toEqual({
      status: "storage_error",
      errorCode: "STORAGE",
    });
    expect(classifyCycleError(sqliteError).status).toBe("storage_error");
  });

  it("should fall back to failed", () => {
    expect(classifyCycleError(new Error("boom"))).toEqual({
      status: "failed",
      errorCode: "UNKNOWN",
    });
  });
});
