/**
 * Run Lock Smoke Test
 *
 * Verifies the per-stream lock: single owner, release, re-acquisition,
 * expiry takeover.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { acquireRunLock, getRunLock, releaseRunLock } from "@/db";

const STREAM = "telegram:-100123";

describe("Run Lock Smoke Test", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should enforce single owner and allow release/reacquisition", async () => {
    harness = await createTestDb();
    const db = harness.db;

    expect(acquireRunLock(db, STREAM, "owner-a")).toEqual({ ok: true });
    expect(getRunLock(db, STREAM)?.owner_id).toBe("owner-a");
    expect(getRunLock(db, STREAM)?.lock_name).toBe("ingestion:telegram:-100123");

    expect(acquireRunLock(db, STREAM, "owner-b")).toEqual({
      ok: false,
      reason: "LOCKED",
    });
    expect(releaseRunLock(db, STREAM, "owner-b")).toBe(false);

    // Same owner refreshes its own lock
    expect(acquireRunLock(db, STREAM, "owner-a")).toEqual({ ok: true });

    expect(releaseRunLock(db, STREAM, "owner-a")).toBe(true);
    expect(getRunLock(db, STREAM)).toBeNull();

    expect(acquireRunLock(db, STREAM, "owner-b")).toEqual({ ok: true });
    expect(getRunLock(db, STREAM)?.owner_id).toBe("owner-b");
  });

  it("should lock each stream separately", async () => {
    harness = await createTestDb();

    expect(acquireRunLock(harness.db, STREAM, "owner-a")).toEqual({ ok: true });
    expect(acquireRunLock(harness.db, "telegram:-100456", "owner-b")).toEqual({
      ok: true,
    });
  });

  it("should let another owner take over an expired lock", async () => {
    harness = await createTestDb();
    const db = harness.db;

    acquireRunLock(db, STREAM, "owner-a");
    db.prepare(
      "UPDATE run_lock SET expires_at = datetime('now', '-1 minute') WHERE lock_name = ?",
    ).run("ingestion:telegram:-100123");

    expect(acquireRunLock(db, STREAM, "owner-b")).toEqual({ ok: true });
    expect(getRunLock(db, STREAM)?.owner_id).toBe("owner-b");
  });
});
