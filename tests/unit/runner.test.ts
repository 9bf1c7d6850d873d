/**
 * Unit tests for the runner loop
 */

import { describe, it, expect, vi } from "vitest";
import type { CycleResult } from "@/types";
import { createCycleCounters } from "@/ingestion";
import { isHealthyCycle, runForever, runOnce } from "@/orchestration/runner";

function cycle(status: CycleResult["status"]): CycleResult {
  return { status, runId: 1, counters: createCycleCounters() };
}

describe("isHealthyCycle", () => {
  it("should accept cycles that recover on their own", () => {
    expect(isHealthyCycle(cycle("completed"))).toBe(true);
    expect(isHealthyCycle(cycle("rate_limited"))).toBe(true);
    expect(isHealthyCycle(cycle("channel_unavailable"))).toBe(true);
  });

  it("should flag cycles that need an operator", () => {
    expect(isHealthyCycle(cycle("unauthorized"))).toBe(false);
    expect(isHealthyCycle(cycle("duplicate_consumer"))).toBe(false);
    expect(isHealthyCycle(cycle("storage_error"))).toBe(false);
  });
});

describe("runOnce", () => {
  it("should return the cycle result", async () => {
    const runner = { runCycle: vi.fn(async () => cycle("completed")) };

    expect(await runOnce(runner)).toEqual(cycle("completed"));
    expect(runner.runCycle).toHaveBeenCalledTimes(1);
  });
});

describe("runForever", () => {
  it("should stop after the cycle during which shutdown was requested", async () => {
    let requestStop: () => void = () => undefined;
    const stopSignal = new Promise<void>((resolve) => {
      requestStop = resolve;
    });
    const runner = {
      runCycle: vi.fn(async () => {
        requestStop();
        return cycle("completed");
      }),
    };

    await runForever(runner, {
      firstDelaySeconds: 0,
      intervalSeconds: 3600,
      stopSignal,
    });

    expect(runner.runCycle).toHaveBeenCalledTimes(1);
  });

  it("should keep looping after a cycle throws", async () => {
    let requestStop: () => void = () => undefined;
    const stopSignal = new Promise<void>((resolve) => {
      requestStop = resolve;
    });
    let calls = 0;
    const runner = {
      runCycle: vi.fn(async () => {
        calls++;
        if (calls === 1) {
          throw new Error("unexpected");
        }
        requestStop();
        return cycle("completed");
      }),
    };

    await runForever(runner, {
      firstDelaySeconds: 0,
      intervalSeconds: 0,
      stopSignal,
    });

    expect(runner.runCycle).toHaveBeenCalledTimes(2);
  });
});
