/**
 * Runner core — drives ingestion cycles
 *
 * - once: a single cycle
 * - forever: first cycle after a delay, then one per interval until a
 *   shutdown signal; a cycle is never started while one is running
 */

import type { CycleResult } from "@/types";
import type { CatalogService } from "@/catalog";
import * as logger from "@/logger";

/**
 * Anything that can run one ingestion cycle (the catalog service in production)
 */
export type CycleRunner = Pick<CatalogService, "runCycle">;

export interface RunForeverOptions {
  firstDelaySeconds: number;
  intervalSeconds: number;
  /** Resolves when the loop should stop after the current cycle */
  stopSignal: Promise<void>;
}

/**
 * Statuses that mean the cycle did its job or will recover on its own
 */
const HEALTHY_STATUSES: ReadonlySet<CycleResult["status"]> = new Set([
  "completed",
  "busy",
  "rate_limited",
  "channel_unavailable",
]);

export function isHealthyCycle(result: CycleResult): boolean {
  return HEALTHY_STATUSES.has(result.status);
}

export async function runOnce(service: CycleRunner): Promise<CycleResult> {
  const result = await service.runCycle();

  logger.info("Runner cycle finished", {
    status: result.status,
    runId: result.runId,
    ...result.counters,
  });

  return result;
}

/**
 * Wait for ms, or less if the stop signal fires first
 */
function waitOrStop(ms: number, stopSignal: Promise<void>): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });

  return Promise.race([timeout, stopSignal]).finally(() => clearTimeout(timer));
}

export async function runForever(
  service: CycleRunner,
  options: RunForeverOptions,
): Promise<void> {
  let stopped = false;
  const stopSignal = options.stopSignal.then(() => {
    stopped = true;
  });

  logger.info("Starting continuous runner", {
    firstDelaySeconds: options.firstDelaySeconds,
    intervalSeconds: options.intervalSeconds,
  });

  await waitOrStop(options.firstDelaySeconds * 1000, stopSignal);

  let cycleCount = 0;
  while (!stopped) {
    cycleCount++;
    logger.debug("Starting runner cycle", { cycleCount });

    try {
      await runOnce(service);
    } catch (error) {
      // runCycle reports failures in its result; this is a programming error
      logger.error("Runner cycle threw", {
        cycleCount,
        error: logger.describeError(error),
      });
    }

    if (stopped) {
      break;
    }
    await waitOrStop(options.intervalSeconds * 1000, stopSignal);
  }

  logger.info("Continuous runner stopped", { cycleCount });
}
