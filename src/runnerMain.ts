/**
 * Runner entrypoint — ingests new channel posts into the catalog
 *
 * Usage:
 *   npm start                  # RUN_MODE=once (default): one cycle, then exit
 *   RUN_MODE=forever npm start # first cycle after JOB_FIRST_DELAY, then every JOB_INTERVAL
 *
 * See .env.example for the environment variables.
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { createCatalogService } from "./catalog";
import { isHealthyCycle, runForever, runOnce } from "./orchestration/runner";
import { ConfigError } from "./errors";
import * as logger from "./logger";

function shutdownSignal(): Promise<void> {
  return new Promise((resolve) => {
    let requested = false;
    const handle = (signal: string) => {
      if (requested) {
        logger.warn("Forced shutdown - exiting immediately");
        process.exit(1);
      }
      requested = true;
      logger.info("Shutdown signal received, will stop after current cycle", {
        signal,
      });
      resolve();
    };

    process.on("SIGINT", () => handle("SIGINT"));
    process.on("SIGTERM", () => handle("SIGTERM"));
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const app = createCatalogService(config);
  try {
    if (config.runMode === "forever") {
      await runForever(app.service, {
        firstDelaySeconds: config.jobFirstDelaySeconds,
        intervalSeconds: config.jobIntervalSeconds,
        stopSignal: shutdownSignal(),
      });
      return;
    }

    const result = await runOnce(app.service);
    if (!isHealthyCycle(result)) {
      process.exitCode = 1;
    }
  } finally {
    app.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error("Invalid configuration", { problems: error.problems });
  } else {
    logger.error("Runner failed with fatal error", {
      error: logger.describeError(error),
    });
  }
  process.exitCode = 1;
});
