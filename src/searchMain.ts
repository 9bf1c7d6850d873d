/**
 * Search entrypoint — query the catalog from the command line
 *
 * Usage:
 *   npm run search -- "a hacker learns reality is simulated"
 *   npm run search -- --list
 *   npm run search -- --reindex
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { createCatalogService } from "./catalog";
import type { CatalogService } from "./catalog";
import { ConfigError } from "./errors";
import * as logger from "./logger";

async function search(service: CatalogService, args: string[]): Promise<void> {
  if (args[0] === "--list") {
    const entries = service.listAll();
    for (const entry of entries) {
      console.log(`${entry.canonicalKey}\t${entry.fileHandle}`);
    }
    logger.info("Catalog listed", { count: entries.length });
    return;
  }

  if (args[0] === "--reindex") {
    const indexed = await service.rebuildIndex();
    logger.info("Embedding index rebuilt", { indexed });
    return;
  }

  const query = args.join(" ").trim();
  if (query === "") {
    console.error('Usage: npm run search -- "<query>" | --list | --reindex');
    process.exitCode = 2;
    return;
  }

  const match = await service.bestMatch(query);
  if (!match) {
    console.log("No match found.");
    process.exitCode = 1;
    return;
  }

  console.log(match.entry.canonicalKey);
  console.log(`similarity: ${match.similarity.toFixed(3)}`);
  console.log(`file: ${match.entry.fileHandle}`);
  console.log("");
  console.log(match.entry.description);
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const app = createCatalogService(config);
  try {
    await search(app.service, process.argv.slice(2));
  } finally {
    app.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error("Invalid configuration", { problems: error.problems });
  } else {
    logger.error("Search failed", { error: logger.describeError(error) });
  }
  process.exitCode = 1;
});
