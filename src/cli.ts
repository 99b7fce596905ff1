#!/usr/bin/env node
/**
 * Material catalog scraper CLI
 *
 * Usage:
 *   tsx src/cli.ts [--resins] [--filaments] [--dry-run] [--no-merge] [--no-images]
 *
 * Without a category flag both catalogs are built.
 */

import { APP_METADATA, HTTP_CONFIG } from "@/config/constants";
import { ConfigLoader } from "@/config/ConfigLoader";
import { logger } from "@/config/logger";
import { PlaywrightBrowserLauncher } from "@/browser/PlaywrightBrowserLauncher";
import { JsonCatalogRepository } from "@/repositories/JsonCatalogRepository";
import { CatalogPipelineService } from "@/services/CatalogPipelineService";
import { ImageDownloader } from "@/services/ImageDownloader";
import { ExtractionStrategyRegistry } from "@/strategies/ExtractionStrategyRegistry";
import { FetchHttpClient } from "@/utils/FetchHttpClient";
import { RateLimiter } from "@/utils/RateLimiter";
import { CliUsageError, parseCliArgs, type CliArgs } from "./cliArgs";
import { runCategories } from "./runCategories";

function printUsage(): void {
  console.log(`
${APP_METADATA.NAME} v${APP_METADATA.VERSION}

Usage: material-catalog-scraper [options]

Options:
  --resins       build the resin catalog only
  --filaments    build the filament catalog only
  --dry-run      scrape and preview, write nothing
  --no-merge     replace the stored catalog instead of merging into it
  --no-images    keep remote image URLs, download nothing
  --help, -h     show this help
`);
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      printUsage();
      process.exit(2);
    }
    throw error;
  }

  if (args.help) {
    printUsage();
    return;
  }

  const http = new FetchHttpClient({
    timeoutMs: HTTP_CONFIG.REQUEST_TIMEOUT_MS,
    rateLimiter: new RateLimiter(HTTP_CONFIG.REQUEST_DELAY_MS),
  });
  const pipeline = new CatalogPipelineService({
    registry: ExtractionStrategyRegistry.create(
      http,
      new PlaywrightBrowserLauncher(),
    ),
    repository: new JsonCatalogRepository(),
    imageDownloader: new ImageDownloader(http),
  });
  logger.info(
    { version: APP_METADATA.VERSION, categories: args.categories, ...args.options },
    "Run started",
  );

  await runCategories(
    pipeline,
    ConfigLoader.getInstance(),
    args.categories,
    args.options,
  );

  logger.info("Run finished");
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal(
      { error: error instanceof Error ? error.message : String(error) },
      "Run failed",
    );
    process.exit(1);
  });
}
