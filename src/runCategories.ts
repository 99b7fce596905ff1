/**
 * Category loop shared by the CLI
 *
 * Each category runs on its own: a source list that cannot be read is
 * logged at error and the category runs with zero sources.
 */

import { ConfigValidationError, type ConfigLoader } from "@/config/ConfigLoader";
import { logger } from "@/config/logger";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import type { SourceConfig } from "@/core/domain/SourceConfig";
import type {
  CatalogPipelineService,
  CategoryRunResult,
  PipelineOptions,
} from "@/services/CatalogPipelineService";

export type SourceListLoader = Pick<ConfigLoader, "loadSources">;

function loadSourcesOrNone(
  loader: SourceListLoader,
  category: MaterialCategory,
): SourceConfig[] {
  try {
    return loader.loadSources(category);
  } catch (error) {
    if (!(error instanceof ConfigValidationError)) throw error;
    logger.error(
      { category, file: error.file, error: error.message },
      "Source list unusable, category runs without sources",
    );
    return [];
  }
}

export async function runCategories(
  pipeline: Pick<CatalogPipelineService, "runCategory">,
  loader: SourceListLoader,
  categories: readonly MaterialCategory[],
  options: PipelineOptions,
): Promise<CategoryRunResult[]> {
  const results: CategoryRunResult[] = [];

  for (const category of categories) {
    const result = await pipeline.runCategory(
      category,
      loadSourcesOrNone(loader, category),
      options,
    );
    logger.info(
      {
        category,
        entries: result.entries.length,
        mergeStats: result.mergeStats,
        savedTo: result.savedTo,
      },
      "Category finished",
    );
    results.push(result);
  }

  return results;
}
