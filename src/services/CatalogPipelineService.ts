/**
 * Catalog pipeline
 *
 * Per category, sources run sequentially in list order:
 * extract (+ keyword filter) → classify → validate → images → convert
 * → merge with the stored catalog → save.
 *
 * A failing source contributes zero records; nothing here aborts the run.
 */

import { logger } from "@/config/logger";
import type { StoredCatalogEntry } from "@/core/domain/CatalogEntry";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import type { RawProduct } from "@/core/domain/RawProduct";
import type { SourceConfig } from "@/core/domain/SourceConfig";
import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";
import type { IImageDownloader } from "@/core/interfaces/IImageDownloader";
import { classify } from "@/classifiers/MaterialClassifier";
import type { ExtractionStrategyRegistry } from "@/strategies/ExtractionStrategyRegistry";
import { BlacklistValidator } from "@/validators/BlacklistValidator";
import { toCatalogEntry } from "./CatalogEntryMapper";
import { CatalogMergeService, type MergeStats } from "./CatalogMergeService";

const DRY_RUN_PREVIEW_COUNT = 5;

export interface PipelineOptions {
  /** preview only: no image download, no merge, no write */
  dryRun: boolean;
  /** merge into the stored catalog instead of replacing it */
  merge: boolean;
  downloadImages: boolean;
}

export interface CategoryRunResult {
  category: MaterialCategory;
  /** records accepted by validation, per source in order */
  sourceCounts: { brand: string; strategy: string; count: number }[];
  entries: StoredCatalogEntry[];
  mergeStats: MergeStats | null;
  savedTo: string | null;
}

export interface CatalogPipelineDependencies {
  registry: ExtractionStrategyRegistry;
  repository: ICatalogRepository;
  imageDownloader: IImageDownloader;
  validator?: BlacklistValidator;
  mergeService?: CatalogMergeService;
}

export class CatalogPipelineService {
  private readonly registry: ExtractionStrategyRegistry;
  private readonly repository: ICatalogRepository;
  private readonly imageDownloader: IImageDownloader;
  private readonly validator: BlacklistValidator;
  private readonly mergeService: CatalogMergeService;

  constructor(dependencies: CatalogPipelineDependencies) {
    this.registry = dependencies.registry;
    this.repository = dependencies.repository;
    this.imageDownloader = dependencies.imageDownloader;
    this.validator = dependencies.validator ?? new BlacklistValidator();
    this.mergeService =
      dependencies.mergeService ?? new CatalogMergeService(this.validator);
  }

  async runCategory(
    category: MaterialCategory,
    sources: readonly SourceConfig[],
    options: PipelineOptions,
  ): Promise<CategoryRunResult> {
    logger.info({ category, sources: sources.length }, "Scraping category");

    const accepted: RawProduct[] = [];
    const sourceCounts: CategoryRunResult["sourceCounts"] = [];

    for (const source of sources) {
      const products = await this.collectSource(source, category);
      sourceCounts.push({
        brand: source.brand,
        strategy: source.strategy,
        count: products.length,
      });
      accepted.push(...products);
    }

    logger.info({ category, total: accepted.length }, "Records accepted");

    const converted = await this.convert(accepted, category, options);

    if (options.dryRun) {
      for (const entry of converted.slice(0, DRY_RUN_PREVIEW_COUNT)) {
        logger.info({ brand: entry.brand, name: entry.name }, "Dry run preview");
      }
      logger.info({ category }, "Dry run, catalog not saved");
      return {
        category,
        sourceCounts,
        entries: converted,
        mergeStats: null,
        savedTo: null,
      };
    }

    // Without merge the run still collapses duplicate identities
    const existing = options.merge ? await this.repository.load(category) : [];
    const merged = this.mergeService.merge(converted, existing, category);
    const entries = merged.entries;
    const mergeStats = options.merge ? merged.stats : null;

    const savedTo = await this.repository.save(category, entries);
    return { category, sourceCounts, entries, mergeStats, savedTo };
  }

  /**
   * Extract, classify and validate one source
   */
  private async collectSource(
    source: SourceConfig,
    category: MaterialCategory,
  ): Promise<RawProduct[]> {
    const extracted = await this.registry.extract(source);
    const accepted = extracted
      .map((product) => classify(product, category))
      .filter((product) => this.validator.isValid(product, category));

    logger.info(
      {
        brand: source.brand,
        strategy: source.strategy,
        extracted: extracted.length,
        accepted: accepted.length,
      },
      "Source done",
    );
    return accepted;
  }

  private async convert(
    products: readonly RawProduct[],
    category: MaterialCategory,
    options: PipelineOptions,
  ): Promise<StoredCatalogEntry[]> {
    const entries: StoredCatalogEntry[] = [];
    const fetchImages = options.downloadImages && !options.dryRun;

    for (const product of products) {
      const localImage =
        fetchImages && product.imageUrl
          ? await this.imageDownloader.download({
              imageUrl: product.imageUrl,
              category,
              brand: product.brand,
              name: product.name,
            })
          : null;
      entries.push(toCatalogEntry(product, category, localImage));
    }

    return entries;
  }
}
