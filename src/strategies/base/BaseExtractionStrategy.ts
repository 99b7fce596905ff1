/**
 * Base class for URL-driven extraction strategies
 * Template Method Pattern
 *
 * Flow per source:
 * 1. expand `url` into its URL list (configured order)
 * 2. extractFromUrl() for each URL; a failing URL is logged and contributes []
 * 3. concatenate and drop records without a name
 *
 * Subclasses only implement extractFromUrl() and may throw freely inside it.
 * HTTP and browser strategies share this flow.
 */

import { logger } from "@/config/logger";
import { keepNamedProducts, type RawProduct } from "@/core/domain/RawProduct";
import {
  getSourceUrls,
  type UrlSourceConfig,
} from "@/core/domain/SourceConfig";

export abstract class BaseExtractionStrategy<C extends UrlSourceConfig> {
  abstract readonly strategy: C["strategy"];

  /**
   * Extract every URL of the source (Template Method)
   */
  async extract(source: C): Promise<RawProduct[]> {
    const products: RawProduct[] = [];

    for (const url of getSourceUrls(source)) {
      try {
        const batch = await this.extractFromUrl(source, url);
        logger.debug(
          { strategy: this.strategy, brand: source.brand, url, count: batch.length },
          "URL extracted",
        );
        products.push(...batch);
      } catch (error) {
        logger.warn(
          {
            strategy: this.strategy,
            brand: source.brand,
            url,
            error: error instanceof Error ? error.message : String(error),
          },
          "URL extraction failed",
        );
      }
    }

    return keepNamedProducts(products);
  }

  /**
   * Records from one URL; may throw (the caller logs and moves on)
   */
  protected abstract extractFromUrl(source: C, url: string): Promise<RawProduct[]>;
}
