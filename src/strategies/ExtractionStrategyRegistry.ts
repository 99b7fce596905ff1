/**
 * Extraction strategy registry
 * Registry + Strategy Pattern
 *
 * Dispatches a SourceConfig to the strategy registered for its `strategy`
 * tag, then applies the source's keyword filter.
 * The map is keyed by the tag, so a missing strategy is a compile error.
 */

import { logger } from "@/config/logger";
import type { RawProduct } from "@/core/domain/RawProduct";
import type {
  SourceConfig,
  SourceStrategy,
} from "@/core/domain/SourceConfig";
import type { IBrowserLauncher } from "@/core/interfaces/IBrowserSession";
import type { IExtractionStrategy } from "@/core/interfaces/IExtractionStrategy";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import { HtmlStrategy } from "./HtmlStrategy";
import { JsonApiStrategy } from "./JsonApiStrategy";
import { JsRenderedStrategy } from "./JsRenderedStrategy";
import { ManualStrategy } from "./ManualStrategy";
import { ShopifyApiStrategy } from "./ShopifyApiStrategy";
import { WooCommerceStrategy } from "./WooCommerceStrategy";

export type StrategyMap = {
  readonly [K in SourceStrategy]: IExtractionStrategy<K>;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled source strategy: ${JSON.stringify(value)}`);
}

/**
 * Records whose name or product URL contains the keyword (case-insensitive)
 */
export function applyKeywordFilter(
  products: readonly RawProduct[],
  keyword: string | undefined,
): RawProduct[] {
  if (!keyword) return [...products];
  const needle = keyword.toLowerCase();
  return products.filter(
    (product) =>
      product.name.toLowerCase().includes(needle) ||
      (product.productUrl?.toLowerCase().includes(needle) ?? false),
  );
}

export class ExtractionStrategyRegistry {
  constructor(private readonly strategies: StrategyMap) {}

  /**
   * Default wiring: HTTP strategies on one client, JS strategy on one launcher
   */
  static create(
    http: IHttpClient,
    launcher: IBrowserLauncher,
  ): ExtractionStrategyRegistry {
    return new ExtractionStrategyRegistry({
      shopify: new ShopifyApiStrategy(http),
      html: new HtmlStrategy(http),
      json: new JsonApiStrategy(http),
      woocommerce: new WooCommerceStrategy(http),
      js: new JsRenderedStrategy(launcher),
      manual: new ManualStrategy(),
    });
  }

  /**
   * Extract one source; never rejects
   */
  async extract(source: SourceConfig): Promise<RawProduct[]> {
    let products: RawProduct[];
    try {
      products = await this.dispatch(source);
    } catch (error) {
      logger.warn(
        {
          brand: source.brand,
          strategy: source.strategy,
          error: error instanceof Error ? error.message : String(error),
        },
        "Source extraction failed",
      );
      return [];
    }

    if (!source.filter) return products;

    const filtered = applyKeywordFilter(products, source.filter);
    logger.info(
      {
        brand: source.brand,
        filter: source.filter,
        before: products.length,
        after: filtered.length,
      },
      "Keyword filter applied",
    );
    return filtered;
  }

  private dispatch(source: SourceConfig): Promise<RawProduct[]> {
    switch (source.strategy) {
      case "shopify":
        return this.strategies.shopify.extract(source);
      case "html":
        return this.strategies.html.extract(source);
      case "json":
        return this.strategies.json.extract(source);
      case "woocommerce":
        return this.strategies.woocommerce.extract(source);
      case "js":
        return this.strategies.js.extract(source);
      case "manual":
        return this.strategies.manual.extract(source);
      default:
        return assertNever(source);
    }
  }
}
