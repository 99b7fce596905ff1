/**
 * Generic HTML listing strategy (cheerio)
 *
 * Configured selectors first, then common storefront markup as fallback.
 */

import { PROVENANCE, type RawProduct } from "@/core/domain/RawProduct";
import type { HtmlSourceConfig } from "@/core/domain/SourceConfig";
import type { IExtractionStrategy } from "@/core/interfaces/IExtractionStrategy";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import {
  findImageUrl,
  loadDocument,
  findText,
  resolveLink,
  selectFirstMatching,
} from "@/extractors/common/HtmlHelper";
import { parsePriceText } from "@/extractors/common/PriceParser";
import { BaseExtractionStrategy } from "./base/BaseExtractionStrategy";

const CARD_FALLBACKS = [
  ".product",
  ".product-item",
  ".product-tile",
  "[data-product]",
  ".grid-item",
  ".collection-product",
] as const;

const NAME_FALLBACKS = [
  "h2",
  "h3",
  "h4",
  ".title",
  ".name",
  "[data-product-title]",
] as const;

export class HtmlStrategy
  extends BaseExtractionStrategy<HtmlSourceConfig>
  implements IExtractionStrategy<"html">
{
  readonly strategy = "html" as const;

  constructor(private readonly http: IHttpClient) {
    super();
  }

  protected async extractFromUrl(
    source: HtmlSourceConfig,
    url: string,
  ): Promise<RawProduct[]> {
    const $ = await loadDocument(this.http, url);
    const { selectors } = source;
    const cards = selectFirstMatching($, [selectors.card, ...CARD_FALLBACKS]);

    const products: RawProduct[] = [];
    for (const element of cards) {
      const card = $(element);
      const name = findText(card, [selectors.name, ...NAME_FALLBACKS]);
      if (!name) continue;

      products.push({
        brand: source.brand,
        name,
        imageUrl: findImageUrl(card, selectors.image),
        productUrl: resolveLink(card.find(selectors.link).first().attr("href"), url),
        price: parsePriceText(card.find(selectors.price).first().text()),
        tags: [],
        provenance: PROVENANCE.HTML_SCRAPE,
      });
    }

    return products;
  }
}
