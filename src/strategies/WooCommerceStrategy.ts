/**
 * WooCommerce shop page strategy (cheerio)
 *
 * Standard loop markup: `li.product` cards with
 * `.woocommerce-loop-product__title` titles and a LoopProduct link.
 */

import { PROVENANCE, type RawProduct } from "@/core/domain/RawProduct";
import type { WooCommerceSourceConfig } from "@/core/domain/SourceConfig";
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

const CARD_SELECTORS = [
  ".product",
  "li.product",
  ".type-product",
  ".product_item",
] as const;

const TITLE_FALLBACKS = ["h2", ".product-title"] as const;

export class WooCommerceStrategy
  extends BaseExtractionStrategy<WooCommerceSourceConfig>
  implements IExtractionStrategy<"woocommerce">
{
  readonly strategy = "woocommerce" as const;

  constructor(private readonly http: IHttpClient) {
    super();
  }

  protected async extractFromUrl(
    source: WooCommerceSourceConfig,
    url: string,
  ): Promise<RawProduct[]> {
    const $ = await loadDocument(this.http, url);
    const cards = selectFirstMatching($, CARD_SELECTORS);

    const products: RawProduct[] = [];
    for (const element of cards) {
      const card = $(element);
      const name = findText(card, [source.titleSelector, ...TITLE_FALLBACKS]);
      if (!name) continue;

      let link = card.find("a.woocommerce-LoopProduct-link").first();
      if (link.length === 0) link = card.find("a").first();

      products.push({
        brand: source.brand,
        name,
        imageUrl: findImageUrl(card, "img"),
        productUrl: resolveLink(link.attr("href"), url),
        price: parsePriceText(card.find(".price").first().text()),
        tags: [],
        provenance: PROVENANCE.WOOCOMMERCE_SCRAPE,
      });
    }

    return products;
  }
}
