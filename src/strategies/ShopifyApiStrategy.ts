/**
 * Shopify storefront strategy
 *
 * Reads the public `products.json` listing instead of rendering pages.
 * Collection URLs try the collection listing first and the whole store
 * second; the first endpoint that yields products wins.
 *
 * Type and color are detected here from the storefront keyword table and
 * are authoritative (the classifier keeps them).
 */

import { z } from "zod";
import { EXTRACTION_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { PROVENANCE, type RawProduct } from "@/core/domain/RawProduct";
import type { ShopifySourceConfig } from "@/core/domain/SourceConfig";
import type { IExtractionStrategy } from "@/core/interfaces/IExtractionStrategy";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import { STOREFRONT_TYPE_TABLE } from "@/classifiers/KeywordTables";
import { detectColor, detectType } from "@/classifiers/MaterialClassifier";
import { parsePriceValue } from "@/extractors/common/PriceParser";
import { BaseExtractionStrategy } from "./base/BaseExtractionStrategy";

const ShopifyProductSchema = z.object({
  title: z.string().default(""),
  handle: z.string().default(""),
  product_type: z.string().nullish(),
  body_html: z.string().nullish(),
  images: z.array(z.object({ src: z.string().nullish() })).default([]),
  variants: z
    .array(z.object({ price: z.union([z.string(), z.number()]).nullish() }))
    .default([]),
  tags: z.union([z.array(z.string()), z.string()]).default([]),
});

type ShopifyProduct = z.infer<typeof ShopifyProductSchema>;

const ShopifyListingSchema = z.object({
  products: z.array(z.unknown()).default([]),
});

/**
 * Candidate products.json endpoints for a storefront URL, in try order
 *
 * - collection URL: the collection listing, then the bare store
 * - anything else: the bare store
 */
export function deriveShopifyEndpoints(url: string): string[] {
  const clean = url.replace(/\/+$/, "");
  const suffix = `/products.json?limit=${EXTRACTION_CONFIG.SHOPIFY_PAGE_LIMIT}`;
  const storeRoot = `${new URL(clean).origin}${suffix}`;

  if (!clean.includes("/collections/")) {
    return [storeRoot];
  }

  const collection = `${clean}${suffix}`;
  return collection === storeRoot ? [collection] : [collection, storeRoot];
}

function normalizeTags(tags: ShopifyProduct["tags"]): string[] {
  const list = typeof tags === "string" ? tags.split(",") : tags;
  return list.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}

export class ShopifyApiStrategy
  extends BaseExtractionStrategy<ShopifySourceConfig>
  implements IExtractionStrategy<"shopify">
{
  readonly strategy = "shopify" as const;

  constructor(private readonly http: IHttpClient) {
    super();
  }

  protected async extractFromUrl(
    source: ShopifySourceConfig,
    url: string,
  ): Promise<RawProduct[]> {
    const productBase = url.replace(/\/+$/, "").split("/collections")[0];

    for (const endpoint of deriveShopifyEndpoints(url)) {
      const products = await this.fetchListing(endpoint);
      if (products.length === 0) continue;

      logger.debug(
        { brand: source.brand, endpoint, count: products.length },
        "Shopify listing found",
      );
      return products.map((product) =>
        this.toRawProduct(product, source.brand, productBase),
      );
    }

    return [];
  }

  /**
   * Products of one endpoint; any failure counts as an empty listing
   */
  private async fetchListing(endpoint: string): Promise<ShopifyProduct[]> {
    try {
      const body = ShopifyListingSchema.parse(await this.http.getJson(endpoint));
      return body.products.flatMap((item) => {
        const parsed = ShopifyProductSchema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      });
    } catch (error) {
      logger.debug(
        {
          endpoint,
          error: error instanceof Error ? error.message : String(error),
        },
        "Shopify endpoint unusable, trying next",
      );
      return [];
    }
  }

  private toRawProduct(
    product: ShopifyProduct,
    brand: string,
    productBase: string,
  ): RawProduct {
    const type = detectType(
      `${product.title} ${product.product_type ?? ""}`,
      STOREFRONT_TYPE_TABLE,
    );
    const color = detectColor(product.title);
    const tags = normalizeTags(product.tags).slice(
      0,
      EXTRACTION_CONFIG.SHOPIFY_MAX_TAGS,
    );

    return {
      brand,
      name: product.title,
      imageUrl: product.images[0]?.src ?? undefined,
      productUrl: `${productBase}/products/${product.handle}`,
      price: parsePriceValue(product.variants[0]?.price),
      type,
      colorHex: color.hex,
      colorName: color.name,
      tags: tags.length > 0 ? tags : [type],
      description: product.body_html
        ? product.body_html.slice(0, EXTRACTION_CONFIG.DESCRIPTION_MAX_LENGTH)
        : undefined,
      provenance: PROVENANCE.SHOPIFY_API,
    };
  }
}
