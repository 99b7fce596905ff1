/**
 * RawProduct
 * Strategy output before classification, validation and conversion.
 */

/**
 * Which extraction path produced a record
 */
export const PROVENANCE = {
  SHOPIFY_API: "shopify_api",
  HTML_SCRAPE: "html_scrape",
  JSON_API: "json_api",
  WOOCOMMERCE_SCRAPE: "woocommerce_scrape",
  PLAYWRIGHT_INTERCEPT: "playwright_intercept",
  PLAYWRIGHT_JS: "playwright_js",
  MANUAL_CURATED: "manual_curated",
} as const;

export type Provenance = (typeof PROVENANCE)[keyof typeof PROVENANCE];

export interface RawProduct {
  readonly brand: string;
  readonly name: string;
  readonly imageUrl?: string;
  readonly productUrl?: string;
  readonly price?: number;
  readonly type?: string;
  readonly colorHex?: string;
  readonly colorName?: string;
  readonly tags: readonly string[];
  readonly description?: string;
  readonly provenance: Provenance;
}

/**
 * Records with an empty or whitespace-only name never leave a strategy
 */
export function keepNamedProducts(products: readonly RawProduct[]): RawProduct[] {
  return products.filter((product) => product.name.trim().length > 0);
}
