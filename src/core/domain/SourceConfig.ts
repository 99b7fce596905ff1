/**
 * SourceConfig - YAML source list schema
 *
 * One entry per scraping unit, discriminated by `strategy`.
 * Every entry is validated with zod when the list is loaded.
 */

import { z } from "zod";

const UrlListSchema = z.union([
  z.string().url(),
  z.array(z.string().url()).nonempty(),
]);

const BaseSourceSchema = z.object({
  brand: z.string().min(1),
  /** keep only records whose name or URL contains this keyword */
  filter: z.string().min(1).optional(),
  lastVerified: z.string().optional(),
});

export const ShopifySourceSchema = BaseSourceSchema.extend({
  strategy: z.literal("shopify"),
  url: UrlListSchema,
});

export const HtmlSourceSchema = BaseSourceSchema.extend({
  strategy: z.literal("html"),
  url: UrlListSchema,
  selectors: z
    .object({
      card: z.string().default(".product-card"),
      name: z.string().default(".product-title"),
      image: z.string().default("img"),
      price: z.string().default(".price"),
      link: z.string().default("a"),
    })
    .default({}),
});

export const JsonSourceSchema = BaseSourceSchema.extend({
  strategy: z.literal("json"),
  url: UrlListSchema,
  dataPath: z.array(z.union([z.string(), z.number().int().nonnegative()])).default([]),
  nameKey: z.string().default("name"),
  imageKey: z.string().default("image"),
  priceKey: z.string().default("price"),
});

export const WooCommerceSourceSchema = BaseSourceSchema.extend({
  strategy: z.literal("woocommerce"),
  url: UrlListSchema,
  titleSelector: z.string().default(".woocommerce-loop-product__title"),
});

/**
 * Background XHR interception for listings populated after page load
 */
export const InterceptConfigSchema = z.object({
  /** substring a response URL must contain */
  urlPattern: z.string().min(1),
  /** keys to descend into the response body */
  dataPath: z.array(z.string()).default(["data"]),
  /** paginated payloads wrap the list in this key */
  rowsKey: z.string().default("rows"),
  /** product page URL, `{slug}` is replaced with the item's slug */
  productUrlTemplate: z.string().min(1),
});

export const JsSourceSchema = BaseSourceSchema.extend({
  strategy: z.literal("js"),
  url: UrlListSchema,
  cardSelector: z.string().default("article, div.product, .product-card"),
  waitTimeMs: z.number().int().nonnegative().optional(),
  intercept: InterceptConfigSchema.optional(),
});

export const ManualSourceSchema = BaseSourceSchema.extend({
  strategy: z.literal("manual"),
  products: z.array(z.string()).nonempty(),
  defaultImage: z.string().url().optional(),
});

export const SourceConfigSchema = z.discriminatedUnion("strategy", [
  ShopifySourceSchema,
  HtmlSourceSchema,
  JsonSourceSchema,
  WooCommerceSourceSchema,
  JsSourceSchema,
  ManualSourceSchema,
]);

export type ShopifySourceConfig = z.infer<typeof ShopifySourceSchema>;
export type HtmlSourceConfig = z.infer<typeof HtmlSourceSchema>;
export type JsonSourceConfig = z.infer<typeof JsonSourceSchema>;
export type WooCommerceSourceConfig = z.infer<typeof WooCommerceSourceSchema>;
export type InterceptConfig = z.infer<typeof InterceptConfigSchema>;
export type JsSourceConfig = z.infer<typeof JsSourceSchema>;
export type ManualSourceConfig = z.infer<typeof ManualSourceSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;

export type SourceStrategy = SourceConfig["strategy"];

/**
 * Sources that fetch one or more URLs
 */
export type UrlSourceConfig = Exclude<SourceConfig, ManualSourceConfig>;

/**
 * Source config narrowed to one strategy
 */
export type SourceConfigFor<K extends SourceStrategy> = Extract<
  SourceConfig,
  { strategy: K }
>;

/**
 * `url` as a list, in configured order
 */
export function getSourceUrls(source: UrlSourceConfig): string[] {
  return typeof source.url === "string" ? [source.url] : [...source.url];
}
