/**
 * JSON API strategy
 *
 * For sites exposing their catalog as JSON. `dataPath` walks to the product
 * list; field names are tried from the configured key down to common aliases.
 */

import { PROVENANCE, type RawProduct } from "@/core/domain/RawProduct";
import type { JsonSourceConfig } from "@/core/domain/SourceConfig";
import type { IExtractionStrategy } from "@/core/interfaces/IExtractionStrategy";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import { normalizeImageUrl } from "@/extractors/common/HtmlHelper";
import {
  descendPath,
  isEmptyValue,
  isJsonObject,
  toItemList,
  type JsonObject,
} from "@/extractors/common/JsonPath";
import { parsePriceValue } from "@/extractors/common/PriceParser";
import { BaseExtractionStrategy } from "./base/BaseExtractionStrategy";

const NAME_ALIASES = ["name", "title", "product_name", "nombre"] as const;
const IMAGE_ALIASES = ["image", "image_url", "img", "thumbnail", "imagen"] as const;
const PRICE_ALIASES = ["price", "precio", "cost"] as const;

/**
 * Value of the first key whose value is non-empty
 */
function firstPresent(item: JsonObject, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (!isEmptyValue(item[key])) return item[key];
  }
  return undefined;
}

function imageFromValue(value: unknown): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first === "string") return first ? normalizeImageUrl(first) : undefined;
  if (isJsonObject(first)) {
    const nested = first.src || first.url;
    return typeof nested === "string" && nested ? normalizeImageUrl(nested) : undefined;
  }
  return undefined;
}

export class JsonApiStrategy
  extends BaseExtractionStrategy<JsonSourceConfig>
  implements IExtractionStrategy<"json">
{
  readonly strategy = "json" as const;

  constructor(private readonly http: IHttpClient) {
    super();
  }

  protected async extractFromUrl(
    source: JsonSourceConfig,
    url: string,
  ): Promise<RawProduct[]> {
    const body = await this.http.getJson(url);
    const items = toItemList(descendPath(body, source.dataPath));

    return items.flatMap((item) => {
      if (!isJsonObject(item)) return [];
      const product = this.toRawProduct(item, source);
      return product ? [product] : [];
    });
  }

  private toRawProduct(
    item: JsonObject,
    source: JsonSourceConfig,
  ): RawProduct | null {
    const name = firstPresent(item, [source.nameKey, ...NAME_ALIASES]);
    if (name === undefined) return null;

    return {
      brand: source.brand,
      name: String(name),
      imageUrl: imageFromValue(firstPresent(item, [source.imageKey, ...IMAGE_ALIASES])),
      price: parsePriceValue(firstPresent(item, [source.priceKey, ...PRICE_ALIASES])),
      tags: [],
      provenance: PROVENANCE.JSON_API,
    };
  }
}
