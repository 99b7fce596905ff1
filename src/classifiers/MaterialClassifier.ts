/**
 * Material classifier
 *
 * Fills a missing material type and color from keyword tables.
 * Values already on the record are kept as they are (the Shopify strategy
 * detects inline and its values are authoritative).
 */

import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import type { RawProduct } from "@/core/domain/RawProduct";
import {
  COLOR_TABLE,
  TYPE_TABLES,
  type ColorTable,
  type DetectedColor,
  type TypeTable,
} from "./KeywordTables";

/**
 * First label whose keyword occurs in the text, table default otherwise
 */
export function detectType(text: string, table: TypeTable): string {
  const haystack = text.toLowerCase();
  for (const rule of table.rules) {
    if (rule.keywords.some((keyword) => haystack.includes(keyword))) {
      return rule.label;
    }
  }
  return table.defaultLabel;
}

export function detectColor(
  text: string,
  table: ColorTable = COLOR_TABLE,
): DetectedColor {
  const haystack = text.toLowerCase();
  const rule = table.rules.find((candidate) => haystack.includes(candidate.keyword));
  return rule ? { hex: rule.hex, name: rule.name } : table.default;
}

export function defaultTypeFor(category: MaterialCategory): string {
  return TYPE_TABLES[category].defaultLabel;
}

/**
 * Returns a new record with type and color filled where absent
 */
export function classify(
  product: RawProduct,
  category: MaterialCategory,
): RawProduct {
  const type = product.type ?? detectType(product.name, TYPE_TABLES[category]);

  const needsColor =
    product.colorHex === undefined || product.colorName === undefined;
  const detected = needsColor ? detectColor(product.name) : null;

  return {
    ...product,
    type,
    colorHex: product.colorHex ?? detected?.hex,
    colorName: product.colorName ?? detected?.name,
  };
}
