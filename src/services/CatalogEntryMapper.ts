/**
 * RawProduct → CatalogEntry conversion
 *
 * Produces the front-end shape: local image path when one was downloaded,
 * remote URL otherwise; color and tags defaulted; profiles from the lookup table.
 */

import type {
  CatalogEntry,
  FilamentEntry,
  ResinEntry,
} from "@/core/domain/CatalogEntry";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import type { RawProduct } from "@/core/domain/RawProduct";
import { COLOR_TABLE } from "@/classifiers/KeywordTables";
import { defaultTypeFor } from "@/classifiers/MaterialClassifier";
import { getFilamentProfiles, getResinProfiles } from "./PrintProfileTable";

export function toResinEntry(
  product: RawProduct,
  localImage: string | null = null,
): ResinEntry {
  const type = product.type ?? defaultTypeFor("resin");
  return {
    brand: product.brand,
    name: product.name,
    image: localImage ?? product.imageUrl ?? null,
    type,
    description: product.description ?? null,
    color: product.colorHex ?? COLOR_TABLE.default.hex,
    colorName: product.colorName ?? COLOR_TABLE.default.name,
    tags: product.tags.length > 0 ? [...product.tags] : [type],
    profiles: getResinProfiles(),
  };
}

export function toFilamentEntry(
  product: RawProduct,
  localImage: string | null = null,
): FilamentEntry {
  const material = product.type ?? defaultTypeFor("filament");
  return {
    brand: product.brand,
    name: product.name,
    material,
    image: localImage ?? product.imageUrl ?? null,
    description: product.description ?? null,
    color: product.colorHex ?? COLOR_TABLE.default.hex,
    colorName: product.colorName ?? COLOR_TABLE.default.name,
    tags: product.tags.length > 0 ? [...product.tags] : [material],
    profiles: getFilamentProfiles(material),
  };
}

export function toCatalogEntry(
  product: RawProduct,
  category: MaterialCategory,
  localImage: string | null = null,
): CatalogEntry {
  return category === "resin"
    ? toResinEntry(product, localImage)
    : toFilamentEntry(product, localImage);
}
