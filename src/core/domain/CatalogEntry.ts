/**
 * CatalogEntry - persisted front-end record
 *
 * resins_db.json holds ResinEntry, filaments_db.json holds FilamentEntry.
 * Entries read back from disk are parsed as StoredCatalogEntry, which only
 * requires the identity fields; every other key is kept as read, whatever
 * its shape, and consumers narrow it where they use it.
 */

import { z } from "zod";

/**
 * SLA exposure settings for one printer
 */
export type ResinProfile = {
  layerHeight: number;
  bottomLayerCount: number;
  exposureTime: number;
  bottomExposure: number;
  liftDistance1: number;
  liftSpeed1: number;
  retractSpeed1: number;
};

/**
 * FDM temperature/retraction settings for one preset
 */
export type FilamentProfile = {
  printTemp: number;
  bedTemp: number;
  fanSpeed: number;
  retractionDistance: number;
  retractionSpeed: number;
};

type CatalogEntryBase = {
  brand: string;
  name: string;
  image: string | null;
  description: string | null;
  color: string;
  colorName: string;
  tags: string[];
};

export type ResinEntry = CatalogEntryBase & {
  type: string;
  profiles: Record<string, ResinProfile>;
};

export type FilamentEntry = CatalogEntryBase & {
  material: string;
  profiles: Record<string, FilamentProfile>;
};

export type CatalogEntry = ResinEntry | FilamentEntry;

export const StoredCatalogEntrySchema = z
  .object({
    brand: z.string(),
    name: z.string(),
  })
  .passthrough();

export type StoredCatalogEntry = z.infer<typeof StoredCatalogEntrySchema>;

/**
 * Case-insensitive (brand, name) identity key
 */
export function identityKey(entry: { brand: string; name: string }): string {
  return `${entry.brand.toLowerCase()}\u0000${entry.name.toLowerCase()}`;
}
