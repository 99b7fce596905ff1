/**
 * Catalog merge service
 *
 * Reconciles freshly scraped entries with the persisted catalog:
 * 1. match by case-insensitive (brand, name)
 * 2. on match, refresh volatile fields only (profiles, params, and image,
 *    description, tags when the incoming value is present); on no match, append
 * 3. re-validate the whole result so blacklist changes also clean old entries
 *
 * The prior catalog is an explicit input and the merged catalog an explicit
 * output: this service never touches the file system.
 */

import { logger } from "@/config/logger";
import {
  identityKey,
  type StoredCatalogEntry,
} from "@/core/domain/CatalogEntry";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import { BlacklistValidator } from "@/validators/BlacklistValidator";

export interface MergeStats {
  added: number;
  updated: number;
  removed: number;
  total: number;
}

export interface MergeResult {
  entries: StoredCatalogEntry[];
  stats: MergeStats;
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

export class CatalogMergeService {
  constructor(
    private readonly validator: BlacklistValidator = new BlacklistValidator(),
  ) {}

  merge(
    incoming: readonly StoredCatalogEntry[],
    existing: readonly StoredCatalogEntry[],
    category: MaterialCategory,
  ): MergeResult {
    const merged: StoredCatalogEntry[] = [...existing];
    const positions = new Map<string, number>();
    merged.forEach((entry, index) => {
      const key = identityKey(entry);
      if (!positions.has(key)) positions.set(key, index);
    });

    let added = 0;
    let updated = 0;

    for (const entry of incoming) {
      const key = identityKey(entry);
      const index = positions.get(key);

      if (index === undefined) {
        positions.set(key, merged.length);
        merged.push(entry);
        added++;
        continue;
      }

      merged[index] = this.refresh(merged[index], entry);
      updated++;
    }

    const entries = merged.filter((entry) =>
      this.validator.isValid(entry, category),
    );
    const stats: MergeStats = {
      added,
      updated,
      removed: merged.length - entries.length,
      total: entries.length,
    };

    if (stats.removed > 0) {
      logger.info(
        { category, removed: stats.removed },
        "Removed blacklisted entries from catalog",
      );
    }
    logger.info({ category, ...stats }, "Catalog merged");

    return { entries, stats };
  }

  /**
   * New object with the volatile fields taken from the incoming entry
   */
  private refresh(
    current: StoredCatalogEntry,
    incoming: StoredCatalogEntry,
  ): StoredCatalogEntry {
    return {
      ...current,
      ...(incoming.profiles !== undefined && { profiles: incoming.profiles }),
      ...(incoming.params !== undefined && { params: incoming.params }),
      ...(isPresent(incoming.image) && { image: incoming.image }),
      ...(isPresent(incoming.description) && {
        description: incoming.description,
      }),
      ...(isPresent(incoming.tags) && { tags: incoming.tags }),
    };
  }
}
