/**
 * Catalog persistence contract
 *
 * load() never throws: a missing or unreadable catalog is an empty catalog.
 */

import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import type { StoredCatalogEntry } from "@/core/domain/CatalogEntry";

export interface ICatalogRepository {
  load(category: MaterialCategory): Promise<StoredCatalogEntry[]>;

  /**
   * Write the catalog and return the file path
   */
  save(
    category: MaterialCategory,
    entries: readonly StoredCatalogEntry[],
  ): Promise<string>;
}
