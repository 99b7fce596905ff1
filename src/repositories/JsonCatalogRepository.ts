/**
 * JSON file catalog repository
 *
 * One file per category under the output directory:
 * resins_db.json / filaments_db.json, UTF-8, 4-space indentation.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { PATH_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import {
  StoredCatalogEntrySchema,
  type StoredCatalogEntry,
} from "@/core/domain/CatalogEntry";
import {
  CATALOG_FILE_NAMES,
  type MaterialCategory,
} from "@/core/domain/MaterialCategory";
import type { ICatalogRepository } from "@/core/interfaces/ICatalogRepository";

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export class JsonCatalogRepository implements ICatalogRepository {
  constructor(
    private readonly outputDir: string = PATH_CONFIG.CATALOG_OUTPUT_DIR,
  ) {}

  getFilePath(category: MaterialCategory): string {
    return path.join(this.outputDir, CATALOG_FILE_NAMES[category]);
  }

  async load(category: MaterialCategory): Promise<StoredCatalogEntry[]> {
    const filePath = this.getFilePath(category);

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn(
          {
            filePath,
            error: error instanceof Error ? error.message : String(error),
          },
          "Catalog unreadable, starting empty",
        );
      }
      return [];
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      logger.warn(
        {
          filePath,
          error: error instanceof Error ? error.message : String(error),
        },
        "Catalog is not valid JSON, starting empty",
      );
      return [];
    }

    if (!Array.isArray(document)) {
      logger.warn({ filePath }, "Catalog is not a list, starting empty");
      return [];
    }

    const entries: StoredCatalogEntry[] = [];
    document.forEach((item: unknown, index) => {
      const parsed = StoredCatalogEntrySchema.safeParse(item);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        logger.warn({ filePath, index }, "Catalog entry without identity skipped");
      }
    });
    return entries;
  }

  async save(
    category: MaterialCategory,
    entries: readonly StoredCatalogEntry[],
  ): Promise<string> {
    const filePath = this.getFilePath(category);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entries, null, 4), "utf-8");

    logger.info({ filePath, count: entries.length }, "Catalog saved");
    return filePath;
  }
}
