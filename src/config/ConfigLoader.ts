/**
 * YAML source list loader
 * Singleton Pattern
 *
 * Reads `sources/<category>s.yaml`, validates every entry with zod and
 * caches the result per category.
 * An invalid entry is logged and skipped; a missing or malformed file
 * raises ConfigValidationError.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import {
  SourceConfigSchema,
  type SourceConfig,
} from "@/core/domain/SourceConfig";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly file: string,
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

const SOURCE_FILE_NAMES: Record<MaterialCategory, string> = {
  resin: "resins.yaml",
  filament: "filaments.yaml",
};

export class ConfigLoader {
  private static instance: ConfigLoader;
  private sourceCache: Map<MaterialCategory, SourceConfig[]> = new Map();

  constructor(
    private readonly sourcesDir: string = path.join(
      __dirname,
      PATH_CONFIG.SOURCES_DIR,
    ),
  ) {}

  /**
   * Shared instance on the bundled source lists
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * Valid sources of a category, in file order
   */
  loadSources(category: MaterialCategory): SourceConfig[] {
    const cached = this.sourceCache.get(category);
    if (cached) return cached;

    const file = path.join(this.sourcesDir, SOURCE_FILE_NAMES[category]);
    const entries = this.readEntries(file);

    const sources: SourceConfig[] = [];
    entries.forEach((entry, index) => {
      const parsed = SourceConfigSchema.safeParse(entry);
      if (parsed.success) {
        sources.push(parsed.data);
        return;
      }
      logger.warn(
        {
          file,
          index,
          issues: parsed.error.issues.map(
            (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
          ),
        },
        "Invalid source entry skipped",
      );
    });

    logger.debug(
      { category, loaded: sources.length, skipped: entries.length - sources.length },
      "Sources loaded",
    );
    this.sourceCache.set(category, sources);
    return sources;
  }

  /**
   * Drop cached lists (tests)
   */
  clearCache(): void {
    this.sourceCache.clear();
  }

  private readEntries(file: string): unknown[] {
    if (!fs.existsSync(file)) {
      throw new ConfigValidationError(`Source file not found: ${file}`, file);
    }

    let document: unknown;
    try {
      document = yaml.load(fs.readFileSync(file, "utf8"));
    } catch (error) {
      throw new ConfigValidationError(
        `Source file is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
        file,
      );
    }

    if (document === undefined || document === null) return [];
    if (!Array.isArray(document)) {
      throw new ConfigValidationError(
        "Source file must contain a list of sources",
        file,
      );
    }
    return document;
  }
}
