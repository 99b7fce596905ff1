/**
 * Blacklist validator
 *
 * Decides whether a record belongs in a category's catalog.
 * Pattern lists come from src/data/blacklists.json and are compiled once
 * as case-insensitive regular expressions (substring search unless the
 * pattern itself carries \b boundaries).
 *
 * Rules by target category:
 * - resin:    filament, hardware and spam patterns on name + tags;
 *             a standalone "abs" in the name unless the name also has "like"
 * - filament: hardware and resin patterns on the name only;
 *             spam patterns on name + tags
 *
 * Pure: no I/O, same verdict for the same input.
 */

import { z } from "zod";
import blacklistData from "@/data/blacklists.json";
import { logger } from "@/config/logger";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import {
  ACCEPTED,
  type BlacklistName,
  type ValidationVerdict,
} from "@/core/domain/ValidationVerdict";

const BlacklistFileSchema = z.object({
  filament: z.array(z.string().min(1)),
  hardware: z.array(z.string().min(1)),
  spam: z.array(z.string().min(1)),
  resin: z.array(z.string().min(1)),
});

type PatternListName = Exclude<BlacklistName, "abs">;

export type Blacklists = Record<PatternListName, readonly RegExp[]>;

/**
 * Anything carrying a name and optional tags (raw records and stored entries);
 * stored tags are untyped, only string items are read
 */
export interface Validatable {
  name: string;
  tags?: unknown;
}

function readTags(tags: unknown): string[] {
  if (!Array.isArray(tags)) return [];
  return tags.filter((tag): tag is string => typeof tag === "string");
}

const ABS_TOKEN = /\babs\b/;

/**
 * One check: which list, and whether it sees the tags
 */
interface RuleStep {
  list: PatternListName;
  scope: "name" | "nameAndTags";
}

const RULES: Record<MaterialCategory, readonly RuleStep[]> = {
  resin: [
    { list: "filament", scope: "nameAndTags" },
    { list: "hardware", scope: "nameAndTags" },
    { list: "spam", scope: "nameAndTags" },
  ],
  filament: [
    { list: "hardware", scope: "name" },
    { list: "resin", scope: "name" },
    { list: "spam", scope: "nameAndTags" },
  ],
};

export function compileBlacklists(source: unknown): Blacklists {
  const parsed = BlacklistFileSchema.parse(source);
  const compile = (patterns: string[]): RegExp[] =>
    patterns.map((pattern) => new RegExp(pattern, "i"));

  return {
    filament: compile(parsed.filament),
    hardware: compile(parsed.hardware),
    spam: compile(parsed.spam),
    resin: compile(parsed.resin),
  };
}

export class BlacklistValidator {
  constructor(
    private readonly blacklists: Blacklists = compileBlacklists(blacklistData),
  ) {}

  validate(product: Validatable, category: MaterialCategory): ValidationVerdict {
    const name = product.name.toLowerCase();
    const nameAndTags = [name, ...readTags(product.tags).map((tag) => tag.toLowerCase())].join(" ");

    for (const step of RULES[category]) {
      const text = step.scope === "name" ? name : nameAndTags;
      const hit = this.blacklists[step.list].find((pattern) => pattern.test(text));
      if (hit) {
        return this.reject(product, category, step.list, hit.source);
      }
    }

    if (category === "resin" && ABS_TOKEN.test(name) && !name.includes("like")) {
      return this.reject(product, category, "abs", ABS_TOKEN.source);
    }

    return ACCEPTED;
  }

  isValid(product: Validatable, category: MaterialCategory): boolean {
    return this.validate(product, category).accepted;
  }

  private reject(
    product: Validatable,
    category: MaterialCategory,
    list: BlacklistName,
    pattern: string,
  ): ValidationVerdict {
    logger.debug(
      { name: product.name, category, list, pattern },
      "Rejected by blacklist",
    );
    return { accepted: false, list, pattern };
  }
}
