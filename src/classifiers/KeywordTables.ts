/**
 * Keyword tables for type and color detection
 *
 * Loaded from src/data/*.json and validated once at import.
 * Rules are ordered lists: the first rule with a matching keyword wins,
 * so more specific keywords ("pla+") must be declared before generic ones ("pla").
 */

import { z } from "zod";
import typeKeywordData from "@/data/type-keywords.json";
import colorKeywordData from "@/data/color-keywords.json";

const TypeTableSchema = z.object({
  defaultLabel: z.string().min(1),
  rules: z.array(
    z.object({
      keywords: z.array(z.string().min(1)).nonempty(),
      label: z.string().min(1),
    }),
  ),
});

const TypeTablesSchema = z.object({
  resin: TypeTableSchema,
  filament: TypeTableSchema,
  /** combined table used inline by the Shopify strategy */
  storefront: TypeTableSchema,
});

const ColorSchema = z.object({
  hex: z.string().regex(/^#[0-9a-f]{6}$/i),
  name: z.string().min(1),
});

const ColorTableSchema = z.object({
  default: ColorSchema,
  rules: z.array(ColorSchema.extend({ keyword: z.string().min(1) })),
});

export type TypeTable = z.infer<typeof TypeTableSchema>;
export type DetectedColor = z.infer<typeof ColorSchema>;
export type ColorTable = z.infer<typeof ColorTableSchema>;

export const TYPE_TABLES = TypeTablesSchema.parse(typeKeywordData);
export const COLOR_TABLE = ColorTableSchema.parse(colorKeywordData);

/**
 * Combined filament + resin table applied to storefront titles
 */
export const STOREFRONT_TYPE_TABLE: TypeTable = TYPE_TABLES.storefront;
