/**
 * Material categories
 * Each category has its own catalog file, keyword tables and blacklist rules.
 */

export const MATERIAL_CATEGORIES = {
  RESIN: "resin",
  FILAMENT: "filament",
} as const;

export type MaterialCategory =
  (typeof MATERIAL_CATEGORIES)[keyof typeof MATERIAL_CATEGORIES];

/**
 * Persisted catalog file per category
 */
export const CATALOG_FILE_NAMES: Record<MaterialCategory, string> = {
  resin: "resins_db.json",
  filament: "filaments_db.json",
};

export function getAllMaterialCategories(): MaterialCategory[] {
  return Object.values(MATERIAL_CATEGORIES);
}
