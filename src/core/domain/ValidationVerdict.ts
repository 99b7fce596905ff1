/**
 * Blacklist verdict (diagnostics only, never persisted)
 */

export type BlacklistName = "filament" | "hardware" | "spam" | "resin" | "abs";

export type ValidationVerdict =
  | { readonly accepted: true }
  | {
      readonly accepted: false;
      readonly list: BlacklistName;
      readonly pattern: string;
    };

export const ACCEPTED: ValidationVerdict = { accepted: true };
