/**
 * Extraction strategy interface
 * Strategy Pattern: one implementation per SourceConfig variant
 *
 * Contract:
 * - extract() never rejects; failures are logged and reduce to []
 * - every returned record has a non-empty name
 */

import type { RawProduct } from "@/core/domain/RawProduct";
import type {
  SourceConfigFor,
  SourceStrategy,
} from "@/core/domain/SourceConfig";

export interface IExtractionStrategy<K extends SourceStrategy = SourceStrategy> {
  readonly strategy: K;

  extract(source: SourceConfigFor<K>): Promise<RawProduct[]>;
}
