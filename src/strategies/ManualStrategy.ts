/**
 * Manual-curated strategy
 *
 * For brands whose sites cannot be scraped: product names are listed in the
 * source config and emitted as records without any network access.
 */

import { EXTRACTION_CONFIG } from "@/config/constants";
import {
  keepNamedProducts,
  PROVENANCE,
  type RawProduct,
} from "@/core/domain/RawProduct";
import type { ManualSourceConfig } from "@/core/domain/SourceConfig";
import type { IExtractionStrategy } from "@/core/interfaces/IExtractionStrategy";

export const MANUAL_PRODUCT_TYPE = "Standard";

export class ManualStrategy implements IExtractionStrategy<"manual"> {
  readonly strategy = "manual" as const;

  async extract(source: ManualSourceConfig): Promise<RawProduct[]> {
    const imageUrl = source.defaultImage ?? EXTRACTION_CONFIG.MANUAL_DEFAULT_IMAGE;

    return keepNamedProducts(
      source.products.map((name) => ({
        brand: source.brand,
        name: name.trim(),
        imageUrl,
        type: MANUAL_PRODUCT_TYPE,
        tags: [],
        provenance: PROVENANCE.MANUAL_CURATED,
      })),
    );
  }
}
