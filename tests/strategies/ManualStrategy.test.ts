/**
 * ManualStrategy Test
 */

import { describe, it, expect } from "@jest/globals";
import { ManualStrategy } from "@/strategies/ManualStrategy";
import { ManualSourceSchema } from "@/core/domain/SourceConfig";
import { EXTRACTION_CONFIG } from "@/config/constants";

describe("ManualStrategy", () => {
  const strategy = new ManualStrategy();

  it("emits one curated record per listed name", async () => {
    const source = ManualSourceSchema.parse({
      brand: "Curated",
      strategy: "manual",
      products: ["  Standard Grey  ", "Water Washable Clear"],
      defaultImage: "https://cdn.example.com/default.png",
    });

    const products = await strategy.extract(source);

    expect(products).toEqual([
      {
        brand: "Curated",
        name: "Standard Grey",
        imageUrl: "https://cdn.example.com/default.png",
        type: "Standard",
        tags: [],
        provenance: "manual_curated",
      },
      {
        brand: "Curated",
        name: "Water Washable Clear",
        imageUrl: "https://cdn.example.com/default.png",
        type: "Standard",
        tags: [],
        provenance: "manual_curated",
      },
    ]);
  });

  it("uses the placeholder image and drops blank names", async () => {
    const source = ManualSourceSchema.parse({
      brand: "Curated",
      strategy: "manual",
      products: ["   ", "Dental Model"],
    });

    const products = await strategy.extract(source);

    expect(products).toHaveLength(1);
    expect(products[0].imageUrl).toBe(EXTRACTION_CONFIG.MANUAL_DEFAULT_IMAGE);
  });
});
