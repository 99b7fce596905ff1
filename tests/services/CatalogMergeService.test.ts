/**
 * CatalogMergeService Test
 */

import { describe, it, expect } from "@jest/globals";
import { CatalogMergeService } from "@/services/CatalogMergeService";
import type { StoredCatalogEntry } from "@/core/domain/CatalogEntry";

describe("CatalogMergeService", () => {
  const service = new CatalogMergeService();

  const existing: StoredCatalogEntry[] = [
    {
      brand: "Anycubic",
      name: "Tough Resin",
      image: "images/resins/old.png",
      description: "old text",
      tags: ["Tough"],
      profiles: { Default: { exposureTime: 2 } },
      rating: 4,
    },
    { brand: "Elegoo", name: "Standard Grey", tags: ["Standard"] },
  ];

  it("refreshes matches case-insensitively and appends new entries", () => {
    const incoming: StoredCatalogEntry[] = [
      {
        brand: "ANYCUBIC",
        name: "tough resin",
        image: null,
        description: "new text",
        tags: [],
        profiles: { Default: { exposureTime: 3 } },
      },
      { brand: "Siraya Tech", name: "Blu", tags: ["Standard"] },
    ];

    const { entries, stats } = service.merge(incoming, existing, "resin");

    expect(entries).toEqual([
      {
        brand: "Anycubic",
        name: "Tough Resin",
        image: "images/resins/old.png",
        description: "new text",
        tags: ["Tough"],
        profiles: { Default: { exposureTime: 3 } },
        rating: 4,
      },
      { brand: "Elegoo", name: "Standard Grey", tags: ["Standard"] },
      { brand: "Siraya Tech", name: "Blu", tags: ["Standard"] },
    ]);
    expect(stats).toEqual({ added: 1, updated: 1, removed: 0, total: 3 });
  });

  it("does not mutate the stored entries", () => {
    service.merge([{ brand: "Anycubic", name: "Tough Resin", description: "changed" }], existing, "resin");

    expect(existing[0].description).toBe("old text");
  });

  it("is idempotent", () => {
    const first = service.merge(existing, [], "resin");
    const second = service.merge(first.entries, first.entries, "resin");

    expect(second.entries).toEqual(first.entries);
    expect(second.stats).toEqual({ added: 0, updated: 2, removed: 0, total: 2 });
  });

  it("keeps one entry per identity, later values winning", () => {
    const { entries, stats } = service.merge(
      [
        { brand: "Elegoo", name: "Water Washable", image: "a.png" },
        { brand: "elegoo", name: "WATER WASHABLE", image: "b.png" },
      ],
      [],
      "resin",
    );

    expect(entries).toEqual([{ brand: "Elegoo", name: "Water Washable", image: "b.png" }]);
    expect(stats).toEqual({ added: 1, updated: 1, removed: 0, total: 1 });
  });

  it("re-validates stored entries against the blacklists", () => {
    const { entries, stats } = service.merge(
      [],
      [
        { brand: "Elegoo", name: "Mars 3 Printer" },
        { brand: "Elegoo", name: "Standard Grey" },
      ],
      "resin",
    );

    expect(entries.map((entry) => entry.name)).toEqual(["Standard Grey"]);
    expect(stats).toEqual({ added: 0, updated: 0, removed: 1, total: 1 });
  });

  it("keeps stored entries with malformed optional fields", () => {
    const stored: StoredCatalogEntry[] = [
      { brand: "Elegoo", name: "Standard Grey", tags: null },
      { brand: "Anycubic", name: "Tough Resin", profiles: { Default: { exposureTime: "2.5" } } },
      { brand: "Siraya Tech", name: "Blu", tags: ["Standard", 3] },
    ];

    const { entries, stats } = service.merge([], stored, "resin");

    expect(entries).toEqual(stored);
    expect(stats).toEqual({ added: 0, updated: 0, removed: 0, total: 3 });
  });

  it("reads only string tags when re-validating", () => {
    const { entries } = service.merge(
      [],
      [{ brand: "Elegoo", name: "Grey V2", tags: [7, "PLA Filament"] }],
      "resin",
    );

    expect(entries).toEqual([]);
  });
});
