/**
 * CatalogEntryMapper / PrintProfileTable Test
 */

import { describe, it, expect } from "@jest/globals";
import {
  toCatalogEntry,
  toFilamentEntry,
  toResinEntry,
} from "@/services/CatalogEntryMapper";
import {
  getFilamentProfiles,
  getFilamentTemperatures,
  getResinProfiles,
} from "@/services/PrintProfileTable";
import { PROVENANCE, type RawProduct } from "@/core/domain/RawProduct";

const tough: RawProduct = {
  brand: "Anycubic",
  name: "Tough Resin Black",
  imageUrl: "https://cdn.example.com/tough.png",
  type: "Tough",
  colorHex: "#000000",
  colorName: "Black",
  tags: [],
  description: "Impact resistant",
  provenance: PROVENANCE.SHOPIFY_API,
};

describe("PrintProfileTable", () => {
  it("lists a default and one profile per known printer", () => {
    const profiles = getResinProfiles();

    expect(Object.keys(profiles)).toEqual([
      "Default",
      "Anycubic Photon Mono X",
      "Anycubic Photon M3 Plus",
      "Elegoo Mars 3",
      "Elegoo Saturn 2",
      "Phrozen Sonic Mighty 8K",
      "Creality Halot Mage",
    ]);
    expect(profiles.Default.exposureTime).toBe(2.5);
    expect(profiles["Elegoo Saturn 2"]).toEqual({
      layerHeight: 0.05,
      bottomLayerCount: 6,
      exposureTime: 2.2,
      bottomExposure: 25,
      liftDistance1: 6,
      liftSpeed1: 65,
      retractSpeed1: 180,
    });
  });

  it("derives temperatures from the material", () => {
    expect(getFilamentTemperatures("pla+")).toEqual({ printTemp: 210, bedTemp: 60 });
    expect(getFilamentTemperatures("PETG")).toEqual({ printTemp: 240, bedTemp: 80 });
    expect(getFilamentTemperatures("ABS")).toEqual({ printTemp: 250, bedTemp: 100 });
  });

  it("offsets preset temperatures from the default", () => {
    const profiles = getFilamentProfiles("PETG");

    expect(profiles.Default.printTemp).toBe(240);
    expect(profiles["Fast / Draft (0.28mm)"].printTemp).toBe(245);
    expect(profiles["Fine Detail (0.12mm)"].printTemp).toBe(235);
    expect(profiles["Bambu Lab X1C / P1S"].printTemp).toBe(250);
  });
});

describe("CatalogEntryMapper", () => {
  it("prefers the downloaded image and tags with the type", () => {
    const entry = toResinEntry(tough, "images/resins/anycubic_tough_resin_black.png");

    expect(entry).toEqual({
      brand: "Anycubic",
      name: "Tough Resin Black",
      image: "images/resins/anycubic_tough_resin_black.png",
      type: "Tough",
      description: "Impact resistant",
      color: "#000000",
      colorName: "Black",
      tags: ["Tough"],
      profiles: getResinProfiles(),
    });
  });

  it("fills defaults for bare records", () => {
    const entry = toResinEntry({
      brand: "Curated",
      name: "Mystery",
      tags: ["Limited"],
      provenance: PROVENANCE.MANUAL_CURATED,
    });

    expect(entry.image).toBeNull();
    expect(entry.description).toBeNull();
    expect(entry.type).toBe("Standard");
    expect(entry.color).toBe("#808080");
    expect(entry.colorName).toBe("Grey");
    expect(entry.tags).toEqual(["Limited"]);
  });

  it("builds filament entries with material-based profiles", () => {
    const entry = toFilamentEntry({
      brand: "Polymaker",
      name: "PolyLite PETG",
      imageUrl: "https://cdn.example.com/petg.png",
      type: "PETG",
      tags: [],
      provenance: PROVENANCE.SHOPIFY_API,
    });

    expect(entry.material).toBe("PETG");
    expect(entry.image).toBe("https://cdn.example.com/petg.png");
    expect(entry.tags).toEqual(["PETG"]);
    expect(entry.profiles.Default.bedTemp).toBe(80);
  });

  it("routes by category", () => {
    expect("material" in toCatalogEntry(tough, "filament")).toBe(true);
    expect("type" in toCatalogEntry(tough, "resin")).toBe(true);
  });
});
