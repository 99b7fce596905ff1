/**
 * Print profile lookup
 *
 * Profiles are not scraped: they are derived from the category and the
 * material so the front end always has starting values per printer.
 */

import type {
  FilamentProfile,
  ResinProfile,
} from "@/core/domain/CatalogEntry";

const RESIN_DEFAULT: ResinProfile = {
  layerHeight: 0.05,
  bottomLayerCount: 5,
  exposureTime: 2.5,
  bottomExposure: 30,
  liftDistance1: 5,
  liftSpeed1: 60,
  retractSpeed1: 150,
};

/**
 * [printer, exposure (s), bottom exposure (s)]
 */
const RESIN_PRINTERS: ReadonlyArray<readonly [string, number, number]> = [
  ["Anycubic Photon Mono X", 2.0, 25],
  ["Anycubic Photon M3 Plus", 1.8, 20],
  ["Elegoo Mars 3", 2.5, 30],
  ["Elegoo Saturn 2", 2.2, 25],
  ["Phrozen Sonic Mighty 8K", 2.1, 25],
  ["Creality Halot Mage", 2.3, 28],
];

export function getResinProfiles(): Record<string, ResinProfile> {
  const profiles: Record<string, ResinProfile> = { Default: { ...RESIN_DEFAULT } };

  for (const [printer, exposureTime, bottomExposure] of RESIN_PRINTERS) {
    profiles[printer] = {
      layerHeight: 0.05,
      bottomLayerCount: 6,
      exposureTime,
      bottomExposure,
      liftDistance1: 6,
      liftSpeed1: 65,
      retractSpeed1: 180,
    };
  }

  return profiles;
}

/**
 * Nozzle/bed temperatures by material
 */
export function getFilamentTemperatures(material: string): {
  printTemp: number;
  bedTemp: number;
} {
  const normalized = material.toUpperCase();
  if (normalized === "PLA" || normalized === "PLA+") {
    return { printTemp: 210, bedTemp: 60 };
  }
  if (normalized === "PETG") {
    return { printTemp: 240, bedTemp: 80 };
  }
  return { printTemp: 250, bedTemp: 100 };
}

export function getFilamentProfiles(
  material: string,
): Record<string, FilamentProfile> {
  const { printTemp, bedTemp } = getFilamentTemperatures(material);

  return {
    Default: {
      printTemp,
      bedTemp,
      fanSpeed: 100,
      retractionDistance: 1.0,
      retractionSpeed: 40,
    },
    "Fast / Draft (0.28mm)": {
      printTemp: printTemp + 5,
      bedTemp,
      fanSpeed: 100,
      retractionDistance: 1.2,
      retractionSpeed: 45,
    },
    "Fine Detail (0.12mm)": {
      printTemp: printTemp - 5,
      bedTemp,
      fanSpeed: 100,
      retractionDistance: 0.8,
      retractionSpeed: 35,
    },
    "Bambu Lab X1C / P1S": {
      printTemp: printTemp + 10,
      bedTemp,
      fanSpeed: 100,
      retractionDistance: 0.8,
      retractionSpeed: 50,
    },
  };
}
