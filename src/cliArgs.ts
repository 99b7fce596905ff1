/**
 * Command-line flag parsing
 */

import {
  getAllMaterialCategories,
  type MaterialCategory,
} from "@/core/domain/MaterialCategory";
import type { PipelineOptions } from "@/services/CatalogPipelineService";

export interface CliArgs {
  categories: MaterialCategory[];
  options: PipelineOptions;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  let resins = false;
  let filaments = false;
  const options: PipelineOptions = {
    dryRun: false,
    merge: true,
    downloadImages: true,
  };
  let help = false;

  for (const arg of argv) {
    switch (arg) {
      case "--resins":
        resins = true;
        break;
      case "--filaments":
        filaments = true;
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--no-merge":
        options.merge = false;
        break;
      case "--no-images":
        options.downloadImages = false;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  const categories: MaterialCategory[] =
    resins === filaments
      ? getAllMaterialCategories()
      : resins
        ? ["resin"]
        : ["filament"];

  return { categories, options, help };
}
