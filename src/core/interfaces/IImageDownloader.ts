/**
 * Image downloader contract (best-effort enrichment)
 */

import type { MaterialCategory } from "@/core/domain/MaterialCategory";

export interface ImageRequest {
  imageUrl: string;
  category: MaterialCategory;
  brand: string;
  name: string;
}

export interface IImageDownloader {
  /**
   * Relative local path of the cached or downloaded image, null on any failure
   */
  download(request: ImageRequest): Promise<string | null>;
}
