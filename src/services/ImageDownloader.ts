/**
 * Image downloader
 *
 * Stores product images under `<root>/images/<resins|filaments>/` as
 * `<brand>_<name>_<urlhash>.<ext>` and returns the root-relative path
 * (forward slashes). The URL hash keeps names that slugify alike apart.
 * An existing non-empty file is reused. Any failure returns null: images are
 * enrichment only.
 */

import { createHash } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import { PATH_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type { MaterialCategory } from "@/core/domain/MaterialCategory";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";
import type {
  IImageDownloader,
  ImageRequest,
} from "@/core/interfaces/IImageDownloader";

const IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png", "webp", "avif"]);
const DEFAULT_EXTENSION = "jpg";
const URL_HASH_LENGTH = 8;

const CATEGORY_DIRECTORIES: Record<MaterialCategory, string> = {
  resin: "resins",
  filament: "filaments",
};

/**
 * File-name-safe form: lowercase, punctuation dropped, runs of spaces and
 * hyphens collapsed to "_"
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .replace(/[-\s]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Extension from the URL path when it is a known image type, jpg otherwise
 */
export function detectImageExtension(url: string): string {
  const candidate = (url.split(".").pop() ?? "").split("?")[0].toLowerCase();
  return IMAGE_EXTENSIONS.has(candidate) ? candidate : DEFAULT_EXTENSION;
}

export function hashImageUrl(url: string): string {
  return createHash("sha1").update(url).digest("hex").slice(0, URL_HASH_LENGTH);
}

export function buildImagePath(request: ImageRequest): string {
  const stem = [slugify(request.brand), slugify(request.name), hashImageUrl(request.imageUrl)].join("_");
  const fileName = `${stem}.${detectImageExtension(request.imageUrl)}`;
  return path.posix.join("images", CATEGORY_DIRECTORIES[request.category], fileName);
}

export class ImageDownloader implements IImageDownloader {
  constructor(
    private readonly http: IHttpClient,
    private readonly outputRoot: string = PATH_CONFIG.IMAGE_OUTPUT_ROOT,
  ) {}

  async download(request: ImageRequest): Promise<string | null> {
    if (!request.imageUrl || request.imageUrl.startsWith("data:")) {
      return null;
    }

    const relativePath = buildImagePath(request);
    const absolutePath = path.join(this.outputRoot, relativePath);

    try {
      if (await this.hasContent(absolutePath)) {
        return relativePath;
      }

      const bytes = await this.http.getBuffer(request.imageUrl);
      await fs.mkdir(path.dirname(absolutePath), { recursive: true });
      await fs.writeFile(absolutePath, bytes);

      logger.debug({ url: request.imageUrl, relativePath }, "Image saved");
      return relativePath;
    } catch (error) {
      logger.warn(
        {
          url: request.imageUrl,
          error: error instanceof Error ? error.message : String(error),
        },
        "Image download failed",
      );
      return null;
    }
  }

  private async hasContent(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size > 0;
    } catch {
      return false;
    }
  }
}
