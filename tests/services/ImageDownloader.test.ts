/**
 * ImageDownloader Test
 * Writes into a temporary directory per test
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { createHash } from "crypto";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  buildImagePath,
  detectImageExtension,
  hashImageUrl,
  ImageDownloader,
  slugify,
} from "@/services/ImageDownloader";
import type { ImageRequest } from "@/core/interfaces/IImageDownloader";
import { FakeHttpClient } from "../helpers/FakeHttpClient";

const IMAGE_URL = "https://cdn.example.com/img/Tough.PNG?v=2";
const IMAGE_HASH = createHash("sha1").update(IMAGE_URL).digest("hex").slice(0, 8);
const IMAGE_FILE = `anycubic_tough_resin_20_grey_${IMAGE_HASH}.png`;

const request: ImageRequest = {
  imageUrl: IMAGE_URL,
  category: "resin",
  brand: "Anycubic",
  name: "Tough Resin 2.0 (Grey)",
};

describe("image path helpers", () => {
  it("slugifies names for file paths", () => {
    expect(slugify("Tough Resin 2.0 (Grey)")).toBe("tough_resin_20_grey");
    expect(slugify("  Élan  --  Mars ")).toBe("élan_mars");
  });

  it("detects known extensions and defaults to jpg", () => {
    expect(detectImageExtension(IMAGE_URL)).toBe("png");
    expect(detectImageExtension("https://cdn.example.com/a.webp")).toBe("webp");
    expect(detectImageExtension("https://cdn.example.com/image")).toBe("jpg");
  });

  it("hashes image URLs to eight hex characters", () => {
    expect(hashImageUrl(IMAGE_URL)).toBe(IMAGE_HASH);
    expect(hashImageUrl(IMAGE_URL)).toMatch(/^[0-9a-f]{8}$/);
  });

  it("builds category-relative paths", () => {
    const plainUrl = "https://cdn.example.com/x";
    const plainHash = createHash("sha1").update(plainUrl).digest("hex").slice(0, 8);

    expect(buildImagePath(request)).toBe(`images/resins/${IMAGE_FILE}`);
    expect(buildImagePath({ ...request, category: "filament", imageUrl: plainUrl })).toBe(
      `images/filaments/anycubic_tough_resin_20_grey_${plainHash}.jpg`,
    );
  });

  it("keeps products whose names slugify alike in separate files", () => {
    const plus = buildImagePath({
      imageUrl: "https://cdn.example.com/pla-plus-black.jpg",
      category: "filament",
      brand: "eSUN",
      name: "PLA+ Black",
    });
    const plain = buildImagePath({
      imageUrl: "https://cdn.example.com/pla-black.jpg",
      category: "filament",
      brand: "eSUN",
      name: "PLA Black",
    });

    expect(plus).toMatch(/^images\/filaments\/esun_pla_black_[0-9a-f]{8}\.jpg$/);
    expect(plain).toMatch(/^images\/filaments\/esun_pla_black_[0-9a-f]{8}\.jpg$/);
    expect(plus).not.toBe(plain);
  });
});

describe("ImageDownloader", () => {
  let root: string;
  let http: FakeHttpClient;
  let downloader: ImageDownloader;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-images-"));
    http = new FakeHttpClient();
    downloader = new ImageDownloader(http, root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("downloads and stores the image", async () => {
    http.withBuffer(IMAGE_URL, Buffer.from("png-bytes"));

    const relative = await downloader.download(request);

    expect(relative).toBe(`images/resins/${IMAGE_FILE}`);
    const stored = await fs.readFile(path.join(root, "images", "resins", IMAGE_FILE));
    expect(stored.toString()).toBe("png-bytes");
  });

  it("reuses a cached non-empty file", async () => {
    const target = path.join(root, "images", "resins", IMAGE_FILE);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, "cached");

    const relative = await downloader.download(request);

    expect(relative).toBe(`images/resins/${IMAGE_FILE}`);
    expect(http.requests).toEqual([]);
  });

  it("downloads again over an empty file", async () => {
    const target = path.join(root, "images", "resins", IMAGE_FILE);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, "");
    http.withBuffer(IMAGE_URL, Buffer.from("fresh"));

    await downloader.download(request);

    expect(http.requests).toEqual([IMAGE_URL]);
    expect((await fs.readFile(target)).toString()).toBe("fresh");
  });

  it("skips inline data URLs", async () => {
    const result = await downloader.download({ ...request, imageUrl: "data:image/png;base64,AAAA" });

    expect(result).toBeNull();
    expect(http.requests).toEqual([]);
  });

  it("returns null when the download fails", async () => {
    await expect(downloader.download(request)).resolves.toBeNull();
  });
});
