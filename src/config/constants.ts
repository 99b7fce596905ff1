/**
 * Application constants
 *
 * Environment-driven settings with defaults.
 * dotenv is loaded here so every module that reads a constant sees .env values.
 */

import "dotenv/config";
import * as path from "path";

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const APP_METADATA = {
  NAME: "Material Catalog Scraper",
  VERSION: "1.0.0",
} as const;

/**
 * HTTP settings shared by every outbound request
 */
export const HTTP_CONFIG = {
  /**
   * Per-request timeout (ms)
   * env: REQUEST_TIMEOUT_MS
   */
  REQUEST_TIMEOUT_MS: numberFromEnv("REQUEST_TIMEOUT_MS", 15000),

  /**
   * Minimum spacing between two outbound requests (ms)
   * env: REQUEST_DELAY_MS
   */
  REQUEST_DELAY_MS: numberFromEnv("REQUEST_DELAY_MS", 1000),

  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",

  HTML_HEADERS: {
    Accept:
      "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    Referer: "https://www.google.com/",
    "Upgrade-Insecure-Requests": "1",
    "Cache-Control": "max-age=0",
  },

  JSON_HEADERS: {
    Accept: "application/json",
    "Accept-Language": "en-US,en;q=0.9",
  },
} as const;

/**
 * Headless browser settings (JS-rendered sources)
 */
export const SCRAPER_CONFIG = {
  HEADLESS: process.env.HEADLESS !== "false",
  DEFAULT_VIEWPORT: { width: 1280, height: 800 },
  LOCALE: "en-US",
  NAVIGATION_TIMEOUT_MS: 60000,

  /** idle wait, mouse move, first small scroll */
  IDLE_WAIT_MS: 2000,
  MOUSE_POSITION: { x: 300, y: 400 },
  MOUSE_SETTLE_MS: 1000,
  INITIAL_SCROLL_PX: 500,

  /** incremental scrolls to trigger lazy loading */
  SCROLL_ROUNDS: 5,
  SCROLL_STEP_PX: 3000,
  SCROLL_PAUSE_MS: 1500,

  /** final wait after scrolling, overridable per source */
  DEFAULT_RENDER_WAIT_MS: 3000,

  MAX_NAME_LENGTH: 100,
} as const;

/**
 * Extraction limits
 */
export const EXTRACTION_CONFIG = {
  SHOPIFY_PAGE_LIMIT: 250,
  SHOPIFY_MAX_TAGS: 5,
  DESCRIPTION_MAX_LENGTH: 200,
  MANUAL_DEFAULT_IMAGE:
    "https://placehold.co/600x600/1a1a1a/cccccc?text=No+Image",
} as const;

/**
 * Paths
 */
export const PATH_CONFIG = {
  /** YAML source lists, relative to src/config */
  SOURCES_DIR: "sources",

  /** Catalog JSON files (resins_db.json, filaments_db.json) */
  CATALOG_OUTPUT_DIR: path.resolve(
    process.env.CATALOG_OUTPUT_DIR || path.join(process.cwd(), "data"),
  ),

  /** Root that downloaded images are stored under (images/<category>/...) */
  IMAGE_OUTPUT_ROOT: path.resolve(
    process.env.IMAGE_OUTPUT_ROOT || path.join(process.cwd(), "public"),
  ),
} as const;
