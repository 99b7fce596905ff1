/**
 * Shared DOM helpers for the cheerio-based strategies
 */

import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { isTag, type Element } from "domhandler";
import type { IHttpClient } from "@/core/interfaces/IHttpClient";

const IMAGE_ATTRIBUTES = ["src", "data-src", "data-lazy-src"] as const;

/**
 * Fetch a page and parse it with cheerio
 */
export async function loadDocument(
  http: IHttpClient,
  url: string,
): Promise<CheerioAPI> {
  const html = await http.getText(url);
  return cheerio.load(html);
}

/**
 * Elements matched by the first selector that matches anything
 */
export function selectFirstMatching(
  $: CheerioAPI,
  selectors: readonly string[],
): Element[] {
  for (const selector of selectors) {
    const cards = $(selector).toArray().filter(isTag);
    if (cards.length > 0) return cards;
  }
  return [];
}

/**
 * Trimmed text of the first selector hit inside the card that has text
 */
export function findText(
  card: Cheerio<Element>,
  selectors: readonly string[],
): string | undefined {
  for (const selector of selectors) {
    const element = card.find(selector).first();
    if (element.length === 0) continue;
    return element.text().trim() || undefined;
  }
  return undefined;
}

/**
 * Image URL from src / data-src / data-lazy-src, protocol-relative made https
 */
export function findImageUrl(
  card: Cheerio<Element>,
  selector: string,
): string | undefined {
  const image = card.find(selector).first();
  if (image.length === 0) return undefined;

  for (const attribute of IMAGE_ATTRIBUTES) {
    const value = image.attr(attribute);
    if (value) return normalizeImageUrl(value);
  }
  return undefined;
}

export function normalizeImageUrl(url: string): string {
  return url.startsWith("//") ? `https:${url}` : url;
}

/**
 * Absolute http(s) URL for an href, relative links resolved against the page
 *
 * @returns undefined for other schemes (mailto:, javascript:) and bad input
 */
export function resolveLink(
  href: string | undefined,
  pageUrl: string,
): string | undefined {
  if (!href) return undefined;
  try {
    const resolved = new URL(href, pageUrl);
    return resolved.protocol === "http:" || resolved.protocol === "https:"
      ? resolved.href
      : undefined;
  } catch {
    return undefined;
  }
}
