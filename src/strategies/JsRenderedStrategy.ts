/**
 * JS-rendered listing strategy (headless browser)
 *
 * For storefronts that build their listing client-side.
 * Per URL:
 * 1. launch a session; optionally intercept the listing XHR
 * 2. navigate, act like a visitor, scroll to trigger lazy loading
 * 3. intercepted records win; otherwise scrape product cards from the DOM
 * 4. close the session (always)
 */

import { SCRAPER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { PROVENANCE, type RawProduct } from "@/core/domain/RawProduct";
import type {
  InterceptConfig,
  JsSourceConfig,
} from "@/core/domain/SourceConfig";
import type {
  IBrowserLauncher,
  IElementHandle,
  IInterceptedResponse,
  IRenderedPage,
} from "@/core/interfaces/IBrowserSession";
import type { IExtractionStrategy } from "@/core/interfaces/IExtractionStrategy";
import { resolveLink } from "@/extractors/common/HtmlHelper";
import {
  descendPath,
  isJsonObject,
  type JsonObject,
} from "@/extractors/common/JsonPath";
import { BaseExtractionStrategy } from "./base/BaseExtractionStrategy";

const CARD_FALLBACKS = [
  "div.product-item",
  "li.grid__item",
  "div.product-card",
  "article",
  ".product",
  ".grid-product",
] as const;

const TITLE_SELECTORS = [
  "h2",
  "h3",
  "h4",
  ".title",
  ".name",
  ".product-title",
  ".product-item-link",
  ".grid-product__title",
  ".product-grid-item__title",
  ".card-title",
] as const;

const IMAGE_ATTRIBUTES = ["src", "data-src", "srcset"] as const;

const MIN_NAME_LENGTH = 3;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Records from one intercepted listing payload
 */
export function parseInterceptedPayload(
  body: unknown,
  config: InterceptConfig,
  brand: string,
): RawProduct[] {
  let items = descendPath(body, config.dataPath);
  if (isJsonObject(items) && config.rowsKey in items) {
    items = items[config.rowsKey];
  }
  if (!Array.isArray(items)) return [];

  return items.flatMap((item): RawProduct[] => {
    if (!isJsonObject(item)) return [];
    const name = stringField(item, "name");
    if (!name) return [];

    return [
      {
        brand,
        name,
        imageUrl: stringField(item, "image") ?? stringField(item, "img"),
        productUrl: config.productUrlTemplate.replace(
          "{slug}",
          stringField(item, "slug") ?? "",
        ),
        tags: [],
        provenance: PROVENANCE.PLAYWRIGHT_INTERCEPT,
      },
    ];
  });
}

function stringField(item: JsonObject, key: string): string | undefined {
  const value = item[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export class JsRenderedStrategy
  extends BaseExtractionStrategy<JsSourceConfig>
  implements IExtractionStrategy<"js">
{
  readonly strategy = "js" as const;

  constructor(private readonly launcher: IBrowserLauncher) {
    super();
  }

  protected async extractFromUrl(
    source: JsSourceConfig,
    url: string,
  ): Promise<RawProduct[]> {
    const session = await this.launcher.launch();

    try {
      const { page } = session;
      const intercepted: RawProduct[] = [];
      const { intercept } = source;
      if (intercept) {
        page.onResponse((response) =>
          this.collectIntercepted(response, intercept, source.brand, intercepted),
        );
      }

      await this.navigate(page, url);
      await this.actLikeVisitor(page);
      await this.scrollListing(
        page,
        source.waitTimeMs ?? SCRAPER_CONFIG.DEFAULT_RENDER_WAIT_MS,
      );

      if (intercepted.length > 0) {
        logger.info(
          { brand: source.brand, url, count: intercepted.length },
          "Using intercepted listing data",
        );
        return [...intercepted];
      }

      return await this.scrapeCards(page, source, url);
    } finally {
      try {
        await session.close();
      } catch (closeError) {
        logger.warn(
          { brand: source.brand, url, error: errorMessage(closeError) },
          "Browser close failed",
        );
      }
    }
  }

  private async collectIntercepted(
    response: IInterceptedResponse,
    config: InterceptConfig,
    brand: string,
    sink: RawProduct[],
  ): Promise<void> {
    if (response.status() !== 200 || !response.url().includes(config.urlPattern)) {
      return;
    }

    try {
      const body = await response.json();
      sink.push(...parseInterceptedPayload(body, config, brand));
    } catch (error) {
      logger.debug(
        { url: response.url(), error: errorMessage(error) },
        "Intercepted response is not a listing",
      );
    }
  }

  /**
   * Navigation errors are logged; whatever rendered is still scraped
   */
  private async navigate(page: IRenderedPage, url: string): Promise<void> {
    try {
      await page.goto(url, { timeoutMs: SCRAPER_CONFIG.NAVIGATION_TIMEOUT_MS });
    } catch (error) {
      logger.warn({ url, error: errorMessage(error) }, "Navigation incomplete");
    }
  }

  private async actLikeVisitor(page: IRenderedPage): Promise<void> {
    try {
      await page.waitForTimeout(SCRAPER_CONFIG.IDLE_WAIT_MS);
      await page.moveMouse(
        SCRAPER_CONFIG.MOUSE_POSITION.x,
        SCRAPER_CONFIG.MOUSE_POSITION.y,
      );
      await page.waitForTimeout(SCRAPER_CONFIG.MOUSE_SETTLE_MS);
      await page.scrollBy(SCRAPER_CONFIG.INITIAL_SCROLL_PX);
      await page.waitForTimeout(SCRAPER_CONFIG.MOUSE_SETTLE_MS);
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, "Visitor simulation skipped");
    }
  }

  private async scrollListing(page: IRenderedPage, finalWaitMs: number): Promise<void> {
    for (let round = 0; round < SCRAPER_CONFIG.SCROLL_ROUNDS; round++) {
      await page.scrollBy(SCRAPER_CONFIG.SCROLL_STEP_PX);
      await page.waitForTimeout(SCRAPER_CONFIG.SCROLL_PAUSE_MS);
    }
    await page.waitForTimeout(finalWaitMs);
  }

  private async scrapeCards(
    page: IRenderedPage,
    source: JsSourceConfig,
    url: string,
  ): Promise<RawProduct[]> {
    let cards: IElementHandle[] = [];
    for (const selector of [source.cardSelector, ...CARD_FALLBACKS]) {
      cards = await page.querySelectorAll(selector);
      if (cards.length > 0) break;
    }

    const origin = new URL(url).origin;
    const products: RawProduct[] = [];

    for (const card of cards) {
      try {
        const product = await this.readCard(card, source.brand, origin);
        if (product) products.push(product);
      } catch (error) {
        logger.debug({ url, error: errorMessage(error) }, "Card skipped");
      }
    }

    return products;
  }

  private async readCard(
    card: IElementHandle,
    brand: string,
    origin: string,
  ): Promise<RawProduct | null> {
    const text = await card.innerText();
    const title = await this.findFirst(card, TITLE_SELECTORS);
    const rawName = title ? await title.innerText() : text.split("\n")[0];
    const name = rawName.trim().slice(0, SCRAPER_CONFIG.MAX_NAME_LENGTH);
    if (name.length < MIN_NAME_LENGTH) return null;

    const image = await card.querySelector("img");
    const link = await card.querySelector("a");

    return {
      brand,
      name,
      imageUrl: image ? await this.firstAttribute(image, IMAGE_ATTRIBUTES) : undefined,
      productUrl: link
        ? resolveLink((await link.getAttribute("href")) ?? undefined, origin)
        : undefined,
      tags: [],
      provenance: PROVENANCE.PLAYWRIGHT_JS,
    };
  }

  private async findFirst(
    card: IElementHandle,
    selectors: readonly string[],
  ): Promise<IElementHandle | null> {
    for (const selector of selectors) {
      const element = await card.querySelector(selector);
      if (element) return element;
    }
    return null;
  }

  private async firstAttribute(
    element: IElementHandle,
    attributes: readonly string[],
  ): Promise<string | undefined> {
    for (const attribute of attributes) {
      const value = await element.getAttribute(attribute);
      if (value) return value;
    }
    return undefined;
  }
}
