/**
 * Playwright browser launcher
 *
 * Chromium through playwright-extra with the stealth plugin, adapted to the
 * narrow IBrowserSession contract the JS-rendered strategy depends on.
 * Each launch() owns a browser, a context and one page.
 */

import { chromium } from "playwright-extra";
import StealthPlugin from "puppeteer-extra-plugin-stealth";
import type { Browser, ElementHandle, Page, Response } from "playwright";

import { getBrowserArgs } from "@/config/BrowserArgs";
import { HTTP_CONFIG, SCRAPER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import type {
  IBrowserLauncher,
  IBrowserSession,
  IElementHandle,
  IInterceptedResponse,
  IRenderedPage,
} from "@/core/interfaces/IBrowserSession";

// Stealth plugin registered once at module level
chromium.use(StealthPlugin());

class PlaywrightElement implements IElementHandle {
  constructor(private readonly handle: ElementHandle) {}

  innerText(): Promise<string> {
    return this.handle.innerText();
  }

  getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async querySelector(selector: string): Promise<IElementHandle | null> {
    const child = await this.handle.$(selector);
    return child ? new PlaywrightElement(child) : null;
  }
}

class PlaywrightResponse implements IInterceptedResponse {
  constructor(private readonly response: Response) {}

  url(): string {
    return this.response.url();
  }

  status(): number {
    return this.response.status();
  }

  json(): Promise<unknown> {
    return this.response.json();
  }
}

class PlaywrightPage implements IRenderedPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, options: { timeoutMs: number }): Promise<void> {
    await this.page.goto(url, {
      waitUntil: "domcontentloaded",
      timeout: options.timeoutMs,
    });
  }

  waitForTimeout(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  moveMouse(x: number, y: number): Promise<void> {
    return this.page.mouse.move(x, y);
  }

  scrollBy(deltaY: number): Promise<void> {
    return this.page.mouse.wheel(0, deltaY);
  }

  onResponse(handler: (response: IInterceptedResponse) => Promise<void>): void {
    this.page.on("response", (response) => {
      handler(new PlaywrightResponse(response)).catch((error: unknown) => {
        logger.debug(
          {
            url: response.url(),
            error: error instanceof Error ? error.message : String(error),
          },
          "Response handler failed",
        );
      });
    });
  }

  async querySelectorAll(selector: string): Promise<IElementHandle[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightElement(handle));
  }
}

class PlaywrightSession implements IBrowserSession {
  constructor(
    private readonly browser: Browser,
    readonly page: IRenderedPage,
  ) {}

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export class PlaywrightBrowserLauncher implements IBrowserLauncher {
  constructor(
    private readonly headless: boolean = SCRAPER_CONFIG.HEADLESS,
  ) {}

  async launch(): Promise<IBrowserSession> {
    const browser = await chromium.launch({
      headless: this.headless,
      args: getBrowserArgs(),
    });

    try {
      const context = await browser.newContext({
        userAgent: HTTP_CONFIG.USER_AGENT,
        viewport: SCRAPER_CONFIG.DEFAULT_VIEWPORT,
        locale: SCRAPER_CONFIG.LOCALE,
        javaScriptEnabled: true,
      });

      // Anti-detection
      await context.addInitScript(() => {
        Object.defineProperty(navigator, "webdriver", {
          get: () => false,
        });
      });

      const page = await context.newPage();
      logger.debug({ headless: this.headless }, "Browser launched");
      return new PlaywrightSession(browser, new PlaywrightPage(page));
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
