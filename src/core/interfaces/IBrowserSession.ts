/**
 * Headless browser contracts for JS-rendered sources
 *
 * The strategy only sees these narrow interfaces; PlaywrightBrowserLauncher
 * adapts Playwright to them, tests provide in-process fakes.
 */

export interface IInterceptedResponse {
  url(): string;
  status(): number;
  json(): Promise<unknown>;
}

export interface IElementHandle {
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  querySelector(selector: string): Promise<IElementHandle | null>;
}

export interface IRenderedPage {
  goto(url: string, options: { timeoutMs: number }): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  moveMouse(x: number, y: number): Promise<void>;
  scrollBy(deltaY: number): Promise<void>;
  onResponse(handler: (response: IInterceptedResponse) => Promise<void>): void;
  querySelectorAll(selector: string): Promise<IElementHandle[]>;
}

export interface IBrowserSession {
  readonly page: IRenderedPage;
  close(): Promise<void>;
}

export interface IBrowserLauncher {
  /**
   * Launch a fresh browser; the caller owns the session and must close it
   */
  launch(): Promise<IBrowserSession>;
}
