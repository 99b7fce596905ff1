/**
 * Fetch-based HTTP client
 *
 * - every request waits on the shared RateLimiter first
 * - every request carries its own timeout (AbortSignal.timeout)
 * - non-2xx statuses, timeouts and malformed JSON raise HttpError
 */

import { HTTP_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { HttpError, type IHttpClient } from "@/core/interfaces/IHttpClient";
import { RateLimiter } from "@/utils/RateLimiter";

export interface FetchHttpClientOptions {
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
}

export class FetchHttpClient implements IHttpClient {
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? HTTP_CONFIG.REQUEST_TIMEOUT_MS;
    this.rateLimiter =
      options.rateLimiter ?? new RateLimiter(HTTP_CONFIG.REQUEST_DELAY_MS);
  }

  async getText(url: string): Promise<string> {
    const response = await this.request(url, HTTP_CONFIG.HTML_HEADERS);
    return response.text();
  }

  async getJson(url: string): Promise<unknown> {
    const response = await this.request(url, HTTP_CONFIG.JSON_HEADERS);
    const body = await response.text();
    try {
      return JSON.parse(body);
    } catch {
      throw new HttpError("Response is not valid JSON", url, response.status);
    }
  }

  async getBuffer(url: string): Promise<Buffer> {
    const response = await this.request(url, {});
    return Buffer.from(await response.arrayBuffer());
  }

  private async request(
    url: string,
    headers: Readonly<Record<string, string>>,
  ): Promise<Response> {
    await this.rateLimiter.throttle(url);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: { "User-Agent": HTTP_CONFIG.USER_AGENT, ...headers },
        redirect: "follow",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError")
      ) {
        throw new HttpError(`Request timeout after ${this.timeoutMs}ms`, url);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new HttpError(`Request failed: ${message}`, url);
    }

    if (!response.ok) {
      throw new HttpError(
        `HTTP ${response.status}: ${response.statusText}`,
        url,
        response.status,
      );
    }

    logger.debug({ url, status: response.status }, "HTTP response");
    return response;
  }
}
