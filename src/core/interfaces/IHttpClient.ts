/**
 * HTTP client contract used by the extraction strategies
 *
 * Implementations throw HttpError on transport failures and non-2xx
 * responses; strategies catch at their boundary.
 */

export interface IHttpClient {
  /**
   * GET and return the body as text (HTML pages)
   */
  getText(url: string): Promise<string>;

  /**
   * GET and parse the body as JSON
   */
  getJson(url: string): Promise<unknown>;

  /**
   * GET and return the raw bytes (images)
   */
  getBuffer(url: string): Promise<Buffer>;
}

/**
 * Transport or status failure for one request
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "HttpError";
  }
}
