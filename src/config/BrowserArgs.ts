/**
 * Browser launch arguments
 *
 * Chromium flags grouped by purpose so a launch can combine what it needs.
 */

export const BROWSER_ARGS = {
  /**
   * Lower memory use for one-shot listing pages
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * Hide the automation-controlled flag from storefront bot checks
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Required inside containers
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  get LOCAL_DEV(): string[] {
    return [...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
} as const;

/**
 * Flags for the current environment (containers need the sandbox flags)
 */
export function getBrowserArgs(): string[] {
  return process.env.NODE_ENV === "production"
    ? BROWSER_ARGS.DEFAULT
    : BROWSER_ARGS.LOCAL_DEV;
}
