/**
 * Rate Limiter
 *
 * Enforces a minimum spacing between outbound requests.
 * One instance is shared by the whole run, so the spacing holds across
 * sources and across strategies.
 */

import { logger } from "@/config/logger";

export class RateLimiter {
  private lastExecutionTime: number = 0;

  constructor(private waitTimeMs: number) {}

  /**
   * Wait until at least waitTimeMs has passed since the previous call
   */
  async throttle(context?: string): Promise<void> {
    const elapsed = Date.now() - this.lastExecutionTime;

    if (elapsed < this.waitTimeMs) {
      const waitTime = this.waitTimeMs - elapsed;
      logger.debug({ wait_time_ms: waitTime, context }, "Rate limiting wait");
      await this.sleep(waitTime);
    }

    this.lastExecutionTime = Date.now();
  }

  getWaitTime(): number {
    return this.waitTimeMs;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
