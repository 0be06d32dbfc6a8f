import { logDebug } from "./logging.js";

/**
 * Hands out start slots at least `intervalMs` apart. Each `schedule` call
 * reserves its slot synchronously, so concurrent callers start in call order.
 * Used for outbound API calls (report publishing).
 */
export class RateLimiter {
  private nextSlot = 0;
  private readonly intervalMs: number;
  private readonly label: string;

  constructor(intervalMs: number, label = "api") {
    this.intervalMs = intervalMs;
    this.label = label;
  }

  /** Milliseconds the caller has to wait for the slot it just reserved. */
  private reserve(): number {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    return slot - now;
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    const delay = this.reserve();
    if (delay > 0) {
      logDebug(`Rate limiting ${this.label}: next call starts in ${delay}ms`);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
    return task();
  }
}
