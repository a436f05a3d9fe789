import { createChildLogger } from "./logger.js";

const log = createChildLogger({ module: "rate-limiter" });

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimitState {
  remaining: number | null;
  /** epoch seconds */
  reset: number | null;
  lastRequestAt: number | null;
}

export interface RateLimiterOptions {
  requestDelayMs: number;
  fallbackWaitMs: number;
  resetBufferMs?: number;
  clock?: Clock;
}

type HeaderBag = Record<string, string | number | undefined>;

/**
 * Tracks the quota GitHub reports in `x-ratelimit-*` headers and paces
 * requests: waits out an exhausted window, and keeps a minimum gap between
 * the end of one request and the start of the next.
 */
export class RateLimiter {
  private remaining: number | null = null;
  private reset: number | null = null;
  private lastRequestAt: number | null = null;
  private readonly clock: Clock;
  private readonly resetBufferMs: number;

  constructor(private readonly opts: RateLimiterOptions) {
    this.clock = opts.clock ?? systemClock;
    this.resetBufferMs = opts.resetBufferMs ?? 1000;
  }

  update(headers: HeaderBag | undefined): void {
    if (!headers) return;
    const remaining = parseHeader(headers["x-ratelimit-remaining"]);
    const reset = parseHeader(headers["x-ratelimit-reset"]);
    if (remaining !== null) this.remaining = remaining;
    if (reset !== null) this.reset = reset;
  }

  /** Called when the server rejects a request for rate limiting. */
  markExhausted(): void {
    this.remaining = 0;
  }

  async waitIfNeeded(): Promise<void> {
    if (this.remaining !== null && this.remaining <= 0) {
      const waitMs = this.quotaWaitMs();
      if (waitMs > 0) {
        log.warn({ waitMs, reset: this.reset }, "Rate limit exhausted, waiting");
        await this.clock.sleep(waitMs);
      }
      // Unknown until the next response reports it.
      this.remaining = null;
    }

    if (this.lastRequestAt !== null) {
      const sinceLast = this.clock.now() - this.lastRequestAt;
      if (sinceLast < this.opts.requestDelayMs) {
        await this.clock.sleep(this.opts.requestDelayMs - sinceLast);
      }
    }
  }

  markRequestComplete(): void {
    this.lastRequestAt = this.clock.now();
  }

  getState(): RateLimitState {
    return {
      remaining: this.remaining,
      reset: this.reset,
      lastRequestAt: this.lastRequestAt,
    };
  }

  private quotaWaitMs(): number {
    if (this.reset === null) return this.opts.fallbackWaitMs;
    const untilReset = this.reset * 1000 - this.clock.now();
    return untilReset > 0 ? untilReset + this.resetBufferMs : 0;
  }
}

function parseHeader(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const parsed = typeof value === "number" ? value : parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}
