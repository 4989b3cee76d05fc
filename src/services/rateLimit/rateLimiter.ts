export interface RateLimiterOptions {
  limit: number;
  windowMs: number;
}

const DEFAULT_OPTIONS: RateLimiterOptions = {
  limit: 100,
  windowMs: 60 * 60 * 1000, // 1 hour
};

/**
 * Trailing-window admission control per client identity.
 *
 * Prune, check and record happen in one synchronous call, so two requests
 * for the same client can never both observe the last free slot.
 */
export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private windows: Map<string, number[]> = new Map();

  constructor(options: Partial<RateLimiterOptions> = {}) {
    const { limit, windowMs } = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    if (!(windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${windowMs}`);
    }
    this.limit = limit;
    this.windowMs = windowMs;
  }

  admit(clientId: string): boolean {
    const now = Date.now();
    const timestamps = this.prune(clientId, now);

    if (timestamps.length >= this.limit) {
      return false;
    }

    timestamps.push(now);
    this.windows.set(clientId, timestamps);
    return true;
  }

  remaining(clientId: string): number {
    return Math.max(0, this.limit - this.prune(clientId, Date.now()).length);
  }

  /**
   * Milliseconds until the client may be admitted again; 0 when it may be
   * admitted now.
   */
  retryAfterMs(clientId: string): number {
    const now = Date.now();
    const timestamps = this.prune(clientId, now);
    if (timestamps.length < this.limit) return 0;
    return Math.max(0, timestamps[0] + this.windowMs - now);
  }

  /** Drops clients with no requests left in their window. Returns the number removed. */
  purgeIdle(): number {
    const now = Date.now();
    let removed = 0;
    for (const clientId of [...this.windows.keys()]) {
      if (this.prune(clientId, now).length === 0) {
        this.windows.delete(clientId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.windows.size;
  }

  reset(clientId?: string): void {
    if (clientId === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(clientId);
    }
  }

  private prune(clientId: string, now: number): number[] {
    const timestamps = this.windows.get(clientId);
    if (!timestamps) return [];

    const live = timestamps.filter((t) => now - t < this.windowMs);
    if (live.length !== timestamps.length) {
      this.windows.set(clientId, live);
    }
    return live;
  }
}
