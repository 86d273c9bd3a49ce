export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  /** Time until the user's current window rolls over. */
  retryAfterMs: number;
}

interface Window {
  startedAt: number;
  count: number;
}

/** Fixed one-minute window counter per user. */
export class RateLimiter {
  private readonly windows = new Map<string, Window>();

  constructor(private readonly limitPerWindow: number, private readonly windowMs = 60_000) {}

  check(userId: string, now = Date.now()): RateLimitDecision {
    let window = this.windows.get(userId);
    if (!window || now - window.startedAt >= this.windowMs) {
      window = { startedAt: now, count: 0 };
      this.windows.set(userId, window);
    }

    const retryAfterMs = window.startedAt + this.windowMs - now;
    if (window.count >= this.limitPerWindow) {
      return { allowed: false, remaining: 0, retryAfterMs };
    }

    window.count += 1;
    return { allowed: true, remaining: this.limitPerWindow - window.count, retryAfterMs };
  }

  /** Drops windows that have rolled over. */
  prune(now = Date.now()) {
    for (const [userId, window] of this.windows) {
      if (now - window.startedAt >= this.windowMs) {
        this.windows.delete(userId);
      }
    }
  }

  get trackedUsers() {
    return this.windows.size;
  }
}
