interface WindowState {
  startMs: number;
  count: number;
}

/** Fixed-window limiter keyed by caller, one instance per protected route. */
export class FixedWindowRateLimiter {
  private readonly windows = new Map<string, WindowState>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number,
  ) {}

  allow(key: string, nowMs = Date.now()): boolean {
    const existing = this.windows.get(key);
    if (!existing || (nowMs - existing.startMs) >= this.windowMs) {
      this.windows.set(key, { startMs: nowMs, count: 1 });
      return true;
    }

    if (existing.count >= this.maxPerWindow) {
      return false;
    }

    existing.count += 1;
    return true;
  }

  /** Forgets callers whose window has closed. */
  prune(nowMs = Date.now()): number {
    let removed = 0;
    for (const [key, state] of this.windows) {
      if ((nowMs - state.startMs) >= this.windowMs) {
        this.windows.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get trackedKeys(): number {
    return this.windows.size;
  }
}
