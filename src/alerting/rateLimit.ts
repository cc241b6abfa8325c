export const RATE_LIMIT_WINDOW_MS = 60 * 60 * 1000;

export class RateLimiter {
  private history: number[] = [];
  private readonly maxPerWindow: number;
  private readonly windowMs: number;

  constructor(maxPerWindow: number, windowMs = RATE_LIMIT_WINDOW_MS) {
    this.maxPerWindow = Math.max(1, Math.floor(maxPerWindow));
    this.windowMs = windowMs;
  }

  /**
   * Prunes the trailing window, then checks the remaining sends. Never records.
   */
  isLimited(now: number): boolean {
    this.prune(now);
    return this.history.length >= this.maxPerWindow;
  }

  record(now: number) {
    const last = this.history[this.history.length - 1];
    this.history.push(now);
    if (last !== undefined && now < last) {
      this.history.sort((a, b) => a - b);
    }
  }

  countInWindow(now: number): number {
    return this.history.filter(ts => now - ts < this.windowMs).length;
  }

  restore(timestamps: number[]) {
    this.history = timestamps
      .filter(ts => typeof ts === 'number' && Number.isFinite(ts))
      .sort((a, b) => a - b);
  }

  toJSON(): number[] {
    return [...this.history];
  }

  private prune(now: number) {
    let removeCount = 0;
    for (const ts of this.history) {
      if (now - ts < this.windowMs) {
        break;
      }
      removeCount += 1;
    }
    if (removeCount > 0) {
      this.history.splice(0, removeCount);
    }
  }
}
