import type { AnomalyEvent } from '../types.js';
import type { AlertRule } from './rules.js';

export type BatchState = 'empty' | 'open' | 'flushing';

/**
 * Route captured for the first event of an open batch. Every later event in the
 * same batch is delivered through it, whichever job it belongs to.
 */
export type BatchRoute = {
  rule: AlertRule | null;
  channels: string[] | null;
};

export type BatchEntry = {
  event: AnomalyEvent;
  jobName: string;
};

export type DrainedBatch = {
  entries: BatchEntry[];
  openedAt: number;
  route: BatchRoute;
};

export type PendingBatchView = {
  state: BatchState;
  size: number;
  openedAt: string | null;
  jobs: string[];
};

export class BatchAggregator {
  private entries: BatchEntry[] = [];
  private openedAt: number | null = null;
  private route: BatchRoute | null = null;
  private flushing = false;
  private readonly windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = Number.isFinite(windowMs) && windowMs > 0 ? Math.floor(windowMs) : 0;
  }

  get state(): BatchState {
    if (this.flushing) {
      return 'flushing';
    }
    return this.openedAt === null ? 'empty' : 'open';
  }

  get size(): number {
    return this.entries.length;
  }

  get openedTimestamp(): number | null {
    return this.openedAt;
  }

  add(entry: BatchEntry, route: BatchRoute, now: number) {
    if (this.openedAt === null) {
      this.openedAt = now;
      this.route = route;
    }
    this.entries.push(entry);
  }

  isDue(now: number): boolean {
    if (this.entries.length === 0 || this.openedAt === null) {
      return false;
    }
    return now - this.openedAt >= this.windowMs;
  }

  /**
   * Snapshots and clears the pending events. The caller delivers the returned
   * batch and must call `settle()` once delivery has finished.
   */
  drain(): DrainedBatch | null {
    if (this.entries.length === 0 || this.openedAt === null) {
      return null;
    }
    const drained: DrainedBatch = {
      entries: this.entries,
      openedAt: this.openedAt,
      route: this.route ?? { rule: null, channels: null }
    };
    this.entries = [];
    this.openedAt = null;
    this.route = null;
    this.flushing = true;
    return drained;
  }

  settle() {
    this.flushing = false;
  }

  view(): PendingBatchView {
    return {
      state: this.state,
      size: this.entries.length,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt).toISOString(),
      jobs: Array.from(new Set(this.entries.map(entry => entry.jobName)))
    };
  }
}
