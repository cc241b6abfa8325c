/**
 * Fingerprint -> last admitted send time. A fingerprint is a duplicate while
 * its record is younger than the window; stale records are dropped on write.
 */
export class DeduplicationStore {
  private records = new Map<string, number>();
  private readonly windowMs: number;

  constructor(windowMs: number) {
    this.windowMs = normalizeWindowMs(windowMs);
  }

  get size(): number {
    return this.records.size;
  }

  isDuplicate(fingerprint: string, now: number): boolean {
    const last = this.records.get(fingerprint);
    if (last === undefined) {
      return false;
    }
    return now - last < this.windowMs;
  }

  record(fingerprint: string, now: number) {
    this.records.set(fingerprint, now);
    this.prune(now);
  }

  prune(now: number) {
    const cutoff = now - this.windowMs;
    for (const [fingerprint, sentAt] of this.records) {
      if (sentAt <= cutoff) {
        this.records.delete(fingerprint);
      }
    }
  }

  restore(entries: Record<string, number>) {
    this.records = new Map(
      Object.entries(entries).filter(
        (entry): entry is [string, number] => typeof entry[1] === 'number' && Number.isFinite(entry[1])
      )
    );
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.records);
  }
}

function normalizeWindowMs(value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.floor(value);
}
