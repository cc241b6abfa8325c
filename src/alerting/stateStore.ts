import fs from 'node:fs';
import path from 'node:path';
import type { AlertCounters, StateSnapshot } from '../types.js';
import type { StateDatabase } from '../db.js';

export interface StateStore {
  load(): StateSnapshot | null;
  save(snapshot: StateSnapshot): void;
}

export const COUNTER_NAMES: readonly (keyof AlertCounters)[] = [
  'totalReceived',
  'totalSent',
  'suppressedDuplicate',
  'suppressedMaintenance',
  'suppressedRateLimit',
  'suppressedSeverity',
  'batched'
];

export function createCounters(): AlertCounters {
  return {
    totalReceived: 0,
    totalSent: 0,
    suppressedDuplicate: 0,
    suppressedMaintenance: 0,
    suppressedRateLimit: 0,
    suppressedSeverity: 0,
    batched: 0
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Coerces untrusted persisted data into a snapshot, dropping entries of the
 * wrong type. Throws when the value is not an object at all.
 */
export function normalizeSnapshot(value: unknown): StateSnapshot {
  if (!isRecord(value)) {
    throw new Error('state snapshot must be an object');
  }

  const fingerprints: Record<string, number> = {};
  if (isRecord(value.fingerprints)) {
    for (const [fingerprint, sentAt] of Object.entries(value.fingerprints)) {
      if (isFiniteNumber(sentAt)) {
        fingerprints[fingerprint] = sentAt;
      }
    }
  }

  const alertTimestamps = Array.isArray(value.alertTimestamps)
    ? value.alertTimestamps.filter(isFiniteNumber)
    : [];

  const stats = createCounters();
  if (isRecord(value.stats)) {
    const saved = value.stats;
    for (const name of COUNTER_NAMES) {
      const counter = saved[name];
      if (isFiniteNumber(counter)) {
        stats[name] = counter;
      }
    }
  }

  return { fingerprints, alertTimestamps, stats };
}

export class MemoryStateStore implements StateStore {
  private snapshot: StateSnapshot | null;

  constructor(initial: StateSnapshot | null = null) {
    this.snapshot = initial ? cloneSnapshot(initial) : null;
  }

  load(): StateSnapshot | null {
    return this.snapshot ? cloneSnapshot(this.snapshot) : null;
  }

  save(snapshot: StateSnapshot) {
    this.snapshot = cloneSnapshot(snapshot);
  }
}

export class JsonFileStateStore implements StateStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  load(): StateSnapshot | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse state file ${this.filePath}: ${message}`);
    }
    return normalizeSnapshot(parsed);
  }

  save(snapshot: StateSnapshot) {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(snapshot), 'utf-8');
  }
}

type FingerprintRow = { fingerprint: string; sent_at: number };
type SendRow = { ts: number };
type CounterRow = { name: string; value: number };

export class SqliteStateStore implements StateStore {
  private readonly db: StateDatabase;

  constructor(db: StateDatabase) {
    this.db = db;
  }

  load(): StateSnapshot | null {
    const fingerprintRows = this.db
      .prepare('SELECT fingerprint, sent_at FROM alert_fingerprints')
      .all() as FingerprintRow[];
    const sendRows = this.db.prepare('SELECT ts FROM alert_sends ORDER BY ts ASC').all() as SendRow[];
    const counterRows = this.db.prepare('SELECT name, value FROM alert_counters').all() as CounterRow[];

    if (fingerprintRows.length === 0 && sendRows.length === 0 && counterRows.length === 0) {
      return null;
    }

    return normalizeSnapshot({
      fingerprints: Object.fromEntries(fingerprintRows.map(row => [row.fingerprint, row.sent_at])),
      alertTimestamps: sendRows.map(row => row.ts),
      stats: Object.fromEntries(counterRows.map(row => [row.name, row.value]))
    });
  }

  save(snapshot: StateSnapshot) {
    const insertFingerprint = this.db.prepare(
      'INSERT INTO alert_fingerprints (fingerprint, sent_at) VALUES (?, ?)'
    );
    const insertSend = this.db.prepare('INSERT INTO alert_sends (ts) VALUES (?)');
    const upsertCounter = this.db.prepare(
      'INSERT INTO alert_counters (name, value) VALUES (?, ?) ON CONFLICT(name) DO UPDATE SET value = excluded.value'
    );

    const write = this.db.transaction((next: StateSnapshot) => {
      this.db.prepare('DELETE FROM alert_fingerprints').run();
      this.db.prepare('DELETE FROM alert_sends').run();
      for (const [fingerprint, sentAt] of Object.entries(next.fingerprints)) {
        insertFingerprint.run(fingerprint, Math.floor(sentAt));
      }
      for (const ts of next.alertTimestamps) {
        insertSend.run(Math.floor(ts));
      }
      for (const name of COUNTER_NAMES) {
        upsertCounter.run(name, Math.floor(next.stats[name]));
      }
    });

    write(snapshot);
  }
}

function cloneSnapshot(snapshot: StateSnapshot): StateSnapshot {
  return {
    fingerprints: { ...snapshot.fingerprints },
    alertTimestamps: [...snapshot.alertTimestamps],
    stats: { ...snapshot.stats }
  };
}
