import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import logger, { type Logger } from '../logger.js';
import metrics, { type DeliveryKind, type MetricsRegistry } from '../metrics/index.js';
import type { Notifier } from '../notifier/index.js';
import type {
  AlertCounters,
  AlertRuleInput,
  AlertSeverity,
  AnomalyEvent,
  MaintenanceWindowInput,
  StateSnapshot,
  SubmitOutcome,
  SuppressionReason
} from '../types.js';
import { BatchAggregator, type BatchRoute, type PendingBatchView } from './batch.js';
import { DeduplicationStore } from './dedup.js';
import { extractJobName, fingerprintEvent } from './fingerprint.js';
import {
  isInMaintenance,
  isWindowActive,
  normalizeMaintenanceWindow,
  summarizeWindow,
  type MaintenanceWindow,
  type WindowSummary
} from './maintenance.js';
import { RateLimiter } from './rateLimit.js';
import {
  DEFAULT_CHANNELS,
  RuleRouter,
  summarizeRule,
  type AlertRule,
  type RuleSummary
} from './rules.js';
import { classifySeverity, severityMeets } from './severity.js';
import { createCounters, type StateStore } from './stateStore.js';
import { buildStats, mergeCounters, type PipelineStats } from './stats.js';

export type PipelineOptions = {
  batchWindowMs?: number;
  dedupWindowMs?: number;
  maxAlertsPerHour?: number;
  defaultChannels?: string[];
};

export interface PipelineDependencies {
  notifier: Notifier;
  store?: StateStore | null;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type FlushEvent = {
  kind: DeliveryKind;
  size: number;
  ok: boolean;
  channels: string[];
  jobs: string[];
  rule: string | null;
};

export const DEFAULT_BATCH_WINDOW_MS = 60_000;
export const DEFAULT_DEDUP_WINDOW_MS = 300_000;
export const DEFAULT_MAX_ALERTS_PER_HOUR = 20;

/** Channels used by a forced send when the caller names none. */
export const FORCE_CHANNELS: readonly string[] = ['slack', 'email', 'webhook'];

const SUPPRESSION_COUNTERS: Record<SuppressionReason, keyof AlertCounters> = {
  maintenance_window: 'suppressedMaintenance',
  duplicate: 'suppressedDuplicate',
  rate_limit: 'suppressedRateLimit',
  below_severity_threshold: 'suppressedSeverity'
};

type Admission =
  | { admitted: false; reason: SuppressionReason; rule: AlertRule | null }
  | { admitted: true; fingerprint: string; rule: AlertRule | null };

function buildRouter(inputs: AlertRuleInput[]): RuleRouter {
  const router = new RuleRouter();
  for (const input of inputs) {
    router.add(input);
  }
  return router;
}

function buildWindows(inputs: MaintenanceWindowInput[]): MaintenanceWindow[] {
  const windows: MaintenanceWindow[] = [];
  for (const input of inputs) {
    const window = normalizeMaintenanceWindow(input);
    if (windows.some(existing => existing.name === window.name)) {
      throw new Error(`maintenance window "${window.name}" is already registered`);
    }
    windows.push(window);
  }
  return windows;
}

function normalizeChannels(channels: string[] | null | undefined): string[] | null {
  if (!Array.isArray(channels)) {
    return null;
  }
  const cleaned = channels.map(channel => channel.trim()).filter(channel => channel.length > 0);
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * Decides, per anomaly event, whether a notification goes out now, later as
 * part of a batch, or not at all. Calls are applied one at a time in arrival
 * order; a call's gate decisions and any flush it triggers finish before the
 * next call starts.
 *
 * Emits `decision` with every {@link SubmitOutcome} and `flush` with a
 * {@link FlushEvent} for every delivery attempt.
 */
export class SmartAlertPipeline extends EventEmitter {
  private readonly notifier: Notifier;
  private readonly store: StateStore | null;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly defaultChannels: string[];
  private readonly dedup: DeduplicationStore;
  private readonly rateLimiter: RateLimiter;
  private readonly batch: BatchAggregator;
  private readonly counters: AlertCounters = createCounters();
  private readonly destinationNotifiers = new Map<string, Notifier>();
  private router = new RuleRouter();
  private windows: MaintenanceWindow[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dependencies: PipelineDependencies, options: PipelineOptions = {}) {
    super();
    this.notifier = dependencies.notifier;
    this.store = dependencies.store ?? null;
    this.log = dependencies.log ?? logger;
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
    this.defaultChannels = normalizeChannels(options.defaultChannels) ?? [...DEFAULT_CHANNELS];
    this.batch = new BatchAggregator(options.batchWindowMs ?? DEFAULT_BATCH_WINDOW_MS);
    this.dedup = new DeduplicationStore(options.dedupWindowMs ?? DEFAULT_DEDUP_WINDOW_MS);
    this.rateLimiter = new RateLimiter(options.maxAlertsPerHour ?? DEFAULT_MAX_ALERTS_PER_HOUR);
    this.loadState();
  }

  submit(event: AnomalyEvent, channelsOverride?: string[] | null, force = false): Promise<SubmitOutcome> {
    return this.enqueue(() => this.process(event, normalizeChannels(channelsOverride), force));
  }

  flushNow(channelsOverride?: string[] | null): Promise<boolean> {
    return this.enqueue(async () => {
      if (this.batch.size === 0) {
        return true;
      }
      const ok = await this.flushBatch(this.now(), normalizeChannels(channelsOverride));
      this.persist();
      return ok;
    });
  }

  addRule(input: AlertRuleInput): RuleSummary {
    const rule = this.router.add(input);
    this.log.info({ rule: rule.name, jobPattern: rule.jobPattern }, 'Added alert rule');
    return summarizeRule(rule);
  }

  removeRule(name: string): boolean {
    const removed = this.router.remove(name);
    if (removed) {
      this.log.info({ rule: name }, 'Removed alert rule');
    }
    return removed;
  }

  listRules(): RuleSummary[] {
    return this.router.list();
  }

  /**
   * Swaps the whole rule list. Nothing changes when any input is invalid.
   */
  replaceRules(inputs: AlertRuleInput[]) {
    const next = buildRouter(inputs);
    this.router = next;
    this.log.info({ rules: next.size }, 'Alert rules replaced');
  }

  /**
   * Swaps rules and maintenance windows together. Both lists are validated
   * before either is installed.
   */
  reconfigure(rules: AlertRuleInput[], windows: MaintenanceWindowInput[]) {
    const nextRouter = buildRouter(rules);
    const nextWindows = buildWindows(windows);
    this.router = nextRouter;
    this.windows = nextWindows;
    this.log.info({ rules: nextRouter.size, windows: nextWindows.length }, 'Alert routing reconfigured');
  }

  addMaintenanceWindow(input: MaintenanceWindowInput): WindowSummary {
    const window = normalizeMaintenanceWindow(input);
    if (this.windows.some(existing => existing.name === window.name)) {
      throw new Error(`maintenance window "${window.name}" is already registered`);
    }
    this.windows.push(window);
    this.log.info(
      { window: window.name, affectedJobs: window.affectedJobs },
      'Added maintenance window'
    );
    return summarizeWindow(window);
  }

  removeMaintenanceWindow(name: string): boolean {
    const before = this.windows.length;
    this.windows = this.windows.filter(window => window.name !== name);
    const removed = this.windows.length !== before;
    if (removed) {
      this.log.info({ window: name }, 'Removed maintenance window');
    }
    return removed;
  }

  listActiveWindows(): WindowSummary[] {
    const now = this.now();
    return this.windows.filter(window => isWindowActive(window, now)).map(summarizeWindow);
  }

  listWindows(): WindowSummary[] {
    return this.windows.map(summarizeWindow);
  }

  getStats(): PipelineStats {
    const now = this.now();
    return buildStats(this.counters, {
      pendingInBatch: this.batch.size,
      activeMaintenanceWindows: this.windows.filter(window => isWindowActive(window, now)).length,
      registeredRules: this.router.size,
      alertsLastHour: this.rateLimiter.countInWindow(now)
    });
  }

  getPendingBatch(): PendingBatchView {
    return this.batch.view();
  }

  /** Resolves once every call queued so far has finished. */
  async idle(): Promise<void> {
    await this.queue;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the caller observes failures through `run`; the chain itself must keep going
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async process(
    event: AnomalyEvent,
    channelsOverride: string[] | null,
    force: boolean
  ): Promise<SubmitOutcome> {
    const now = this.now();
    this.counters.totalReceived += 1;
    const jobName = extractJobName(event);
    const severity = classifySeverity(event);

    if (force) {
      const sent = await this.sendForced(event, jobName, channelsOverride ?? [...FORCE_CHANNELS], now);
      return this.decide({ sent, reason: 'batch_flushed', jobName, severity });
    }

    const admission = this.admit(event, jobName, severity, now);
    if (!admission.admitted) {
      this.counters[SUPPRESSION_COUNTERS[admission.reason]] += 1;
      const context = { jobName, severity, reason: admission.reason, rule: admission.rule?.name };
      if (admission.reason === 'rate_limit') {
        this.log.warn(context, 'Alert suppressed');
      } else {
        this.log.info(context, 'Alert suppressed');
      }
      return this.decide({ sent: false, reason: admission.reason, jobName, severity });
    }

    this.dedup.record(admission.fingerprint, now);
    const route: BatchRoute = { rule: admission.rule, channels: channelsOverride };
    this.batch.add({ event, jobName }, route, now);
    this.counters.batched += 1;

    if (this.batch.isDue(now)) {
      const sent = await this.flushBatch(now, channelsOverride);
      return this.decide({ sent, reason: 'batch_flushed', jobName, severity });
    }

    this.log.info({ jobName, severity, pending: this.batch.size }, 'Alert queued');
    return this.decide({ sent: false, reason: 'queued_in_batch', jobName, severity });
  }

  private admit(
    event: AnomalyEvent,
    jobName: string,
    severity: AlertSeverity,
    now: number
  ): Admission {
    if (isInMaintenance(this.windows, jobName, now)) {
      return { admitted: false, reason: 'maintenance_window', rule: null };
    }
    const fingerprint = fingerprintEvent(event);
    if (this.dedup.isDuplicate(fingerprint, now)) {
      return { admitted: false, reason: 'duplicate', rule: null };
    }
    if (this.rateLimiter.isLimited(now)) {
      return { admitted: false, reason: 'rate_limit', rule: null };
    }
    const rule = this.router.resolve(jobName);
    if (rule && !severityMeets(severity, rule.minSeverity)) {
      return { admitted: false, reason: 'below_severity_threshold', rule };
    }
    return { admitted: true, fingerprint, rule };
  }

  private decide(outcome: SubmitOutcome): SubmitOutcome {
    this.metrics.recordDecision(outcome);
    this.persist();
    this.emit('decision', outcome);
    return outcome;
  }

  private notifierFor(rule: AlertRule | null): Notifier {
    if (!rule?.destination) {
      return this.notifier;
    }
    let derived = this.destinationNotifiers.get(rule.destination);
    if (!derived) {
      derived = this.notifier.withDestination(rule.destination);
      this.destinationNotifiers.set(rule.destination, derived);
    }
    return derived;
  }

  private recordSend(now: number) {
    this.rateLimiter.record(now);
    this.counters.totalSent += 1;
  }

  private async sendForced(
    event: AnomalyEvent,
    jobName: string,
    channels: string[],
    now: number
  ): Promise<boolean> {
    this.recordSend(now);
    return this.deliver({
      kind: 'single',
      events: [event],
      jobs: [jobName],
      channels,
      notifier: this.notifier,
      rule: null
    });
  }

  private async flushBatch(now: number, channelsOverride: string[] | null): Promise<boolean> {
    const drained = this.batch.drain();
    if (!drained) {
      return true;
    }
    this.recordSend(now);
    const { rule, channels } = drained.route;
    try {
      return await this.deliver({
        kind: drained.entries.length === 1 ? 'single' : 'batch',
        events: drained.entries.map(entry => entry.event),
        jobs: Array.from(new Set(drained.entries.map(entry => entry.jobName))),
        channels: channelsOverride ?? channels ?? rule?.channels ?? this.defaultChannels,
        notifier: this.notifierFor(rule),
        rule
      });
    } finally {
      this.batch.settle();
    }
  }

  private async deliver(delivery: {
    kind: DeliveryKind;
    events: AnomalyEvent[];
    jobs: string[];
    channels: string[];
    notifier: Notifier;
    rule: AlertRule | null;
  }): Promise<boolean> {
    const { kind, events, jobs, notifier, rule } = delivery;
    const channels = kind === 'single' ? [...delivery.channels] : ['slack'];
    const start = performance.now();
    let ok = false;
    try {
      ok =
        kind === 'single'
          ? await notifier.sendOne(events[0], channels)
          : await notifier.sendBatch(events);
    } catch (error) {
      this.log.error({ err: error, jobs, kind }, 'Notifier threw during delivery');
    }
    const durationMs = performance.now() - start;

    this.metrics.recordDelivery({ kind, size: events.length, ok, durationMs, channels });
    if (ok) {
      this.log.info({ kind, size: events.length, jobs, channels, rule: rule?.name }, 'Alert sent');
    } else {
      this.log.error({ kind, size: events.length, jobs, channels, rule: rule?.name }, 'Alert delivery failed');
    }
    const flushEvent: FlushEvent = { kind, size: events.length, ok, channels, jobs, rule: rule?.name ?? null };
    this.emit('flush', flushEvent);
    return ok;
  }

  private snapshotState(): StateSnapshot {
    return {
      fingerprints: this.dedup.toJSON(),
      alertTimestamps: this.rateLimiter.toJSON(),
      stats: { ...this.counters }
    };
  }

  private loadState() {
    if (!this.store) {
      return;
    }
    try {
      const snapshot = this.store.load();
      if (!snapshot) {
        return;
      }
      this.dedup.restore(snapshot.fingerprints);
      this.rateLimiter.restore(snapshot.alertTimestamps);
      mergeCounters(this.counters, snapshot.stats);
      this.log.info(
        {
          fingerprints: this.dedup.size,
          alertTimestamps: snapshot.alertTimestamps.length
        },
        'Loaded alert state'
      );
    } catch (error) {
      this.metrics.recordStateFailure('load', error);
      this.log.warn({ err: error }, 'Could not load alert state');
    }
  }

  private persist() {
    if (!this.store) {
      return;
    }
    try {
      this.store.save(this.snapshotState());
    } catch (error) {
      this.metrics.recordStateFailure('save', error);
      this.log.warn({ err: error }, 'Could not save alert state');
    }
  }
}
