import { describe, expect, it } from 'vitest';
import {
  SmartAlertPipeline,
  type FlushEvent,
  type PipelineOptions
} from '../src/alerting/pipeline.js';
import { MemoryStateStore, createCounters, type StateStore } from '../src/alerting/stateStore.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { StateSnapshot, SubmitOutcome } from '../src/types.js';
import { HOUR, MINUTE, RecordingNotifier, anomaly, createClock, createLog } from './helpers/pipeline.js';

const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

function setup(options: PipelineOptions = {}, store: StateStore | null = null) {
  const clock = createClock(T0);
  const notifier = new RecordingNotifier();
  const log = createLog();
  const registry = new MetricsRegistry();
  const pipeline = new SmartAlertPipeline(
    { notifier, store, log, metrics: registry, now: clock.now },
    options
  );
  return { clock, notifier, log, registry, pipeline };
}

function immediate(options: PipelineOptions = {}, store: StateStore | null = null) {
  return setup({ batchWindowMs: 0, ...options }, store);
}

describe('SmartAlertPipeline gates', () => {
  it('suppresses duplicates until the dedup window has passed', async () => {
    const { clock, pipeline, notifier } = immediate();

    await expect(pipeline.submit(anomaly('build'))).resolves.toEqual({
      sent: true,
      reason: 'batch_flushed',
      jobName: 'build',
      severity: 'high'
    });

    clock.advance(4 * MINUTE);
    await expect(pipeline.submit(anomaly('build'))).resolves.toMatchObject({
      sent: false,
      reason: 'duplicate'
    });

    clock.advance(MINUTE);
    await expect(pipeline.submit(anomaly('build'))).resolves.toMatchObject({
      sent: true,
      reason: 'batch_flushed'
    });

    expect(notifier.calls).toHaveLength(2);
    expect(pipeline.getStats()).toMatchObject({
      totalReceived: 3,
      totalSent: 2,
      suppressedDuplicate: 1,
      batched: 2
    });
  });

  it('treats events with different anomalous features as distinct', async () => {
    const { pipeline } = immediate();

    await pipeline.submit(anomaly('build', { features: ['duration'] }));
    await expect(pipeline.submit(anomaly('build', { features: ['queue_time'] }))).resolves.toMatchObject({
      reason: 'batch_flushed'
    });
  });

  it('rate limits sends beyond the hourly maximum and resumes after an hour', async () => {
    const { clock, pipeline, log } = immediate({ maxAlertsPerHour: 2 });

    await pipeline.submit(anomaly('a'));
    clock.advance(MINUTE);
    await pipeline.submit(anomaly('b'));
    clock.advance(MINUTE);

    await expect(pipeline.submit(anomaly('c'))).resolves.toMatchObject({
      sent: false,
      reason: 'rate_limit'
    });
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ jobName: 'c', reason: 'rate_limit' }),
      'Alert suppressed'
    );

    clock.set(T0 + HOUR);
    await expect(pipeline.submit(anomaly('d'))).resolves.toMatchObject({
      sent: true,
      reason: 'batch_flushed'
    });
    expect(pipeline.getStats()).toMatchObject({ suppressedRateLimit: 1, alertsLastHour: 2 });
  });

  it('does not remember the fingerprint of a rate-limited event', async () => {
    const { clock, pipeline } = immediate({ maxAlertsPerHour: 1, dedupWindowMs: 2 * HOUR });

    await pipeline.submit(anomaly('a'));
    clock.advance(MINUTE);
    await expect(pipeline.submit(anomaly('b'))).resolves.toMatchObject({ reason: 'rate_limit' });

    clock.set(T0 + HOUR);
    await expect(pipeline.submit(anomaly('b'))).resolves.toMatchObject({
      sent: true,
      reason: 'batch_flushed'
    });
    expect(pipeline.getStats()).toMatchObject({ suppressedDuplicate: 0, suppressedRateLimit: 1, totalSent: 2 });
  });

  it('suppresses jobs inside a maintenance window', async () => {
    const { pipeline, notifier } = immediate();
    pipeline.addMaintenanceWindow({
      name: 'deploy-freeze',
      start: T0 - MINUTE,
      end: T0 + HOUR,
      affectedJobs: ['deploy-prod']
    });

    await expect(pipeline.submit(anomaly('deploy-prod'))).resolves.toMatchObject({
      sent: false,
      reason: 'maintenance_window'
    });
    await expect(pipeline.submit(anomaly('deploy-staging'))).resolves.toMatchObject({
      reason: 'batch_flushed'
    });
    expect(notifier.calls.map(call => call.events[0].data?.jobName)).toEqual(['deploy-staging']);
  });

  it('applies the severity threshold of the first matching rule', async () => {
    const { pipeline } = immediate();
    pipeline.addRule({ name: 'broad', jobPattern: 'deploy', minSeverity: 'critical' });
    pipeline.addRule({ name: 'prod', jobPattern: 'deploy-prod', minSeverity: 'low' });

    await expect(pipeline.submit(anomaly('deploy-prod-us'))).resolves.toEqual({
      sent: false,
      reason: 'below_severity_threshold',
      jobName: 'deploy-prod-us',
      severity: 'high'
    });
    await expect(pipeline.submit(anomaly('lint', { maxZScore: 1 }))).resolves.toMatchObject({
      reason: 'batch_flushed',
      severity: 'low'
    });
  });
});

describe('SmartAlertPipeline forced sends', () => {
  it('bypasses maintenance and the batch', async () => {
    const { pipeline, notifier } = setup();
    pipeline.addMaintenanceWindow({ name: 'freeze', start: T0 - MINUTE, end: T0 + HOUR });
    await pipeline.submit(anomaly('frozen'));

    await expect(pipeline.submit(anomaly('deploy-prod'), null, true)).resolves.toEqual({
      sent: true,
      reason: 'batch_flushed',
      jobName: 'deploy-prod',
      severity: 'high'
    });
    expect(notifier.calls).toEqual([
      {
        kind: 'single',
        events: [anomaly('deploy-prod')],
        channels: ['slack', 'email', 'webhook'],
        destination: null
      }
    ]);
    expect(pipeline.getStats()).toMatchObject({
      totalReceived: 2,
      totalSent: 1,
      suppressedMaintenance: 1,
      batched: 0,
      pendingInBatch: 0
    });
  });

  it('uses the caller channels and leaves dedup untouched', async () => {
    const { pipeline, notifier } = immediate();

    await pipeline.submit(anomaly('build'), ['email'], true);
    await expect(pipeline.submit(anomaly('build'))).resolves.toMatchObject({ reason: 'batch_flushed' });

    expect(notifier.calls.map(call => call.channels)).toEqual([['email'], ['slack']]);
  });
});

describe('SmartAlertPipeline batching', () => {
  it('holds a single event until flushNow', async () => {
    const { pipeline, notifier } = setup();
    const event = anomaly('a');

    await expect(pipeline.submit(event)).resolves.toMatchObject({ sent: false, reason: 'queued_in_batch' });
    expect(notifier.calls).toHaveLength(0);
    expect(pipeline.getPendingBatch()).toEqual({
      state: 'open',
      size: 1,
      openedAt: '2024-01-15T12:00:00.000Z',
      jobs: ['a']
    });

    await expect(pipeline.flushNow()).resolves.toBe(true);
    expect(notifier.calls).toEqual([{ kind: 'single', events: [event], channels: ['slack'], destination: null }]);
    expect(pipeline.getPendingBatch()).toEqual({ state: 'empty', size: 0, openedAt: null, jobs: [] });
  });

  it('returns true from flushNow when nothing is pending', async () => {
    const { pipeline, notifier } = setup();
    await expect(pipeline.flushNow()).resolves.toBe(true);
    expect(notifier.calls).toHaveLength(0);
  });

  it('flushes a multi-event batch once the window has elapsed', async () => {
    const { clock, pipeline, notifier } = setup();
    const flushes: FlushEvent[] = [];
    pipeline.on('flush', (event: FlushEvent) => flushes.push(event));

    await pipeline.submit(anomaly('a'));
    clock.advance(30_000);
    await pipeline.submit(anomaly('b'));
    clock.advance(30_000);

    await expect(pipeline.submit(anomaly('c'))).resolves.toMatchObject({ sent: true, reason: 'batch_flushed' });
    expect(notifier.calls).toHaveLength(1);
    expect(notifier.calls[0].kind).toBe('batch');
    expect(notifier.calls[0].events.map(event => event.data?.jobName)).toEqual(['a', 'b', 'c']);
    expect(flushes).toEqual([
      { kind: 'batch', size: 3, ok: true, channels: ['slack'], jobs: ['a', 'b', 'c'], rule: null }
    ]);
    expect(pipeline.getStats()).toMatchObject({ totalSent: 1, alertsLastHour: 1, batched: 3 });
  });

  it('counts a flushed batch as a single send against the hourly limit', async () => {
    const { clock, pipeline, notifier } = setup({ maxAlertsPerHour: 1 });

    await pipeline.submit(anomaly('a'));
    clock.advance(30_000);
    await pipeline.submit(anomaly('b'));
    clock.advance(30_000);
    await expect(pipeline.submit(anomaly('c'))).resolves.toMatchObject({ sent: true, reason: 'batch_flushed' });

    clock.advance(MINUTE);
    await expect(pipeline.submit(anomaly('d'))).resolves.toMatchObject({ sent: false, reason: 'rate_limit' });
    expect(notifier.calls).toHaveLength(1);
    expect(pipeline.getStats()).toMatchObject({ totalSent: 1, batched: 3, suppressedRateLimit: 1 });
  });

  it('routes a mixed batch through the rule of its first event', async () => {
    const { pipeline, notifier } = setup();
    const flushes: FlushEvent[] = [];
    pipeline.on('flush', (event: FlushEvent) => flushes.push(event));
    pipeline.addRule({
      name: 'api-team',
      jobPattern: 'api',
      channels: ['email'],
      destination: 'https://hooks.example.test/api-team'
    });

    await pipeline.submit(anomaly('api-build'));
    await pipeline.submit(anomaly('lint'));
    await pipeline.flushNow();

    expect(notifier.calls).toHaveLength(1);
    expect(notifier.calls[0]).toMatchObject({ kind: 'batch', destination: 'https://hooks.example.test/api-team' });
    expect(flushes[0].rule).toBe('api-team');
  });

  it('lets the flushing caller override the channels', async () => {
    const { pipeline, notifier } = setup();
    await pipeline.submit(anomaly('a'), ['email']);
    await pipeline.flushNow(['webhook']);

    expect(notifier.calls[0].channels).toEqual(['webhook']);
  });
});

describe('SmartAlertPipeline routing', () => {
  it('delivers through matching rule channels after the severity check', async () => {
    const { pipeline, notifier } = setup();
    pipeline.addRule({
      name: 'prod-oncall',
      jobPattern: 'deploy-prod',
      minSeverity: 'high',
      channels: ['slack', 'email']
    });
    pipeline.addRule({ name: 'default', minSeverity: 'medium' });
    const prodEvent = anomaly('deploy-prod-us', { severity: 'high' });

    await expect(pipeline.submit(prodEvent)).resolves.toEqual({
      sent: false,
      reason: 'queued_in_batch',
      jobName: 'deploy-prod-us',
      severity: 'high'
    });
    await expect(pipeline.submit(anomaly('deploy-staging', { severity: 'low' }))).resolves.toEqual({
      sent: false,
      reason: 'below_severity_threshold',
      jobName: 'deploy-staging',
      severity: 'low'
    });
    await expect(pipeline.flushNow()).resolves.toBe(true);

    expect(notifier.calls).toEqual([
      { kind: 'single', events: [prodEvent], channels: ['slack', 'email'], destination: null }
    ]);
    expect(pipeline.getStats()).toEqual({
      ...createCounters(),
      totalReceived: 2,
      totalSent: 1,
      suppressedSeverity: 1,
      batched: 1,
      totalSuppressed: 1,
      suppressionRate: 0.5,
      pendingInBatch: 0,
      activeMaintenanceWindows: 0,
      registeredRules: 2,
      alertsLastHour: 1
    });
  });

  it('sends through the rule destination', async () => {
    const { pipeline, notifier } = immediate();
    pipeline.addRule({ name: 'frontend', jobPattern: 'frontend', destination: 'https://hooks.example.test/frontend' });

    await pipeline.submit(anomaly('frontend-build'));
    await pipeline.submit(anomaly('backend-build'));

    expect(notifier.calls.map(call => call.destination)).toEqual(['https://hooks.example.test/frontend', null]);
  });

  it('prefers the submit override over rule channels', async () => {
    const { pipeline, notifier } = immediate();
    pipeline.addRule({ name: 'team', channels: ['email'] });

    await pipeline.submit(anomaly('a'), ['webhook']);
    await pipeline.submit(anomaly('b'));

    expect(notifier.calls.map(call => call.channels)).toEqual([['webhook'], ['email']]);
  });

  it('falls back to the configured default channels', async () => {
    const { pipeline, notifier } = immediate({ defaultChannels: ['webhook', 'slack'] });
    await pipeline.submit(anomaly('a'));
    expect(notifier.calls[0].channels).toEqual(['webhook', 'slack']);
  });
});

describe('SmartAlertPipeline delivery failures', () => {
  it('reports a rejected delivery without retrying', async () => {
    const { pipeline, notifier, registry } = immediate();
    notifier.failWith(false);

    await expect(pipeline.submit(anomaly('a'))).resolves.toMatchObject({ sent: false, reason: 'batch_flushed' });
    expect(notifier.calls).toHaveLength(1);
    expect(pipeline.getStats()).toMatchObject({ totalSent: 1, alertsLastHour: 1 });
    expect(registry.snapshot().deliveries).toMatchObject({ total: 1, failed: 1 });
  });

  it('treats a throwing notifier as a failed delivery', async () => {
    const { pipeline, notifier, log } = immediate();
    const failure = new Error('socket hang up');
    notifier.failWith(failure);
    const flushes: FlushEvent[] = [];
    pipeline.on('flush', (event: FlushEvent) => flushes.push(event));

    await expect(pipeline.submit(anomaly('a'))).resolves.toMatchObject({ sent: false, reason: 'batch_flushed' });
    expect(log.error).toHaveBeenCalledWith(
      { err: failure, jobs: ['a'], kind: 'single' },
      'Notifier threw during delivery'
    );
    expect(flushes[0].ok).toBe(false);
    expect(pipeline.getPendingBatch().state).toBe('empty');
  });
});

describe('SmartAlertPipeline state', () => {
  it('persists decisions and restores them in a new pipeline', async () => {
    const store = new MemoryStateStore();
    const first = immediate({}, store);
    await first.pipeline.submit(anomaly('build'));

    const saved = store.load();
    expect(saved?.alertTimestamps).toEqual([T0]);
    expect(Object.values(saved?.fingerprints ?? {})).toEqual([T0]);
    expect(saved?.stats).toEqual({ ...createCounters(), totalReceived: 1, totalSent: 1, batched: 1 });

    const second = immediate({}, store);
    await expect(second.pipeline.submit(anomaly('build'))).resolves.toMatchObject({ reason: 'duplicate' });
    expect(second.pipeline.getStats()).toMatchObject({
      totalReceived: 2,
      totalSent: 1,
      suppressedDuplicate: 1,
      alertsLastHour: 1
    });
  });

  it('adds loaded counters to its own', () => {
    const snapshot: StateSnapshot = {
      fingerprints: {},
      alertTimestamps: [],
      stats: { ...createCounters(), totalReceived: 5, suppressedSeverity: 2 }
    };
    const { pipeline } = setup({}, new MemoryStateStore(snapshot));
    expect(pipeline.getStats()).toMatchObject({ totalReceived: 5, suppressedSeverity: 2, totalSuppressed: 2 });
  });

  it('keeps running when the store fails', async () => {
    const failing: StateStore = {
      load() {
        throw new Error('disk unavailable');
      },
      save() {
        throw new Error('disk full');
      }
    };
    const { pipeline, log, registry } = immediate({}, failing);

    await expect(pipeline.submit(anomaly('a'))).resolves.toMatchObject({ sent: true });
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ err: expect.any(Error) }), 'Could not load alert state');
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ err: expect.any(Error) }), 'Could not save alert state');
    expect(registry.snapshot().state).toMatchObject({ failures: { load: 1, save: 1 }, lastError: 'disk full' });
  });
});

describe('SmartAlertPipeline ordering', () => {
  it('applies concurrent submits one at a time in arrival order', async () => {
    const { pipeline, notifier } = immediate();

    const outcomes = await Promise.all([
      pipeline.submit(anomaly('build')),
      pipeline.submit(anomaly('build')),
      pipeline.submit(anomaly('lint'))
    ]);

    expect(outcomes.map(outcome => outcome.reason)).toEqual(['batch_flushed', 'duplicate', 'batch_flushed']);
    expect(notifier.calls.map(call => call.events[0].data?.jobName)).toEqual(['build', 'lint']);
  });

  it('emits a decision for every submit', async () => {
    const { pipeline, registry } = setup();
    const decisions: SubmitOutcome[] = [];
    pipeline.on('decision', (outcome: SubmitOutcome) => decisions.push(outcome));

    await pipeline.submit(anomaly('a'));
    await pipeline.submit(anomaly('a'));

    expect(decisions.map(outcome => outcome.reason)).toEqual(['queued_in_batch', 'duplicate']);
    expect(registry.snapshot().decisions.byReason).toEqual({ duplicate: 1, queued_in_batch: 1 });
  });
});

describe('SmartAlertPipeline management', () => {
  it('rejects duplicate maintenance windows and removes by name', () => {
    const { pipeline, clock } = setup();
    pipeline.addMaintenanceWindow({ name: 'later', start: T0 + HOUR, end: T0 + 2 * HOUR });
    expect(() => pipeline.addMaintenanceWindow({ name: 'later', start: T0, end: T0 + 1 })).toThrow(
      'maintenance window "later" is already registered'
    );

    expect(pipeline.listActiveWindows()).toEqual([]);
    expect(pipeline.listWindows().map(window => window.name)).toEqual(['later']);
    clock.advance(HOUR);
    expect(pipeline.listActiveWindows().map(window => window.name)).toEqual(['later']);

    expect(pipeline.removeMaintenanceWindow('later')).toBe(true);
    expect(pipeline.removeMaintenanceWindow('later')).toBe(false);
  });

  it('replaces rules atomically', () => {
    const { pipeline } = setup();
    pipeline.addRule({ name: 'keep' });

    expect(() => pipeline.replaceRules([{ name: 'dup' }, { name: 'dup' }])).toThrow(
      'rule "dup" is already registered'
    );
    expect(pipeline.listRules().map(rule => rule.name)).toEqual(['keep']);

    pipeline.replaceRules([{ name: 'next', jobPattern: 'api' }]);
    expect(pipeline.listRules().map(rule => rule.name)).toEqual(['next']);
    expect(pipeline.removeRule('next')).toBe(true);
    expect(pipeline.removeRule('next')).toBe(false);
  });
});
