import { EventEmitter } from 'node:events';
import type { AlertSeverity, OutcomeReason } from '../types.js';

type CounterMap = Record<string, number>;

type HistogramSnapshot = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type PrometheusHistogramOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeSample = {
  value: number;
  labels?: Record<string, string>;
  sortKey?: number | string;
};

type PrometheusLogLevelOptions = {
  levelMetricName?: string;
  levelHelp?: string;
  stateMetricName?: string;
  stateHelp?: string;
  labels?: Record<string, string>;
};

type PrometheusDecisionOptions = {
  decisionMetricName?: string;
  decisionHelp?: string;
  deliveryMetricName?: string;
  deliveryHelp?: string;
  labels?: Record<string, string>;
};

export type DeliveryKind = 'single' | 'batch';

export type StateOperation = 'load' | 'save';

type DecisionMetric = {
  reason: OutcomeReason;
  jobName: string;
  severity: AlertSeverity;
};

type DeliveryMetric = {
  kind: DeliveryKind;
  size: number;
  ok: boolean;
  durationMs: number;
  channels: string[];
};

type MetricsSnapshot = {
  createdAt: string;
  decisions: {
    total: number;
    lastDecisionAt: string | null;
    byReason: CounterMap;
    bySeverity: CounterMap;
    byJob: CounterMap;
  };
  deliveries: {
    total: number;
    failed: number;
    lastDeliveryAt: string | null;
    lastFailureAt: string | null;
    byKind: CounterMap;
    byChannel: CounterMap;
    batchSize: HistogramSnapshot;
    latency: {
      count: number;
      totalMs: number;
      minMs: number;
      maxMs: number;
      averageMs: number;
    } | null;
  };
  state: {
    failures: CounterMap;
    lastError: string | null;
    lastErrorAt: string | null;
  };
  logs: {
    byLevel: CounterMap;
    byJob: Record<string, CounterMap>;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    currentLevel: string;
    lastLevelChangeAt: string | null;
    levelChanges: CounterMap;
  };
};

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const COUNTER_HISTOGRAM: HistogramConfig = {
  buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

const DELIVERY_LATENCY_METRIC = 'delivery.latency';
const BATCH_SIZE_METRIC = 'delivery.batchSize';

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByJob = new Map<string, Map<string, number>>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private readonly logLevelChangeCounters = new Map<string, number>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly decisionsByReason = new Map<string, number>();
  private readonly decisionsBySeverity = new Map<string, number>();
  private readonly decisionsByJob = new Map<string, number>();
  private totalDecisions = 0;
  private lastDecisionAt: number | null = null;
  private readonly deliveriesByKind = new Map<string, number>();
  private readonly deliveriesByChannel = new Map<string, number>();
  private totalDeliveries = 0;
  private failedDeliveries = 0;
  private lastDeliveryAt: number | null = null;
  private lastDeliveryFailureAt: number | null = null;
  private readonly stateFailures = new Map<string, number>();
  private lastStateError: string | null = null;
  private lastStateErrorAt: number | null = null;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();

  constructor() {
    this.ensureHistogram(DELIVERY_LATENCY_METRIC, DEFAULT_HISTOGRAM);
    this.ensureHistogram(BATCH_SIZE_METRIC, COUNTER_HISTOGRAM);
  }

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByJob.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.decisionsByReason.clear();
    this.decisionsBySeverity.clear();
    this.decisionsByJob.clear();
    this.totalDecisions = 0;
    this.lastDecisionAt = null;
    this.deliveriesByKind.clear();
    this.deliveriesByChannel.clear();
    this.totalDeliveries = 0;
    this.failedDeliveries = 0;
    this.lastDeliveryAt = null;
    this.lastDeliveryFailureAt = null;
    this.stateFailures.clear();
    this.lastStateError = null;
    this.lastStateErrorAt = null;
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramStats.clear();
    this.histogramConfigs.clear();
    this.ensureHistogram(DELIVERY_LATENCY_METRIC, DEFAULT_HISTOGRAM);
    this.ensureHistogram(BATCH_SIZE_METRIC, COUNTER_HISTOGRAM);
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  private ensureHistogram(metric: string, config: HistogramConfig) {
    const histogram = this.histograms.get(metric);
    if (histogram) {
      this.histogramConfigs.set(metric, config);
      return histogram;
    }
    const map = new Map<string, number>();
    this.histograms.set(metric, map);
    this.histogramConfigs.set(metric, config);
    return map;
  }

  incrementLogLevel(level: string, context?: { message?: string; job?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.job) {
      const jobMap = this.logLevelByJob.get(context.job) ?? new Map<string, number>();
      jobMap.set(normalized, (jobMap.get(normalized) ?? 0) + 1);
      this.logLevelByJob.set(context.job, jobMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized === normalized) {
      return;
    }
    if (previousNormalized) {
      this.lastLogLevelChangeAt = Date.now();
      this.logLevelChangeCounters.set(
        normalized,
        (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
      );
    }
  }

  recordDecision(decision: DecisionMetric) {
    this.totalDecisions += 1;
    this.lastDecisionAt = Date.now();
    increment(this.decisionsByReason, decision.reason);
    increment(this.decisionsBySeverity, decision.severity);
    increment(this.decisionsByJob, decision.jobName);
  }

  recordDelivery(delivery: DeliveryMetric) {
    this.totalDeliveries += 1;
    this.lastDeliveryAt = Date.now();
    increment(this.deliveriesByKind, delivery.kind);
    for (const channel of delivery.channels) {
      increment(this.deliveriesByChannel, channel);
    }
    if (!delivery.ok) {
      this.failedDeliveries += 1;
      this.lastDeliveryFailureAt = this.lastDeliveryAt;
    }
    this.observeHistogram(BATCH_SIZE_METRIC, delivery.size, COUNTER_HISTOGRAM);
    this.observeHistogram(DELIVERY_LATENCY_METRIC, delivery.durationMs, DEFAULT_HISTOGRAM);
    this.observeLatency(DELIVERY_LATENCY_METRIC, delivery.durationMs);
  }

  recordStateFailure(operation: StateOperation, error: unknown) {
    increment(this.stateFailures, operation);
    this.lastStateError = error instanceof Error ? error.message : String(error);
    this.lastStateErrorAt = Date.now();
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    const histogram = this.ensureHistogram(metric, histogramConfig);

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric);
      if (stats) {
        stats.sum += value;
        stats.count += 1;
      } else {
        this.histogramStats.set(metric, { sum: value, count: 1 });
      }
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  exportHistogramForPrometheus(metric: string, options: PrometheusHistogramOptions = {}): string {
    const histogram = this.histograms.get(metric);
    if (!histogram) {
      return '';
    }
    const histogramConfig = this.histogramConfigs.get(metric) ?? DEFAULT_HISTOGRAM;
    const stats = this.histogramStats.get(metric);
    return formatPrometheusHistogram(metric, histogram, histogramConfig, stats, options);
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byJob: mapFromNested(this.logLevelByJob),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: this.lastLogLevelChangeAt
        ? new Date(this.lastLogLevelChangeAt).toISOString()
        : null,
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const levelCounters = orderedLogLevelEntries(this.logLevelCounters);
    const levelMetric = formatPrometheusGauge(
      'logs.level.total',
      levelCounters.map(([level, value], index) => ({ value, labels: { level }, sortKey: index })),
      {
        metricName: options.levelMetricName ?? 'alertgate_log_level_total',
        help: options.levelHelp ?? 'Total log events grouped by Pino level',
        labels: baseLabels
      }
    );
    if (levelMetric) {
      lines.push(levelMetric);
    }

    const stateMetric = formatPrometheusGauge(
      'logs.level.state',
      [{ value: 1, labels: { level: this.currentLogLevel } }],
      {
        metricName: options.stateMetricName ?? 'alertgate_log_level_state',
        help: options.stateHelp ?? 'Current active Pino log level',
        labels: baseLabels
      }
    );
    if (stateMetric) {
      lines.push(stateMetric);
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  exportDecisionCountersForPrometheus(options: PrometheusDecisionOptions = {}) {
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const decisionMetric = formatPrometheusGauge(
      'decisions.total',
      Array.from(this.decisionsByReason.entries()).map(([reason, value]) => ({
        value,
        labels: { reason }
      })),
      {
        metricName: options.decisionMetricName ?? 'alertgate_decisions_total',
        help: options.decisionHelp ?? 'Pipeline decisions grouped by outcome reason',
        labels: baseLabels
      }
    );
    if (decisionMetric) {
      lines.push(decisionMetric);
    }

    const deliveryMetric = formatPrometheusGauge(
      'deliveries.total',
      [
        { value: this.totalDeliveries - this.failedDeliveries, labels: { outcome: 'ok' } },
        { value: this.failedDeliveries, labels: { outcome: 'failed' } }
      ],
      {
        metricName: options.deliveryMetricName ?? 'alertgate_deliveries_total',
        help: options.deliveryHelp ?? 'Notifier delivery attempts grouped by outcome',
        labels: baseLabels
      }
    );
    if (deliveryMetric) {
      lines.push(deliveryMetric);
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  snapshot(): MetricsSnapshot {
    const latency = this.latencyStats.get(DELIVERY_LATENCY_METRIC);
    return {
      createdAt: new Date().toISOString(),
      decisions: {
        total: this.totalDecisions,
        lastDecisionAt: this.lastDecisionAt ? new Date(this.lastDecisionAt).toISOString() : null,
        byReason: mapFrom(this.decisionsByReason),
        bySeverity: mapFrom(this.decisionsBySeverity),
        byJob: mapFrom(this.decisionsByJob)
      },
      deliveries: {
        total: this.totalDeliveries,
        failed: this.failedDeliveries,
        lastDeliveryAt: this.lastDeliveryAt ? new Date(this.lastDeliveryAt).toISOString() : null,
        lastFailureAt: this.lastDeliveryFailureAt
          ? new Date(this.lastDeliveryFailureAt).toISOString()
          : null,
        byKind: mapFrom(this.deliveriesByKind),
        byChannel: mapFrom(this.deliveriesByChannel),
        batchSize: mapHistogram(this.histograms.get(BATCH_SIZE_METRIC) ?? new Map()),
        latency: latency
          ? {
              count: latency.count,
              totalMs: latency.totalMs,
              minMs: latency.minMs,
              maxMs: latency.maxMs,
              averageMs: latency.count > 0 ? latency.totalMs / latency.count : 0
            }
          : null
      },
      state: {
        failures: mapFrom(this.stateFailures),
        lastError: this.lastStateError,
        lastErrorAt: this.lastStateErrorAt ? new Date(this.lastStateErrorAt).toISOString() : null
      },
      logs: {
        byLevel: mapLogLevelCounters(this.logLevelCounters),
        byJob: mapFromNested(this.logLevelByJob),
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage,
        currentLevel: this.currentLogLevel,
        lastLevelChangeAt: this.lastLogLevelChangeAt
          ? new Date(this.lastLogLevelChangeAt).toISOString()
          : null,
        levelChanges: mapFrom(this.logLevelChangeCounters)
      }
    };
  }
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function orderedLogLevelEntries(source: Map<string, number>): Array<[string, number]> {
  const normalized = new Map<string, number>();
  for (const [key, value] of source.entries()) {
    const lower = key.toLowerCase();
    normalized.set(lower, (normalized.get(lower) ?? 0) + value);
  }

  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    ordered.push([level, normalized.get(level) ?? 0]);
    normalized.delete(level);
  }

  const extras = Array.from(normalized.entries()).sort(([a], [b]) => a.localeCompare(b));
  return ordered.concat(extras);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const [level, value] of orderedLogLevelEntries(source)) {
    result[level] = value;
  }
  return result;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapHistogram(source: Map<string, number>): HistogramSnapshot {
  return Object.fromEntries(
    Array.from(source.entries()).sort(([a], [b]) => compareHistogramKeys(a, b))
  );
}

function compareHistogramKeys(a: string, b: string) {
  const extract = (key: string) => {
    if (key.startsWith('<')) {
      return [parseFloat(key.slice(1)), -1] as const;
    }
    if (key.endsWith('+')) {
      return [parseFloat(key.slice(0, -1)), Number.POSITIVE_INFINITY] as const;
    }
    const [start, end] = key.split('-').map(Number);
    return [start, end ?? start] as const;
  };

  const [aStart, aEnd] = extract(a);
  const [bStart, bEnd] = extract(b);
  if (aStart === bStart) {
    return aEnd - bEnd;
  }
  return aStart - bStart;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous = 0;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous === 0 ? undefined : previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

function sanitizeLabels(labels?: Record<string, string>): Record<string, string> {
  if (!labels) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    if (key === 'le') {
      continue;
    }
    result[key] = value;
  }
  return result;
}

function formatPrometheusHistogram(
  metricKey: string,
  histogram: Map<string, number>,
  config: HistogramConfig,
  stats: { sum: number; count: number } | undefined,
  options: PrometheusHistogramOptions
): string {
  const metricName = sanitizePrometheusMetricName(options.metricName ?? `alertgate_${metricKey}`);
  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} histogram`);

  const baseLabels = sanitizeLabels(options.labels);
  const baseLabelString = formatPrometheusLabels(baseLabels);

  let cumulative = 0;
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    const count = histogram.get(config.format(bucket, previous)) ?? 0;
    cumulative += count;
    const bucketLabels = { ...baseLabels, le: formatPrometheusValue(bucket) };
    lines.push(`${metricName}_bucket${formatPrometheusLabels(bucketLabels)} ${formatPrometheusValue(cumulative)}`);
    previous = bucket;
  }

  const overflowCount = histogram.get(`${config.buckets[config.buckets.length - 1]}+`) ?? 0;
  const totalCount = Math.max(cumulative + overflowCount, stats?.count ?? 0);
  lines.push(
    `${metricName}_bucket${formatPrometheusLabels({ ...baseLabels, le: '+Inf' })} ${formatPrometheusValue(totalCount)}`
  );
  lines.push(`${metricName}_sum${baseLabelString} ${formatPrometheusValue(stats?.sum ?? 0)}`);
  lines.push(`${metricName}_count${baseLabelString} ${formatPrometheusValue(totalCount)}`);

  return lines.join('\n');
}

function formatPrometheusGauge(
  metricKey: string,
  samples: PrometheusGaugeSample[],
  options: PrometheusGaugeOptions
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const metricName = sanitizePrometheusMetricName(options.metricName ?? `alertgate_${metricKey}`);
  const baseLabels = sanitizeLabels(options.labels);

  const normalized = filtered.map(sample => {
    const mergedLabels = { ...baseLabels, ...sanitizeLabels(sample.labels) };
    return {
      value: sample.value,
      labelString: formatPrometheusLabels(mergedLabels),
      sortKey: sample.sortKey
    };
  });

  normalized.sort((a, b) => {
    if (typeof a.sortKey === 'number' && typeof b.sortKey === 'number') {
      return a.sortKey - b.sortKey;
    }
    return a.labelString.localeCompare(b.labelString);
  });

  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} gauge`);
  for (const sample of normalized) {
    lines.push(`${metricName}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }

  return lines.join('\n');
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'alertgate_metric';
  }
  if (/^[0-9]/.test(lower)) {
    return `alertgate_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export type {
  DecisionMetric,
  DeliveryMetric,
  HistogramSnapshot,
  MetricsSnapshot,
  PrometheusDecisionOptions,
  PrometheusGaugeOptions,
  PrometheusHistogramOptions,
  PrometheusLogLevelOptions
};
export { MetricsRegistry, DELIVERY_LATENCY_METRIC, BATCH_SIZE_METRIC };
export default defaultRegistry;
