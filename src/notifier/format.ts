import type { AlertSeverity, AnomalyEvent } from '../types.js';
import { extractJobName } from '../alerting/fingerprint.js';

export const DEFAULT_BATCH_MAX_ITEMS = 10;

const TOP_FEATURES = 3;

function formatTime(now: number) {
  return new Date(now).toISOString().replace('T', ' ').slice(0, 19);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Slack-flavoured markdown for a single anomaly. Times are rendered in UTC.
 */
export function formatAnomalyMessage(event: AnomalyEvent, severity: AlertSeverity, now: number): string {
  const lines = [
    '🚨 *Anomaly Detected in CI/CD Pipeline*',
    '',
    `*Job/Workflow:* ${extractJobName(event)}`,
    `*Time:* ${formatTime(now)}`,
    `*Severity:* ${severity.toUpperCase()}`,
    ''
  ];

  const features = Array.isArray(event.anomalyFeatures) ? event.anomalyFeatures : [];
  if (features.length > 0) {
    lines.push('*Anomalous Metrics:*');
    for (const feature of features.slice(0, TOP_FEATURES)) {
      lines.push(
        `  • ${feature.feature}: ${feature.value.toFixed(2)} ` +
          `(expected: ${feature.expected.toFixed(2)}, z-score: ${feature.zScore.toFixed(2)})`
      );
    }
  }

  const data = event.data ?? {};
  const details: string[] = [];
  if (isFiniteNumber(data.duration)) {
    details.push(`*Build Duration:* ${data.duration.toFixed(1)}s`);
  }
  if (data.result !== undefined) {
    details.push(`*Result:* ${String(data.result)}`);
  }
  if (data.failureCount !== undefined) {
    details.push(`*Failures:* ${String(data.failureCount)}`);
  }
  if (details.length > 0) {
    lines.push('', ...details);
  }

  return `${lines.join('\n')}\n`;
}

export function formatBatchMessage(events: AnomalyEvent[], maxItems = DEFAULT_BATCH_MAX_ITEMS): string {
  const limit = Math.max(1, Math.floor(maxItems));
  const lines = [`🚨 *${events.length} Anomalies Detected in CI/CD Pipelines*`, ''];

  events.slice(0, limit).forEach((event, index) => {
    const detail = isFiniteNumber(event.maxZScore)
      ? `z-score: ${event.maxZScore.toFixed(2)}`
      : 'Detected by ML model';
    lines.push(`${index + 1}. *${extractJobName(event)}* - ${detail}`);
  });

  if (events.length > limit) {
    lines.push('', `... and ${events.length - limit} more`);
  }

  return `${lines.join('\n')}\n`;
}
