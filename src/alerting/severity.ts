import type { AlertSeverity, AnomalyEvent } from '../types.js';

export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3
};

export const SEVERITY_LEVELS: AlertSeverity[] = ['low', 'medium', 'high', 'critical'];

export function isSeverity(value: unknown): value is AlertSeverity {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

/**
 * Case-insensitive lookup; returns null for anything outside the four ranks.
 */
export function parseSeverity(value: unknown): AlertSeverity | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  return isSeverity(normalized) ? normalized : null;
}

export function severityFromScore(score: number): AlertSeverity {
  if (score > 5) {
    return 'critical';
  }
  if (score > 4) {
    return 'high';
  }
  if (score > 2.5) {
    return 'medium';
  }
  return 'low';
}

/**
 * An explicit severity wins over the score ladder. Explicit values that are
 * not one of the known ranks classify as `low`, which is how they would rank.
 */
export function classifySeverity(event: AnomalyEvent): AlertSeverity {
  if (typeof event.severity === 'string') {
    return parseSeverity(event.severity) ?? 'low';
  }
  const score =
    typeof event.maxZScore === 'number' && Number.isFinite(event.maxZScore) ? event.maxZScore : 0;
  return severityFromScore(score);
}

export function severityMeets(severity: AlertSeverity, minimum: AlertSeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum];
}
