import { createHash } from 'node:crypto';
import type { AnomalyEvent } from '../types.js';

export const UNKNOWN_JOB = 'unknown';

export function extractJobName(event: AnomalyEvent): string {
  const data = event.data;
  if (!data) {
    return UNKNOWN_JOB;
  }
  if (typeof data.jobName === 'string' && data.jobName.length > 0) {
    return data.jobName;
  }
  if (typeof data.workflowName === 'string' && data.workflowName.length > 0) {
    return data.workflowName;
  }
  return UNKNOWN_JOB;
}

export function extractFeatureNames(event: AnomalyEvent): string[] {
  const features = Array.isArray(event.anomalyFeatures) ? event.anomalyFeatures : [];
  const names = new Set<string>();
  for (const entry of features) {
    if (entry && typeof entry.feature === 'string') {
      names.add(entry.feature);
    }
  }
  return Array.from(names).sort();
}

// md5 only needs to be stable across restarts, not collision-proof against an attacker.
export function fingerprintEvent(event: AnomalyEvent): string {
  const raw = `${extractJobName(event)}|${extractFeatureNames(event).join('|')}`;
  return createHash('md5').update(raw).digest('hex');
}
