import type { AnomalyEvent, AnomalyEventData, AnomalyFeature } from '../types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(source: Record<string, unknown>, camel: string, snake: string): unknown {
  return source[camel] !== undefined ? source[camel] : source[snake];
}

function optionalNumber(value: unknown, label: string, messages: string[]): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    messages.push(`${label} must be a finite number`);
    return undefined;
  }
  return value;
}

function parseFeature(value: unknown, label: string, messages: string[]): AnomalyFeature | null {
  if (!isRecord(value)) {
    messages.push(`${label} must be an object`);
    return null;
  }
  if (typeof value.feature !== 'string' || value.feature.length === 0) {
    messages.push(`${label}.feature must be a non-empty string`);
    return null;
  }
  const numbers = {
    value: optionalNumber(value.value, `${label}.value`, messages),
    expected: optionalNumber(value.expected, `${label}.expected`, messages),
    zScore: optionalNumber(pick(value, 'zScore', 'z_score'), `${label}.zScore`, messages)
  };
  return {
    feature: value.feature,
    value: numbers.value ?? 0,
    expected: numbers.expected ?? 0,
    zScore: numbers.zScore ?? 0
  };
}

const KNOWN_DATA_KEYS = new Set([
  'jobName',
  'job_name',
  'workflowName',
  'workflow_name',
  'failureCount',
  'failure_count',
  'duration',
  'result'
]);

function parseData(value: unknown, label: string, messages: string[]): AnomalyEventData | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    messages.push(`${label} must be an object`);
    return undefined;
  }
  const data: AnomalyEventData = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!KNOWN_DATA_KEYS.has(key)) {
      data[key] = entry;
    }
  }

  const jobName = pick(value, 'jobName', 'job_name');
  if (typeof jobName === 'string') {
    data.jobName = jobName;
  }
  const workflowName = pick(value, 'workflowName', 'workflow_name');
  if (typeof workflowName === 'string') {
    data.workflowName = workflowName;
  }
  const failureCount = pick(value, 'failureCount', 'failure_count');
  if (failureCount !== undefined) {
    data.failureCount = optionalNumber(failureCount, `${label}.failureCount`, messages);
  }
  if (value.result !== undefined && value.result !== null) {
    data.result = String(value.result);
  }
  if (value.duration !== undefined) {
    data.duration = optionalNumber(value.duration, `${label}.duration`, messages);
  }
  return data;
}

/**
 * Reads an anomaly event from untrusted JSON. Both camelCase and snake_case
 * keys are accepted (`maxZScore` / `max_z_score`, `jobName` / `job_name`, ...).
 */
export function parseAnomalyEvent(value: unknown, label = 'event'): AnomalyEvent {
  const messages: string[] = [];
  if (!isRecord(value)) {
    throw new Error(`${label} must be an object`);
  }

  const event: AnomalyEvent = {};

  if (value.severity !== undefined && value.severity !== null) {
    if (typeof value.severity === 'string') {
      event.severity = value.severity;
    } else {
      messages.push(`${label}.severity must be a string`);
    }
  }

  const maxZScore = optionalNumber(pick(value, 'maxZScore', 'max_z_score'), `${label}.maxZScore`, messages);
  if (maxZScore !== undefined) {
    event.maxZScore = maxZScore;
  }

  const features = pick(value, 'anomalyFeatures', 'anomaly_features');
  if (features !== undefined && features !== null) {
    if (!Array.isArray(features)) {
      messages.push(`${label}.anomalyFeatures must be an array`);
    } else {
      event.anomalyFeatures = features
        .map((feature, index) => parseFeature(feature, `${label}.anomalyFeatures[${index}]`, messages))
        .filter((feature): feature is AnomalyFeature => feature !== null);
    }
  }

  const data = parseData(value.data, `${label}.data`, messages);
  if (data) {
    event.data = data;
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
  return event;
}

function parseSingleDocument(contents: string): unknown {
  try {
    return JSON.parse(contents);
  } catch {
    return undefined;
  }
}

/**
 * Accepts a JSON array of events, a single event object (pretty-printed or
 * not) or newline-delimited JSON.
 */
export function parseAnomalyEvents(contents: string): AnomalyEvent[] {
  const trimmed = contents.trim();
  if (trimmed.length === 0) {
    return [];
  }

  if (trimmed.startsWith('{')) {
    const single = parseSingleDocument(trimmed);
    if (isRecord(single)) {
      return [parseAnomalyEvent(single, 'events[0]')];
    }
  }

  let values: unknown[];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) {
      throw new Error('events file must contain a JSON array');
    }
    values = parsed;
  } else {
    values = [];
    trimmed.split(/\r?\n/).forEach((raw, index) => {
      const line = raw.trim();
      if (line.length === 0) {
        return;
      }
      try {
        const parsed: unknown = JSON.parse(line);
        values.push(parsed);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`line ${index + 1} is not valid JSON: ${message}`);
      }
    });
  }

  return values.map((value, index) => parseAnomalyEvent(value, `events[${index}]`));
}
