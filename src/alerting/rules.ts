import type { AlertRuleInput, AlertSeverity } from '../types.js';
import { SEVERITY_LEVELS, parseSeverity } from './severity.js';

export const DEFAULT_CHANNELS: readonly string[] = ['slack'];

export interface AlertRule {
  name: string;
  jobPattern: string | null;
  minSeverity: AlertSeverity;
  channels: string[];
  teamName: string | null;
  destination: string | null;
}

export type RuleSummary = {
  name: string;
  jobPattern: string | null;
  minSeverity: AlertSeverity;
  channels: string[];
  teamName: string | null;
};

export function normalizeAlertRule(input: AlertRuleInput): AlertRule {
  const messages: string[] = [];
  const name = typeof input?.name === 'string' ? input.name.trim() : '';
  if (!name) {
    messages.push('rule name must be a non-empty string');
  }
  const label = name || '<unnamed>';

  let jobPattern: string | null = null;
  if (input?.jobPattern !== undefined && input.jobPattern !== null) {
    if (typeof input.jobPattern !== 'string') {
      messages.push(`rule "${label}" jobPattern must be a string`);
    } else {
      jobPattern = input.jobPattern;
    }
  }

  let minSeverity: AlertSeverity = 'low';
  if (input?.minSeverity !== undefined) {
    const parsed = parseSeverity(input.minSeverity);
    if (parsed) {
      minSeverity = parsed;
    } else {
      messages.push(`rule "${label}" minSeverity must be one of ${SEVERITY_LEVELS.join(', ')}`);
    }
  }

  let channels = [...DEFAULT_CHANNELS];
  if (input?.channels !== undefined) {
    if (
      !Array.isArray(input.channels) ||
      input.channels.length === 0 ||
      input.channels.some(channel => typeof channel !== 'string' || channel.trim().length === 0)
    ) {
      messages.push(`rule "${label}" channels must be a non-empty array of channel names`);
    } else {
      channels = input.channels.map(channel => channel.trim());
    }
  }

  const teamName = optionalString(input?.teamName, `rule "${label}" teamName`, messages);
  const destination = optionalString(input?.destination, `rule "${label}" destination`, messages);

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }

  return { name, jobPattern, minSeverity, channels, teamName, destination };
}

function optionalString(value: unknown, label: string, messages: string[]): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    messages.push(`${label} must be a non-empty string when provided`);
    return null;
  }
  return value;
}

/**
 * Case-insensitive substring match. A rule without a pattern matches every job.
 */
export function jobMatchesPattern(jobName: string, pattern: string | null): boolean {
  if (pattern === null) {
    return true;
  }
  return jobName.toLowerCase().includes(pattern.toLowerCase());
}

export function summarizeRule(rule: AlertRule): RuleSummary {
  return {
    name: rule.name,
    jobPattern: rule.jobPattern,
    minSeverity: rule.minSeverity,
    channels: [...rule.channels],
    teamName: rule.teamName
  };
}

/**
 * Ordered rule list; the first rule whose pattern matches wins.
 */
export class RuleRouter {
  private rules: AlertRule[] = [];

  get size(): number {
    return this.rules.length;
  }

  add(input: AlertRuleInput): AlertRule {
    const rule = normalizeAlertRule(input);
    if (this.rules.some(existing => existing.name === rule.name)) {
      throw new Error(`rule "${rule.name}" is already registered`);
    }
    this.rules.push(rule);
    return rule;
  }

  remove(name: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter(rule => rule.name !== name);
    return this.rules.length !== before;
  }

  resolve(jobName: string): AlertRule | null {
    for (const rule of this.rules) {
      if (jobMatchesPattern(jobName, rule.jobPattern)) {
        return rule;
      }
    }
    return null;
  }

  list(): RuleSummary[] {
    return this.rules.map(summarizeRule);
  }
}
