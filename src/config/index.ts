import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import pino from 'pino';
import type { AlertSeverity, AlertRuleInput, MaintenanceWindowInput } from '../types.js';
import type { NotifierConfig } from '../notifier/index.js';
import { SEVERITY_LEVELS } from '../alerting/severity.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type StateBackend = 'sqlite' | 'json' | 'memory';

export type StateConfig = {
  backend: StateBackend;
  path: string;
};

export type AlertRuleConfig = {
  name: string;
  jobPattern?: string;
  minSeverity?: AlertSeverity;
  channels?: string[];
  teamName?: string;
  destination?: string;
};

export type MaintenanceWindowConfig = {
  name: string;
  start: string;
  end: string;
  affectedJobs?: string[];
};

export type AlertingConfig = {
  batchWindowMs: number;
  dedupWindowMs: number;
  maxAlertsPerHour: number;
  defaultChannels?: string[];
  rules?: AlertRuleConfig[];
  maintenanceWindows?: MaintenanceWindowConfig[];
};

export type AlertgateConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  state: StateConfig;
  alerting: AlertingConfig;
  notifier?: NotifierConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  minItems?: number;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  integer?: boolean;
};

const channelListSchema: JsonSchema = {
  type: 'array',
  minItems: 1,
  items: { type: 'string' }
};

const alertRuleSchema: JsonSchema = {
  type: 'object',
  required: ['name'],
  additionalProperties: false,
  properties: {
    name: { type: 'string' },
    jobPattern: { type: 'string' },
    minSeverity: { type: 'string', enum: [...SEVERITY_LEVELS] },
    channels: channelListSchema,
    teamName: { type: 'string' },
    destination: { type: 'string' }
  }
};

const maintenanceWindowSchema: JsonSchema = {
  type: 'object',
  required: ['name', 'start', 'end'],
  additionalProperties: false,
  properties: {
    name: { type: 'string' },
    start: { type: 'string' },
    end: { type: 'string' },
    affectedJobs: { type: 'array', items: { type: 'string' } }
  }
};

const alertgateConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'state', 'alerting'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    state: {
      type: 'object',
      required: ['backend', 'path'],
      additionalProperties: false,
      properties: {
        backend: { type: 'string', enum: ['sqlite', 'json', 'memory'] },
        path: { type: 'string' }
      }
    },
    alerting: {
      type: 'object',
      required: ['batchWindowMs', 'dedupWindowMs', 'maxAlertsPerHour'],
      additionalProperties: false,
      properties: {
        batchWindowMs: { type: 'number', minimum: 0 },
        dedupWindowMs: { type: 'number', minimum: 0 },
        maxAlertsPerHour: { type: 'number', minimum: 1, integer: true },
        defaultChannels: channelListSchema,
        rules: { type: 'array', items: alertRuleSchema },
        maintenanceWindows: { type: 'array', items: maintenanceWindowSchema }
      }
    },
    notifier: {
      type: 'object',
      additionalProperties: false,
      properties: {
        slackWebhookUrl: { type: 'string' },
        webhookUrl: { type: 'string' },
        timeoutMs: { type: 'number', minimum: 1 },
        batchMaxItems: { type: 'number', minimum: 1, integer: true },
        username: { type: 'string' }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push(`${pathLabel} must contain at least ${schema.minItems} item(s)`);
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

function assertSchema(config: unknown): asserts config is AlertgateConfig {
  const errors = validateAgainstSchema(alertgateConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is AlertgateConfig {
  assertSchema(config);
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): AlertgateConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): AlertgateConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

const LOG_LEVELS = new Set([...Object.keys(pino.levels.values), 'silent']);

function validateLogicalConfig(config: AlertgateConfig) {
  const messages: string[] = [];

  if (!LOG_LEVELS.has(config.logging.level.toLowerCase())) {
    messages.push(
      `config.logging.level must be one of ${Array.from(LOG_LEVELS).sort().join(', ')}`
    );
  }

  if (config.state.backend !== 'memory' && config.state.path.trim().length === 0) {
    messages.push('config.state.path must not be empty');
  }

  const ruleNames = new Set<string>();
  (config.alerting.rules ?? []).forEach((rule, index) => {
    const label = `config.alerting.rules[${rule.name || index}]`;
    if (rule.name.trim().length === 0) {
      messages.push(`${label}.name must not be empty`);
    } else if (ruleNames.has(rule.name)) {
      messages.push(`${label}.name must be unique`);
    }
    ruleNames.add(rule.name);
    if (rule.channels?.some(channel => channel.trim().length === 0)) {
      messages.push(`${label}.channels must not contain empty names`);
    }
    if (rule.teamName !== undefined && rule.teamName.trim().length === 0) {
      messages.push(`${label}.teamName must not be empty`);
    }
    if (rule.destination !== undefined && rule.destination.trim().length === 0) {
      messages.push(`${label}.destination must not be empty`);
    }
  });

  const windowNames = new Set<string>();
  (config.alerting.maintenanceWindows ?? []).forEach((window, index) => {
    const label = `config.alerting.maintenanceWindows[${window.name || index}]`;
    if (window.name.trim().length === 0) {
      messages.push(`${label}.name must not be empty`);
    } else if (windowNames.has(window.name)) {
      messages.push(`${label}.name must be unique`);
    }
    windowNames.add(window.name);
    if (window.affectedJobs?.some(job => job.length === 0)) {
      messages.push(`${label}.affectedJobs must not contain empty job names`);
    }

    const start = Date.parse(window.start);
    const end = Date.parse(window.end);
    if (Number.isNaN(start)) {
      messages.push(`${label}.start must be an ISO-8601 date`);
    }
    if (Number.isNaN(end)) {
      messages.push(`${label}.end must be an ISO-8601 date`);
    }
    if (!Number.isNaN(start) && !Number.isNaN(end) && end < start) {
      messages.push(`${label}.end must not be before start`);
    }
  });

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function ruleInputsFromConfig(config: AlertgateConfig): AlertRuleInput[] {
  return (config.alerting.rules ?? []).map(rule => ({ ...rule }));
}

export function windowInputsFromConfig(config: AlertgateConfig): MaintenanceWindowInput[] {
  return (config.alerting.maintenanceWindows ?? []).map(window => ({ ...window }));
}

type ReloadablePipeline = {
  reconfigure(rules: AlertRuleInput[], windows: MaintenanceWindowInput[]): void;
};

/**
 * Pushes the rules and maintenance windows of a reloaded configuration into a
 * running pipeline. Window sizes and limits only apply to new pipelines.
 */
export function applyConfigToPipeline(pipeline: ReloadablePipeline, next: AlertgateConfig) {
  const rules = ruleInputsFromConfig(next);
  const windows = windowInputsFromConfig(next);
  pipeline.reconfigure(rules, windows);
  return { rules: rules.length, maintenanceWindows: windows.length };
}

export type ConfigReloadEvent = {
  previous: AlertgateConfig;
  next: AlertgateConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: AlertgateConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): AlertgateConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): AlertgateConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: AlertgateConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    return { config: parseConfig(contents), raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export { alertgateConfigSchema };
