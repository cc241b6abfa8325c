import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigManager,
  applyConfigToPipeline,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type AlertgateConfig,
  type ConfigReloadEvent
} from '../src/config/index.js';
import { SmartAlertPipeline } from '../src/alerting/pipeline.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { RecordingNotifier, createLog } from './helpers/pipeline.js';

function createConfig(): AlertgateConfig {
  return {
    app: { name: 'alertgate-test' },
    logging: { level: 'info' },
    state: { backend: 'memory', path: '' },
    alerting: {
      batchWindowMs: 60_000,
      dedupWindowMs: 300_000,
      maxAlertsPerHour: 20,
      defaultChannels: ['slack'],
      rules: [
        { name: 'prod-oncall', jobPattern: 'deploy-prod', minSeverity: 'high', channels: ['slack', 'email'] },
        { name: 'default', minSeverity: 'medium' }
      ],
      maintenanceWindows: [
        { name: 'db-upgrade', start: '2024-01-15T10:00:00Z', end: '2024-01-15T11:00:00Z', affectedJobs: ['migrate'] }
      ]
    }
  };
}

async function waitFor(predicate: () => boolean, timeout = 2000) {
  const start = Date.now();
  while (Date.now() - start < timeout) {
    if (predicate()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, 50));
  }
  throw new Error('Timed out waiting for condition');
}

describe('validateConfig', () => {
  it('accepts a complete configuration', () => {
    expect(() => validateConfig(createConfig())).not.toThrow();
  });

  it('accepts the shipped default configuration', () => {
    const defaults = loadConfigFromFile(path.resolve('config/default.json'));
    expect(defaults.alerting.rules?.map(rule => rule.name)).toEqual([
      'frontend-team',
      'production-oncall',
      'default'
    ]);
  });

  it('reports missing sections', () => {
    const { alerting: _alerting, ...rest } = createConfig();
    expect(() => validateConfig(rest)).toThrow('config.alerting is required');
  });

  it('reports every schema violation', () => {
    const base = createConfig();
    expect(() =>
      validateConfig({
        ...base,
        state: { backend: 'redis', path: 'x' },
        alerting: { ...base.alerting, maxAlertsPerHour: 0.5, defaultChannels: [] }
      })
    ).toThrow(
      'config.state.backend must be one of sqlite, json, memory; ' +
        'config.alerting.maxAlertsPerHour must be an integer; ' +
        'config.alerting.maxAlertsPerHour must be >= 1; ' +
        'config.alerting.defaultChannels must contain at least 1 item(s)'
    );
  });

  it('rejects unknown alerting keys', () => {
    const base = createConfig();
    expect(() => validateConfig({ ...base, alerting: { ...base.alerting, retries: 3 } })).toThrow(
      'config.alerting.retries is not allowed'
    );
  });

  it('rejects unknown log levels', () => {
    expect(() => validateConfig({ ...createConfig(), logging: { level: 'loud' } })).toThrow(
      'config.logging.level must be one of debug, error, fatal, info, silent, trace, warn'
    );
  });

  it('requires a state path for persistent backends', () => {
    expect(() => validateConfig({ ...createConfig(), state: { backend: 'json', path: '  ' } })).toThrow(
      'config.state.path must not be empty'
    );
  });

  it('rejects duplicate rule names', () => {
    const base = createConfig();
    expect(() =>
      validateConfig({ ...base, alerting: { ...base.alerting, rules: [{ name: 'a' }, { name: 'a' }] } })
    ).toThrow('config.alerting.rules[a].name must be unique');
  });

  it('checks maintenance window dates', () => {
    const base = createConfig();
    expect(() =>
      validateConfig({
        ...base,
        alerting: {
          ...base.alerting,
          maintenanceWindows: [
            { name: 'soon', start: 'next tuesday', end: '2024-01-15T11:00:00Z' },
            { name: 'backwards', start: '2024-01-15T11:00:00Z', end: '2024-01-15T10:00:00Z' }
          ]
        }
      })
    ).toThrow(
      'config.alerting.maintenanceWindows[soon].start must be an ISO-8601 date; ' +
        'config.alerting.maintenanceWindows[backwards].end must not be before start'
    );
  });

  it('rejects empty team names, destinations and affected jobs', () => {
    const base = createConfig();
    expect(() =>
      validateConfig({
        ...base,
        alerting: {
          ...base.alerting,
          rules: [{ name: 'r', teamName: '' }, { name: 's', destination: '  ' }],
          maintenanceWindows: [
            { name: 'w', start: '2024-01-15T10:00:00Z', end: '2024-01-15T11:00:00Z', affectedJobs: [''] }
          ]
        }
      })
    ).toThrow(
      'config.alerting.rules[r].teamName must not be empty; ' +
        'config.alerting.rules[s].destination must not be empty; ' +
        'config.alerting.maintenanceWindows[w].affectedJobs must not contain empty job names'
    );
  });
});

describe('parseConfig', () => {
  it('wraps JSON syntax errors', () => {
    expect(() => parseConfig('{')).toThrow(/^Failed to parse configuration: /);
  });

  it('returns the validated configuration', () => {
    expect(parseConfig(JSON.stringify(createConfig()))).toEqual(createConfig());
  });
});

describe('applyConfigToPipeline', () => {
  it('replaces rules and maintenance windows', () => {
    const pipeline = new SmartAlertPipeline({
      notifier: new RecordingNotifier(),
      log: createLog(),
      metrics: new MetricsRegistry()
    });
    pipeline.addRule({ name: 'stale' });

    expect(applyConfigToPipeline(pipeline, createConfig())).toEqual({ rules: 2, maintenanceWindows: 1 });
    expect(pipeline.listRules().map(rule => rule.name)).toEqual(['prod-oncall', 'default']);
    expect(pipeline.listWindows()).toEqual([
      {
        name: 'db-upgrade',
        start: '2024-01-15T10:00:00.000Z',
        end: '2024-01-15T11:00:00.000Z',
        affectedJobs: ['migrate']
      }
    ]);
  });

  it('leaves the pipeline untouched when a rule is invalid', () => {
    const pipeline = new SmartAlertPipeline({
      notifier: new RecordingNotifier(),
      log: createLog(),
      metrics: new MetricsRegistry()
    });
    pipeline.addRule({ name: 'kept' });
    const next = createConfig();
    next.alerting.rules = [{ name: 'broken', channels: [] }];

    expect(() => applyConfigToPipeline(pipeline, next)).toThrow(
      'rule "broken" channels must be a non-empty array of channel names'
    );
    expect(pipeline.listRules().map(rule => rule.name)).toEqual(['kept']);
  });

  it('keeps the current rules when a maintenance window is invalid', () => {
    const pipeline = new SmartAlertPipeline({
      notifier: new RecordingNotifier(),
      log: createLog(),
      metrics: new MetricsRegistry()
    });
    pipeline.addRule({ name: 'kept' });
    const next = createConfig();
    next.alerting.rules = [{ name: 'new-rule' }];
    next.alerting.maintenanceWindows = [
      { name: 'w', start: '2024-01-15T10:00:00Z', end: '2024-01-15T11:00:00Z', affectedJobs: [''] }
    ];

    expect(() => applyConfigToPipeline(pipeline, next)).toThrow(
      'maintenance window "w" affectedJobs must only contain non-empty strings'
    );
    expect(pipeline.listRules().map(rule => rule.name)).toEqual(['kept']);
    expect(pipeline.listWindows()).toEqual([]);
  });
});

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'alertgate-config-'));
    configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(createConfig(), null, 2));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reloads on demand and reports the previous configuration', () => {
    const manager = new ConfigManager(configPath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));

    const next = createConfig();
    next.alerting.maxAlertsPerHour = 5;
    fs.writeFileSync(configPath, JSON.stringify(next));

    expect(manager.reload().alerting.maxAlertsPerHour).toBe(5);
    expect(events).toHaveLength(1);
    expect(events[0].previous.alerting.maxAlertsPerHour).toBe(20);
    expect(manager.getConfig().alerting.maxAlertsPerHour).toBe(5);
  });

  it('throws from the constructor on an invalid file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ app: { name: 'x' } }));
    expect(() => new ConfigManager(configPath)).toThrow('config.logging is required');
  });

  it('picks up file changes while watching', async () => {
    const manager = new ConfigManager(configPath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));
    const stop = manager.watch();

    try {
      const next = createConfig();
      next.alerting.rules = [{ name: 'only' }];
      fs.writeFileSync(configPath, JSON.stringify(next));

      await waitFor(() => events.length > 0, 4000);
      expect(manager.getConfig().alerting.rules).toEqual([{ name: 'only' }]);
    } finally {
      stop();
    }
  });

  it('restores the last good file when a change is invalid', async () => {
    const original = fs.readFileSync(configPath, 'utf-8');
    const manager = new ConfigManager(configPath);
    const errors: Error[] = [];
    manager.on('error', (error: Error) => errors.push(error));
    const stop = manager.watch();

    try {
      fs.writeFileSync(configPath, '{"app": ');

      await waitFor(() => errors.length > 0, 4000);
      expect(errors[0].message).toMatch(/^Failed to parse configuration: /);
      await waitFor(() => fs.readFileSync(configPath, 'utf-8') === original, 4000);
      expect(manager.getConfig().alerting.maxAlertsPerHour).toBe(20);
    } finally {
      stop();
    }
  });
});
