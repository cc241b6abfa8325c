import config from 'config';
import logger, { setLogLevel, type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { openStateDatabase, type StateDatabase } from './db.js';
import { ChannelNotifier, type FetchLike, type Notifier } from './notifier/index.js';
import { SmartAlertPipeline } from './alerting/pipeline.js';
import {
  JsonFileStateStore,
  MemoryStateStore,
  SqliteStateStore,
  type StateStore
} from './alerting/stateStore.js';
import {
  ConfigManager,
  applyConfigToPipeline,
  loadConfigFromFile,
  ruleInputsFromConfig,
  validateConfig,
  windowInputsFromConfig,
  type AlertgateConfig,
  type ConfigReloadEvent,
  type StateConfig
} from './config/index.js';

export type PipelineOverrides = {
  notifier?: Notifier;
  store?: StateStore | null;
  fetch?: FetchLike;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export type AlertgateRuntime = {
  config: AlertgateConfig;
  pipeline: SmartAlertPipeline;
  store: StateStore | null;
  close: () => void;
};

export type BootstrapOptions = PipelineOverrides & {
  configPath?: string;
  watch?: boolean;
};

type OpenedStore = {
  store: StateStore;
  database: StateDatabase | null;
};

export function createStateStore(state: StateConfig): OpenedStore {
  switch (state.backend) {
    case 'sqlite': {
      const database = openStateDatabase(state.path);
      return { store: new SqliteStateStore(database), database };
    }
    case 'json':
      return { store: new JsonFileStateStore(state.path), database: null };
    case 'memory':
      return { store: new MemoryStateStore(), database: null };
  }
}

/**
 * Builds a pipeline with the configured store, notifier, rules and
 * maintenance windows. Overrides replace the corresponding collaborator.
 */
export function createPipelineFromConfig(
  appConfig: AlertgateConfig,
  overrides: PipelineOverrides = {}
): AlertgateRuntime {
  const log = overrides.log ?? logger;
  const opened: OpenedStore | null =
    overrides.store === undefined ? createStateStore(appConfig.state) : null;
  const store = opened ? opened.store : overrides.store ?? null;

  const notifier =
    overrides.notifier ??
    new ChannelNotifier(appConfig.notifier ?? {}, { fetch: overrides.fetch, log, now: overrides.now });

  const pipeline = new SmartAlertPipeline(
    { notifier, store, log, metrics: overrides.metrics ?? metrics, now: overrides.now },
    {
      batchWindowMs: appConfig.alerting.batchWindowMs,
      dedupWindowMs: appConfig.alerting.dedupWindowMs,
      maxAlertsPerHour: appConfig.alerting.maxAlertsPerHour,
      defaultChannels: appConfig.alerting.defaultChannels
    }
  );
  pipeline.reconfigure(ruleInputsFromConfig(appConfig), windowInputsFromConfig(appConfig));

  return {
    config: appConfig,
    pipeline,
    store,
    close: () => {
      opened?.database?.close();
    }
  };
}

export function loadAppConfig(configPath?: string): AlertgateConfig {
  if (configPath) {
    return loadConfigFromFile(configPath);
  }
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}

export function bootstrap(options: BootstrapOptions = {}): AlertgateRuntime {
  const log = options.log ?? logger;
  log.info({ configPath: options.configPath ?? null }, 'alertgate bootstrap starting');

  const manager = options.watch ? new ConfigManager(options.configPath) : null;
  const appConfig = manager ? manager.getConfig() : loadAppConfig(options.configPath);
  const runtime = createPipelineFromConfig(appConfig, options);

  if (!manager) {
    log.info({ rules: runtime.pipeline.listRules().length }, 'Bootstrap completed');
    return runtime;
  }

  const stopWatching = manager.watch();
  const handleReload = ({ next }: ConfigReloadEvent) => {
    try {
      const applied = applyConfigToPipeline(runtime.pipeline, next);
      setLogLevel(next.logging.level);
      log.info({ ...applied, configPath: manager.getPath() }, 'configuration reloaded');
    } catch (error) {
      log.error({ err: error, configPath: manager.getPath() }, 'configuration reload could not be applied');
    }
  };
  const handleError = (error: unknown) => {
    log.warn(
      { err: error, configPath: manager.getPath(), action: 'reload', restored: true },
      'configuration reload failed'
    );
  };
  manager.on('reload', handleReload);
  manager.on('error', handleError);

  log.info({ rules: runtime.pipeline.listRules().length, watching: manager.getPath() }, 'Bootstrap completed');

  return {
    ...runtime,
    close: () => {
      manager.off('reload', handleReload);
      manager.off('error', handleError);
      stopWatching();
      runtime.close();
    }
  };
}
