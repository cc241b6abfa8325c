export { SmartAlertPipeline, FORCE_CHANNELS } from './alerting/pipeline.js';
export type { PipelineDependencies, PipelineOptions, FlushEvent } from './alerting/pipeline.js';
export { classifySeverity, severityMeets, parseSeverity } from './alerting/severity.js';
export { extractJobName, fingerprintEvent } from './alerting/fingerprint.js';
export { parseAnomalyEvent, parseAnomalyEvents } from './alerting/events.js';
export {
  JsonFileStateStore,
  MemoryStateStore,
  SqliteStateStore,
  type StateStore
} from './alerting/stateStore.js';
export type { PipelineStats } from './alerting/stats.js';
export type { RuleSummary } from './alerting/rules.js';
export type { WindowSummary } from './alerting/maintenance.js';
export type { PendingBatchView } from './alerting/batch.js';
export {
  ChannelNotifier,
  formatAnomalyMessage,
  formatBatchMessage,
  type Notifier,
  type NotifierConfig
} from './notifier/index.js';
export {
  ConfigManager,
  applyConfigToPipeline,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type AlertgateConfig
} from './config/index.js';
export { bootstrap, createPipelineFromConfig, type AlertgateRuntime } from './app.js';
export { openStateDatabase } from './db.js';
export { MetricsRegistry } from './metrics/index.js';
export type * from './types.js';
