import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics, { type PrometheusLogLevelOptions } from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'alertgate';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values)
    .map(level => level.toLowerCase())
    .concat('silent')
);

const levelEvents = new EventEmitter();

type LogContext = {
  message?: string;
  job?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function jobFrom(value: unknown): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  if (typeof value.jobName === 'string' && value.jobName.length > 0) {
    return value.jobName;
  }
  if (typeof value.job === 'string' && value.job.length > 0) {
    return value.job;
  }
  return undefined;
}

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let job: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      job = job ?? jobFrom(value) ?? jobFrom(value.outcome) ?? jobFrom(value.context);
      if (typeof value.message === 'string' && value.message.length > 0 && !message) {
        message = value.message;
      }
    }
  }

  return { message, job };
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value);
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
let lastLevelChangePrevious: string | null = null;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, lastLevelChangePrevious ?? currentLevel);
});

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = nextLevel.trim().toLowerCase();
  if (!isLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${normalized}" (available: ${available})`);
  }
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string | null) => void) {
  levelEvents.on('change', listener);
  return () => {
    levelEvents.off('change', listener);
  };
}

export function getLogLevelMetrics() {
  return metrics.exportLogLevelMetrics();
}

export function getLogLevelPrometheusMetrics(options?: PrometheusLogLevelOptions) {
  return metrics.exportLogLevelCountersForPrometheus(options);
}

type LogFn = (obj: object, msg?: string) => void;

/** The slice of the pino logger that components take as a dependency. */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export default logger;
