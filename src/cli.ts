#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import { bootstrap, type AlertgateRuntime } from './app.js';
import { loadConfigFromFile } from './config/index.js';
import { parseAnomalyEvents } from './alerting/events.js';
import type { PipelineStats } from './alerting/stats.js';
import type { AnomalyEvent } from './types.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type CliDependencies = {
  createRuntime?: (configPath?: string) => AlertgateRuntime;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const DEFAULT_CONFIG_PATH = 'config/default.json';

const USAGE_LINES = [
  'alertgate CLI',
  '',
  'Usage:',
  '  alertgate stats [--json]          Print pipeline counters and suppression rate',
  '  alertgate rules                   List routing rules in evaluation order',
  '  alertgate windows [--all]         List active (or all) maintenance windows',
  '  alertgate replay <file> [--channels a,b] [--force]',
  '                                    Submit events from a JSON or NDJSON file, then flush',
  '  alertgate log-level               Get or set the active log level',
  '  alertgate config validate [path]  Validate a configuration file',
  '',
  'Options:',
  '  -c, --config <path>               Use an alternate configuration file',
  '  -h, --help                        Show this help message'
];

const LOG_LEVEL_USAGE = [
  'alertgate log level commands',
  '',
  'Usage:',
  '  alertgate log-level              Show the current log level',
  '  alertgate log-level get          Show the current log level',
  '  alertgate log-level set <level>  Change the active log level',
  '  alertgate log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const REPLAY_USAGE = [
  'Usage: alertgate replay <file> [--channels a,b] [--force]',
  '',
  'The file holds a JSON array, a single event object, or one event per line.',
  'Each event is submitted in file order; pending alerts are flushed at the end.'
].join('\n');

type GlobalArgs = {
  configPath?: string;
  rest: string[];
  errors: string[];
};

function parseGlobalArgs(argv: string[]): GlobalArgs {
  const result: GlobalArgs = { rest: [], errors: [] };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--config' || token === '-c') {
      const value = argv[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --config');
      } else {
        result.configPath = value;
        index += 1;
      }
      continue;
    }
    result.rest.push(token);
  }
  return result;
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: CliDependencies = {}
): Promise<number> {
  const globals = parseGlobalArgs(argv);
  if (globals.errors.length > 0) {
    io.stderr.write(`${globals.errors.join('\n')}\n`);
    return 1;
  }

  const [command = 'help', ...args] = globals.rest;
  const createRuntime =
    dependencies.createRuntime ?? ((configPath?: string) => bootstrap({ configPath }));
  const withRuntime = async (task: (runtime: AlertgateRuntime) => Promise<number> | number) => {
    let runtime: AlertgateRuntime;
    try {
      runtime = createRuntime(globals.configPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.stderr.write(`Failed to start pipeline: ${message}\n`);
      return 1;
    }
    try {
      return await task(runtime);
    } finally {
      runtime.close();
    }
  };

  switch (command) {
    case 'stats': {
      const json = args.includes('--json') || args.includes('-j');
      return withRuntime(runtime => printStats(runtime, io, { json }));
    }
    case 'rules': {
      return withRuntime(runtime => printRules(runtime, io));
    }
    case 'windows': {
      const all = args.includes('--all') || args.includes('-a');
      return withRuntime(runtime => printWindows(runtime, io, { all }));
    }
    case 'replay': {
      const replayArgs = parseReplayArgs(args);
      if (replayArgs.help) {
        io.stdout.write(`${REPLAY_USAGE}\n`);
        return 0;
      }
      if (replayArgs.errors.length > 0 || !replayArgs.file) {
        const errors = replayArgs.errors.length > 0 ? replayArgs.errors : ['Missing events file'];
        io.stderr.write(`${errors.join('\n')}\n`);
        io.stderr.write(`${REPLAY_USAGE}\n`);
        return 1;
      }
      const file = replayArgs.file;
      return withRuntime(runtime => replayEvents(runtime, io, { ...replayArgs, file }));
    }
    case 'log-level': {
      return runLogLevelCommand(args, io);
    }
    case 'config': {
      return runConfigCommand(args, globals.configPath, io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

function formatRate(rate: number) {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatStats(stats: PipelineStats): string[] {
  return [
    `Received: ${stats.totalReceived}`,
    `Sent: ${stats.totalSent}`,
    `Batched: ${stats.batched}`,
    `Suppressed: ${stats.totalSuppressed} (${formatRate(stats.suppressionRate)})`,
    `  duplicate: ${stats.suppressedDuplicate}`,
    `  maintenance: ${stats.suppressedMaintenance}`,
    `  rate limit: ${stats.suppressedRateLimit}`,
    `  severity: ${stats.suppressedSeverity}`,
    `Pending in batch: ${stats.pendingInBatch}`,
    `Alerts last hour: ${stats.alertsLastHour}`,
    `Rules: ${stats.registeredRules}`,
    `Active maintenance windows: ${stats.activeMaintenanceWindows}`
  ];
}

function printStats(runtime: AlertgateRuntime, io: CliIo, options: { json?: boolean }): number {
  const stats = runtime.pipeline.getStats();
  if (options.json) {
    io.stdout.write(`${JSON.stringify(stats)}\n`);
    return 0;
  }
  io.stdout.write(`${formatStats(stats).join('\n')}\n`);
  return 0;
}

function printRules(runtime: AlertgateRuntime, io: CliIo): number {
  const rules = runtime.pipeline.listRules();
  if (rules.length === 0) {
    io.stdout.write('No alert rules configured\n');
    return 0;
  }
  const lines = rules.map((rule, index) => {
    const parts = [
      `${index + 1}. ${rule.name}`,
      `pattern=${rule.jobPattern ?? '*'}`,
      `min=${rule.minSeverity}`,
      `channels=${rule.channels.join(',')}`
    ];
    if (rule.teamName) {
      parts.push(`team=${rule.teamName}`);
    }
    return parts.join(' ');
  });
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

function printWindows(runtime: AlertgateRuntime, io: CliIo, options: { all?: boolean }): number {
  const windows = options.all ? runtime.pipeline.listWindows() : runtime.pipeline.listActiveWindows();
  if (windows.length === 0) {
    io.stdout.write(options.all ? 'No maintenance windows configured\n' : 'No active maintenance windows\n');
    return 0;
  }
  const lines = windows.map(window => {
    const jobs = window.affectedJobs ? window.affectedJobs.join(',') : 'all jobs';
    return `${window.name} ${window.start} -> ${window.end} (${jobs})`;
  });
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

type ReplayArgs = {
  file?: string;
  channels?: string[];
  force: boolean;
  help?: boolean;
  errors: string[];
};

function parseReplayArgs(args: string[]): ReplayArgs {
  const result: ReplayArgs = { force: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--force' || token === '-f') {
      result.force = true;
      continue;
    }
    if (token === '--channels') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push('Missing value for --channels');
      } else {
        result.channels = value
          .split(',')
          .map(channel => channel.trim())
          .filter(channel => channel.length > 0);
        index += 1;
      }
      continue;
    }
    if (token.startsWith('-')) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }
    if (result.file) {
      result.errors.push(`Unexpected argument: ${token}`);
      continue;
    }
    result.file = token;
  }
  return result;
}

async function replayEvents(
  runtime: AlertgateRuntime,
  io: CliIo,
  options: ReplayArgs & { file: string }
): Promise<number> {
  let contents: string;
  try {
    contents = fs.readFileSync(path.resolve(options.file), 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to read events file: ${message}\n`);
    return 1;
  }

  let events: AnomalyEvent[];
  try {
    events = parseAnomalyEvents(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Invalid events file: ${message}\n`);
    return 1;
  }

  const { pipeline } = runtime;
  for (const [index, event] of events.entries()) {
    const outcome = await pipeline.submit(event, options.channels ?? null, options.force);
    const sent = outcome.reason === 'batch_flushed' ? (outcome.sent ? ' sent' : ' failed') : '';
    io.stdout.write(`${index + 1}. ${outcome.jobName} [${outcome.severity}] ${outcome.reason}${sent}\n`);
  }

  const pending = pipeline.getPendingBatch().size;
  if (pending === 0) {
    io.stdout.write('Flush: nothing pending\n');
  } else {
    const ok = await pipeline.flushNow(options.channels ?? null);
    io.stdout.write(`Flush: ${pending} pending, ${ok ? 'delivered' : 'delivery failed'}\n`);
  }
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

function runConfigCommand(args: string[], globalPath: string | undefined, io: CliIo): number {
  const [subcommand, explicitPath] = args;
  if (subcommand !== 'validate') {
    io.stderr.write(`Unknown config command: ${subcommand ?? '(none)'}\n`);
    io.stderr.write('Usage: alertgate config validate [path]\n');
    return 1;
  }

  const target = explicitPath ?? globalPath ?? DEFAULT_CONFIG_PATH;
  try {
    const loaded = loadConfigFromFile(target);
    const rules = loaded.alerting.rules?.length ?? 0;
    const windows = loaded.alerting.maintenanceWindows?.length ?? 0;
    io.stdout.write(
      `Configuration OK: ${target} (${rules} rule(s), ${windows} maintenance window(s))\n`
    );
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Invalid configuration: ${message}\n`);
    return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'alertgate CLI failed');
      process.exit(1);
    }
  );
}
