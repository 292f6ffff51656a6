import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  bootstrap,
  collectHealthChecks,
  createSentinel,
  registerRuntimeIndicators,
  type SentinelRuntime
} from './app.js';
import { SentinelError, toErrorPayload } from './errors.js';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import { runArchivalOnce } from './tasks/archival.js';
import type { FeedbackSignal } from './types.js';

type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export interface CliOptions {
  /** Reuse a runtime instead of building one from configuration. Left running afterwards. */
  runtime?: SentinelRuntime;
}

type ParsedArgs = {
  positionals: string[];
  json: boolean;
  help: boolean;
  limit?: number;
  camera?: string;
  olderThanDays?: number;
  errors: string[];
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1,
  starting: 2,
  stopping: 3
};

const USAGE_LINES = [
  'Sentinel CLI',
  '',
  'Usage:',
  '  sentinel start                      Start the lifecycle service and HTTP API',
  '  sentinel health [--json]            Print health checks',
  '  sentinel cameras [--json]           List cameras with model health',
  '  sentinel models <camera> [--json]   List model versions for a camera',
  '  sentinel jobs <camera> [--json]     List training jobs for a camera',
  '  sentinel events <camera> [--limit n] [--json]  List recent events with verdicts',
  '  sentinel deploy <model> [--camera id]  Deploy a model version',
  '  sentinel rollback <camera>          Restore the previous model version',
  '  sentinel feedback <false-positive|confirm> <verdict>  Record operator feedback',
  '  sentinel archive [--older-than days]  Archive retired model versions once',
  '  sentinel log-level [get|set <level>]  Get or set the active log level'
];

const LOG_LEVEL_USAGE = [
  'Sentinel log level commands',
  '',
  'Usage:',
  '  sentinel log-level            Show the current log level',
  '  sentinel log-level get        Show the current log level',
  '  sentinel log-level set <level>  Change the active log level',
  '  sentinel log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  options: CliOptions = {}
): Promise<number> {
  const command = argv[0] ?? 'help';
  const args = argv.slice(1);

  switch (command) {
    case 'start':
      return startService(io);
    case 'log-level':
      return runLogLevelCommand(args, io);
    case 'help':
    case '--help':
    case '-h':
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    case 'health':
    case 'cameras':
    case 'models':
    case 'jobs':
    case 'events':
    case 'deploy':
    case 'rollback':
    case 'feedback':
    case 'archive':
      break;
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
  }

  const parsed = parseArgs(args);
  if (parsed.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  return withRuntime(io, options, async runtime => {
    switch (command) {
      case 'health':
        return printHealth(runtime, parsed, io);
      case 'cameras':
        return printCameras(runtime, parsed, io);
      case 'models':
        return printModels(runtime, parsed, io);
      case 'jobs':
        return printJobs(runtime, parsed, io);
      case 'events':
        return printEvents(runtime, parsed, io);
      case 'deploy':
        return deployModel(runtime, parsed, io);
      case 'rollback':
        return rollbackCamera(runtime, parsed, io);
      case 'feedback':
        return recordFeedback(runtime, parsed, io);
      default:
        return archiveModels(runtime, parsed, io);
    }
  });
}

async function withRuntime(
  io: CliIo,
  options: CliOptions,
  action: (runtime: SentinelRuntime) => Promise<number>
): Promise<number> {
  let runtime: SentinelRuntime;
  try {
    runtime = options.runtime ?? (await createSentinel());
  } catch (error) {
    logger.error({ err: error }, 'Sentinel CLI failed to initialise');
    io.stderr.write(`Failed to initialise: ${toErrorPayload(error).reason}\n`);
    return 1;
  }

  try {
    return await action(runtime);
  } catch (error) {
    const payload = toErrorPayload(error);
    if (!(error instanceof SentinelError)) {
      logger.error({ err: error }, 'Sentinel CLI command failed');
    }
    io.stderr.write(`${payload.error}: ${payload.reason}\n`);
    return 1;
  } finally {
    if (!options.runtime) {
      await runtime.stop();
    }
  }
}

async function printHealth(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const dispose = registerRuntimeIndicators(runtime);
  try {
    const checks = await collectHealthChecks({ service: { status: 'ok', startedAt: null } });
    const status: HealthStatus = checks.some(check => check.status !== 'ok') ? 'degraded' : 'ok';
    if (args.json) {
      io.stdout.write(`${JSON.stringify({ status, checks })}\n`);
    } else {
      const lines = [`Status: ${status}`, ...checks.map(check => `  ${check.name}: ${check.status}`)];
      io.stdout.write(`${lines.join('\n')}\n`);
    }
    return resolveHealthExitCode(status);
  } finally {
    dispose();
  }
}

async function printCameras(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const health = runtime.cameraHealth();
  if (args.json) {
    io.stdout.write(`${JSON.stringify({ cameras: health })}\n`);
    return 0;
  }
  if (health.length === 0) {
    io.stdout.write('No cameras registered\n');
    return 0;
  }
  const lines = health.map(
    report => `${report.cameraId}\t${report.health}\tdeployed=${report.deployedModelId ?? '-'}\tedge=${report.edgeModelId ?? '-'}`
  );
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

async function printModels(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const cameraId = requirePositional(args, 0, 'camera');
  const models = runtime.catalog.listModels(cameraId);
  if (args.json) {
    io.stdout.write(`${JSON.stringify({ models })}\n`);
    return 0;
  }
  if (models.length === 0) {
    io.stdout.write(`No models for ${cameraId}\n`);
    return 0;
  }
  const lines = models.map(
    model => `v${model.version}\t${model.state}\t${model.id}\tthreshold=${formatNumber(model.threshold)}`
  );
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

async function printJobs(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const cameraId = requirePositional(args, 0, 'camera');
  const jobs = runtime.orchestrator.listJobs(cameraId);
  if (args.json) {
    io.stdout.write(`${JSON.stringify({ jobs })}\n`);
    return 0;
  }
  if (jobs.length === 0) {
    io.stdout.write(`No training jobs for ${cameraId}\n`);
    return 0;
  }
  const lines = jobs.map(job => {
    const outcome = job.failure ? `${job.failure.code}: ${job.failure.reason}` : job.modelVersionId ?? '-';
    return `${job.id}\t${job.status}\tepoch=${job.progress.epoch}\t${outcome}`;
  });
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

async function printEvents(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const cameraId = requirePositional(args, 0, 'camera');
  const events = runtime.store.listEvents({ cameraId, limit: args.limit ?? 20 });
  const rows = events.map(event => ({
    event,
    verdict: event.verdictId ? runtime.store.getVerdict(event.verdictId) : null
  }));
  if (args.json) {
    io.stdout.write(`${JSON.stringify({ events: rows })}\n`);
    return 0;
  }
  if (rows.length === 0) {
    io.stdout.write(`No events for ${cameraId}\n`);
    return 0;
  }
  const lines = rows.map(({ event, verdict }) => {
    const when = new Date(event.triggeredAt).toISOString();
    const summary = verdict ? `${verdict.riskLevel}\t${verdict.explanation}` : event.status;
    return `${event.id}\t${when}\t${summary}`;
  });
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}

async function deployModel(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const modelId = requirePositional(args, 0, 'model');
  const cameraId = args.camera ?? runtime.catalog.getModel(modelId).cameraId;
  const result = await runtime.distributor.deploy(modelId, cameraId);
  io.stdout.write(args.json ? `${JSON.stringify({ deployment: result })}\n` : `Deployed ${result.modelId} to ${cameraId}\n`);
  return 0;
}

async function rollbackCamera(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const cameraId = requirePositional(args, 0, 'camera');
  const result = await runtime.distributor.rollback(cameraId);
  io.stdout.write(
    args.json ? `${JSON.stringify({ deployment: result })}\n` : `Rolled back ${cameraId} to ${result.modelId}\n`
  );
  return 0;
}

async function recordFeedback(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const kind = requirePositional(args, 0, 'feedback kind');
  const verdictId = requirePositional(args, 1, 'verdict');
  let signal: FeedbackSignal;
  if (kind === 'false-positive') {
    signal = runtime.feedback.markFalsePositive(verdictId);
  } else if (kind === 'confirm') {
    signal = runtime.feedback.confirmThreat(verdictId);
  } else {
    throw new SentinelError('InvalidArgument', `Unknown feedback kind "${kind}" (expected false-positive or confirm)`);
  }
  io.stdout.write(args.json ? `${JSON.stringify({ signal })}\n` : `Recorded ${signal.kind} for verdict ${verdictId}\n`);
  return 0;
}

async function archiveModels(runtime: SentinelRuntime, args: ParsedArgs, io: CliIo) {
  const retention = runtime.config.retention;
  const result = await runArchivalOnce({
    catalog: runtime.catalog,
    olderThanDays: args.olderThanDays ?? retention.archiveAfterDays,
    logger: runtime.log,
    metrics: runtime.metrics
  });
  if (args.json) {
    io.stdout.write(`${JSON.stringify(result)}\n`);
  } else {
    io.stdout.write(`Archival completed: archived=${result.archived.length}, kept=${result.kept.length}\n`);
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

async function startService(io: CliIo): Promise<number> {
  try {
    await bootstrap();
    io.stdout.write('Sentinel started\n');
    return 0;
  } catch (error) {
    logger.error({ err: error }, 'Sentinel failed to start');
    io.stderr.write(`Failed to start: ${toErrorPayload(error).reason}\n`);
    return 1;
  }
}

function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { positionals: [], json: false, help: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    switch (token) {
      case '--json':
      case '-j':
        result.json = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--limit':
      case '--older-than': {
        const value = Number(args[index + 1]);
        if (!Number.isInteger(value) || value < 0) {
          result.errors.push(`Missing or invalid value for ${token}`);
        } else if (token === '--limit') {
          result.limit = value;
        } else {
          result.olderThanDays = value;
        }
        index += 1;
        break;
      }
      case '--camera': {
        const value = args[index + 1];
        if (!value || value.startsWith('-')) {
          result.errors.push('Missing value for --camera');
        } else {
          result.camera = value;
          index += 1;
        }
        break;
      }
      default:
        if (token.startsWith('-')) {
          result.errors.push(`Unknown option: ${token}`);
        } else {
          result.positionals.push(token);
        }
    }
  }
  return result;
}

function requirePositional(args: ParsedArgs, index: number, name: string): string {
  const value = args.positionals[index];
  if (!value) {
    throw new SentinelError('InvalidArgument', `Missing ${name} argument`);
  }
  return value;
}

function formatNumber(value: number) {
  return Number.isFinite(value) ? value.toFixed(6) : String(value);
}

export function resolveHealthExitCode(status: HealthStatus) {
  return HEALTH_EXIT_CODES[status] ?? 1;
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      if (code !== 0 || process.argv[2] !== 'start') {
        process.exit(code);
      }
    },
    error => {
      logger.error({ err: error }, 'Sentinel CLI failed');
      process.exit(1);
    }
  );
}
