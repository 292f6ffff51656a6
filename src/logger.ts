import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'Sentinel';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(entry => entry.toLowerCase())
);

type LogContext = {
  message?: string;
  component?: string;
};

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let component: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (value && typeof value === 'object' && !component && 'component' in value) {
      if (typeof value.component === 'string' && value.component.length > 0) {
        component = value.component;
      }
    }
  }

  return { message, component };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      const context = extractContext(inputArgs);
      if (!context.component) {
        const bound = this.bindings().component;
        if (typeof bound === 'string' && bound.length > 0) {
          context.component = bound;
        }
      }
      metrics.incrementLogLevel(resolvedLevel, context);
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

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(candidate: string) {
  if (!AVAILABLE_LOG_LEVELS.has(candidate)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${candidate}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export type Logger = pino.Logger;

export default logger;
