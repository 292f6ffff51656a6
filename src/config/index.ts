import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { TrainingHyperparameters } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type StorageEncryptionConfig = {
  enabled: boolean;
  secret: string;
  salt?: string;
};

export type StorageConfig = {
  root: string;
  encryption?: StorageEncryptionConfig;
};

export type TrainingConfig = {
  minNormalSnapshots: number;
  concurrency: number;
  autoValidate?: boolean;
  sanityBoundMultiplier?: number;
  defaults?: Partial<TrainingHyperparameters>;
};

export type DistributionConfig = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor?: number;
  chunkSizeBytes?: number;
};

export type EdgeConfig = {
  preBufferFrames: number;
  postBufferFrames: number;
  cooldownMs?: number;
  submitAttempts?: number;
};

export type DetectorConfig = {
  modelPath: string;
  labelsPath?: string;
  labels?: string[];
  inputSize?: number;
  scoreThreshold?: number;
  nmsThreshold?: number;
  maxDetections?: number;
};

export type AnalysisConfig = {
  timeoutMs: number;
  batchSize: number;
  batchWindowMs: number;
  concurrency?: number;
  detector?: DetectorConfig;
};

export type BaselineConfig = {
  rebuildDelta: number;
  gridSize: number;
  timeBucketMinutes: number;
  minConfidence?: number;
  positionShare?: number;
};

export type ReasoningConfig = {
  correlationWindowMs: number;
  countMultiple: number;
  minClipCoverageMs: number;
  expectedFrequency?: number;
  dwellThresholdMs?: number;
  timezoneOffsetMinutes?: number;
};

export type ScoringConfig = {
  criticalAt: number;
  warningAt: number;
  feedbackWeight?: number;
};

export type IntakeConfig = {
  highWaterMark: number;
  minEdgeConfidence: number;
  maxClockSkewMs: number;
  duplicateWindowMs?: number;
};

export type RetentionConfig = {
  enabled?: boolean;
  archiveAfterDays: number;
  intervalMinutes?: number;
};

export type ServerConfig = {
  host?: string;
  port: number;
};

export type SentinelConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  storage: StorageConfig;
  training: TrainingConfig;
  distribution: DistributionConfig;
  edge: EdgeConfig;
  analysis: AnalysisConfig;
  baseline: BaselineConfig;
  reasoning: ReasoningConfig;
  intake: IntakeConfig;
  scoring?: ScoringConfig;
  retention?: RetentionConfig;
  server?: ServerConfig;
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
};

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

const positiveInteger: JsonSchema = { type: 'integer', minimum: 1 };
const nonNegativeInteger: JsonSchema = { type: 'integer', minimum: 0 };
const nonNegativeNumber: JsonSchema = { type: 'number', minimum: 0 };
const ratio: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };

const hyperparameterSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    inputWidth: positiveInteger,
    inputHeight: positiveInteger,
    channels: { type: 'integer', enum: [1, 3] },
    latentDim: positiveInteger,
    learningRate: { type: 'number', exclusiveMinimum: 0 },
    batchSize: positiveInteger,
    maxEpochs: positiveInteger,
    patience: positiveInteger,
    holdoutFraction: { type: 'number', exclusiveMinimum: 0, maximum: 0.9 },
    thresholdPercentile: { type: 'number', exclusiveMinimum: 0, maximum: 100 },
    seed: { type: 'integer' }
  }
};

const sentinelConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'app',
    'logging',
    'database',
    'storage',
    'training',
    'distribution',
    'edge',
    'analysis',
    'baseline',
    'reasoning',
    'intake'
  ],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      properties: { name: { type: 'string' } }
    },
    logging: {
      type: 'object',
      required: ['level'],
      properties: { level: { type: 'string', enum: LOG_LEVELS } }
    },
    database: {
      type: 'object',
      required: ['path'],
      properties: { path: { type: 'string' } }
    },
    storage: {
      type: 'object',
      required: ['root'],
      additionalProperties: false,
      properties: {
        root: { type: 'string' },
        encryption: {
          type: 'object',
          required: ['enabled', 'secret'],
          additionalProperties: false,
          properties: {
            enabled: { type: 'boolean' },
            secret: { type: 'string' },
            salt: { type: 'string' }
          }
        }
      }
    },
    training: {
      type: 'object',
      required: ['minNormalSnapshots', 'concurrency'],
      additionalProperties: false,
      properties: {
        minNormalSnapshots: positiveInteger,
        concurrency: positiveInteger,
        autoValidate: { type: 'boolean' },
        sanityBoundMultiplier: { type: 'number', minimum: 1 },
        defaults: hyperparameterSchema
      }
    },
    distribution: {
      type: 'object',
      required: ['maxAttempts', 'baseDelayMs', 'maxDelayMs'],
      additionalProperties: false,
      properties: {
        maxAttempts: positiveInteger,
        baseDelayMs: nonNegativeNumber,
        maxDelayMs: nonNegativeNumber,
        jitterFactor: ratio,
        chunkSizeBytes: positiveInteger
      }
    },
    edge: {
      type: 'object',
      required: ['preBufferFrames', 'postBufferFrames'],
      additionalProperties: false,
      properties: {
        preBufferFrames: nonNegativeInteger,
        postBufferFrames: nonNegativeInteger,
        cooldownMs: nonNegativeNumber,
        submitAttempts: positiveInteger
      }
    },
    analysis: {
      type: 'object',
      required: ['timeoutMs', 'batchSize', 'batchWindowMs'],
      additionalProperties: false,
      properties: {
        timeoutMs: { type: 'number', exclusiveMinimum: 0 },
        batchSize: positiveInteger,
        batchWindowMs: nonNegativeNumber,
        concurrency: positiveInteger,
        detector: {
          type: 'object',
          required: ['modelPath'],
          additionalProperties: false,
          properties: {
            modelPath: { type: 'string' },
            labelsPath: { type: 'string' },
            labels: { type: 'array', items: { type: 'string' } },
            inputSize: positiveInteger,
            scoreThreshold: ratio,
            nmsThreshold: ratio,
            maxDetections: positiveInteger
          }
        }
      }
    },
    baseline: {
      type: 'object',
      required: ['rebuildDelta', 'gridSize', 'timeBucketMinutes'],
      additionalProperties: false,
      properties: {
        rebuildDelta: nonNegativeNumber,
        gridSize: positiveInteger,
        timeBucketMinutes: { type: 'integer', minimum: 1, maximum: 1440 },
        minConfidence: ratio,
        positionShare: ratio
      }
    },
    reasoning: {
      type: 'object',
      required: ['correlationWindowMs', 'countMultiple', 'minClipCoverageMs'],
      additionalProperties: false,
      properties: {
        correlationWindowMs: nonNegativeNumber,
        countMultiple: { type: 'number', minimum: 1 },
        minClipCoverageMs: nonNegativeNumber,
        expectedFrequency: ratio,
        dwellThresholdMs: nonNegativeNumber,
        timezoneOffsetMinutes: { type: 'integer', minimum: -840, maximum: 840 }
      }
    },
    scoring: {
      type: 'object',
      required: ['criticalAt', 'warningAt'],
      additionalProperties: false,
      properties: {
        criticalAt: ratio,
        warningAt: ratio,
        feedbackWeight: ratio
      }
    },
    intake: {
      type: 'object',
      required: ['highWaterMark', 'minEdgeConfidence', 'maxClockSkewMs'],
      additionalProperties: false,
      properties: {
        highWaterMark: positiveInteger,
        minEdgeConfidence: nonNegativeNumber,
        maxClockSkewMs: nonNegativeNumber,
        duplicateWindowMs: nonNegativeNumber
      }
    },
    retention: {
      type: 'object',
      required: ['archiveAfterDays'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        archiveAfterDays: nonNegativeNumber,
        intervalMinutes: { type: 'number', exclusiveMinimum: 0 }
      }
    },
    server: {
      type: 'object',
      required: ['port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'integer', minimum: 0, maximum: 65535 }
      }
    }
  }
};

export function isRecord(value: unknown): value is Record<string, unknown> {
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

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.exclusiveMinimum === 'number' && value <= schema.exclusiveMinimum) {
      errors.push(`${pathLabel} must be > ${schema.exclusiveMinimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
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

export function validateConfig(config: unknown): asserts config is SentinelConfig {
  const errors = validateAgainstSchema(sentinelConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as SentinelConfig);
}

export function parseConfig(contents: string): SentinelConfig {
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

function validateLogicalConfig(config: SentinelConfig) {
  const messages: string[] = [];

  if (config.analysis.batchWindowMs >= config.analysis.timeoutMs) {
    messages.push('config.analysis.batchWindowMs must be below config.analysis.timeoutMs');
  }

  if (config.distribution.baseDelayMs > config.distribution.maxDelayMs) {
    messages.push('config.distribution.baseDelayMs must not exceed config.distribution.maxDelayMs');
  }

  if (config.scoring && config.scoring.warningAt > config.scoring.criticalAt) {
    messages.push('config.scoring.warningAt must not exceed config.scoring.criticalAt');
  }

  const defaults = config.training.defaults;
  if (defaults?.latentDim && defaults.inputWidth && defaults.inputHeight) {
    const inputSize = defaults.inputWidth * defaults.inputHeight * (defaults.channels ?? 1);
    if (defaults.latentDim >= inputSize) {
      messages.push('config.training.defaults.latentDim must be smaller than the input size');
    }
  }

  if (config.storage.encryption?.enabled && config.storage.encryption.secret.trim().length < 8) {
    messages.push('config.storage.encryption.secret must be at least 8 characters');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type RuntimeConfig = SentinelConfig & {
  scoring: ScoringConfig;
  retention: Required<RetentionConfig>;
  server: Required<ServerConfig>;
};

export const DEFAULT_SCORING: ScoringConfig = {
  criticalAt: 0.75,
  warningAt: 0.5,
  feedbackWeight: 0.15
};

export function resolveRuntimeConfig(config: SentinelConfig): RuntimeConfig {
  return {
    ...config,
    scoring: { ...DEFAULT_SCORING, ...config.scoring },
    retention: {
      enabled: config.retention?.enabled ?? true,
      archiveAfterDays: config.retention?.archiveAfterDays ?? 30,
      intervalMinutes: config.retention?.intervalMinutes ?? 60
    },
    server: {
      host: config.server?.host ?? '127.0.0.1',
      port: config.server?.port ?? 8080
    }
  };
}

export type ConfigReloadEvent = {
  previous: SentinelConfig;
  next: SentinelConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: SentinelConfig;
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

  getConfig(): SentinelConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): SentinelConfig {
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
        if (this.listenerCount('error') > 0) {
          this.emit('error', error instanceof Error ? error : new Error(String(error)));
        }
        this.restorePreviousConfig();
      }
    }, 100);
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
        this.closeWatcher();
        this.watcher = this.createWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: SentinelConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    return { config: parseConfig(contents), raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', error instanceof Error ? error : new Error(String(error)));
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

export { sentinelConfigSchema };
