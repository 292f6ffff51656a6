import config from 'config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { BaselineBuilder } from './analysis/baselineBuilder.js';
import { DeepAnalysis } from './analysis/deepAnalysis.js';
import type { ObjectDetector } from './analysis/detector.js';
import { FeedbackService } from './analysis/feedback.js';
import { ReasoningEngine } from './analysis/reasoning.js';
import { RiskScorer } from './analysis/riskScoring.js';
import { createObjectDetector } from './analysis/yoloDetector.js';
import { DatasetStore } from './catalog/datasetStore.js';
import { ModelCatalog } from './catalog/modelCatalog.js';
import { LoopbackEdgeChannel, type EdgeChannel } from './channel/edgeChannel.js';
import {
  ConfigManager,
  resolveRuntimeConfig,
  validateConfig,
  type ConfigReloadEvent,
  type RuntimeConfig,
  type SentinelConfig
} from './config/index.js';
import { SentinelStore } from './db.js';
import { ModelDistributor } from './distribution/distributor.js';
import { EdgeAgent } from './edge/edgeAgent.js';
import { InferenceEngine } from './edge/inferenceEngine.js';
import { LifecycleBus } from './eventBus.js';
import { EventIntake } from './events/intake.js';
import logger, { setLogLevel, type Logger } from './logger.js';
import metrics, { type MetricsRegistry, type MetricsSnapshot } from './metrics/index.js';
import { VmPipeline } from './pipeline/vmPipeline.js';
import { startHttpServer } from './server/http.js';
import { EncryptedBlobStore, FileBlobStore, type BlobStore } from './storage/blobStore.js';
import { ArchivalTask } from './tasks/archival.js';
import { TrainingOrchestrator } from './training/orchestrator.js';
import type { CameraHealth } from './types.js';

type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredIndicator = {
  name: string;
  indicator: HealthIndicator;
};

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const healthIndicators: RegisteredIndicator[] = [];
const shutdownHooks: RegisteredHook[] = [];

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  const existingIndex = healthIndicators.findIndex(entry => entry.name === name);
  const entry: RegisteredIndicator = { name, indicator };
  if (existingIndex >= 0) {
    healthIndicators[existingIndex] = entry;
  } else {
    healthIndicators.push(entry);
  }

  return () => {
    const index = healthIndicators.findIndex(item => item.name === name);
    if (index >= 0) {
      healthIndicators.splice(index, 1);
    }
  };
}

export async function collectHealthChecks(context: HealthIndicatorContext) {
  const results: Array<{ name: string; status: HealthStatus; details?: Record<string, unknown> }> = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.indicator(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: { error: error instanceof Error ? error.message : String(error) }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({ name: entry.name, status: 'error', error: error instanceof Error ? error : new Error(String(error)) });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export function loadSentinelConfig(): RuntimeConfig {
  const raw: unknown = config.util.toObject(config);
  validateConfig(raw);
  return resolveRuntimeConfig(raw);
}

export type CameraHealthReport = {
  cameraId: string;
  health: CameraHealth;
  deployedModelId: string | null;
  edgeModelId: string | null;
};

export interface SentinelOptions {
  config?: SentinelConfig;
  store?: SentinelStore;
  blobs?: BlobStore;
  detector?: ObjectDetector;
  channel?: EdgeChannel;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
  random?: () => number;
}

export interface SentinelRuntime {
  config: RuntimeConfig;
  store: SentinelStore;
  blobs: BlobStore;
  bus: LifecycleBus;
  log: Logger;
  metrics: MetricsRegistry;
  detector: ObjectDetector;
  datasets: DatasetStore;
  catalog: ModelCatalog;
  orchestrator: TrainingOrchestrator;
  distributor: ModelDistributor;
  engine: InferenceEngine;
  agent: EdgeAgent;
  channel: EdgeChannel;
  intake: EventIntake;
  analysis: DeepAnalysis;
  baselines: BaselineBuilder;
  reasoning: ReasoningEngine;
  scorer: RiskScorer;
  feedback: FeedbackService;
  pipeline: VmPipeline;
  archival: ArchivalTask;
  cameraHealth(cameraId?: string): CameraHealthReport[];
  start(): void;
  whenIdle(): Promise<void>;
  stop(): Promise<void>;
}

export async function createSentinel(options: SentinelOptions = {}): Promise<SentinelRuntime> {
  const runtimeConfig = options.config ? resolveRuntimeConfig(options.config) : loadSentinelConfig();
  const log = options.log ?? logger;
  const registry = options.metrics ?? metrics;
  const now = options.now ?? Date.now;
  const bus = options.bus ?? new LifecycleBus({ log, metrics: registry });
  const ownsStore = !options.store;
  const store = options.store ?? new SentinelStore(runtimeConfig.database.path);
  const blobs = options.blobs ?? createBlobStore(runtimeConfig);
  const detector = options.detector ?? (await createObjectDetector(runtimeConfig.analysis.detector, log));
  const shared = { bus, log, metrics: registry, now };

  const datasets = new DatasetStore({ store, blobs, bus, log, now });
  const catalog = new ModelCatalog({
    store,
    blobs,
    bus,
    log,
    now,
    sanityBoundMultiplier: runtimeConfig.training.sanityBoundMultiplier
  });
  const orchestrator = new TrainingOrchestrator({ store, blobs, catalog, config: runtimeConfig.training, ...shared });

  const intake = new EventIntake({ store, blobs, config: runtimeConfig.intake, ...shared });
  const engine = new InferenceEngine({
    preBufferFrames: runtimeConfig.edge.preBufferFrames,
    postBufferFrames: runtimeConfig.edge.postBufferFrames,
    cooldownMs: runtimeConfig.edge.cooldownMs,
    log,
    metrics: registry,
    now
  });
  const agent = new EdgeAgent({
    engine,
    blobs,
    sink: intake,
    log,
    metrics: registry,
    now,
    submitRetry: {
      maxAttempts: runtimeConfig.edge.submitAttempts ?? 3,
      baseDelayMs: 200,
      maxDelayMs: 2000,
      jitterFactor: 0.2
    }
  });
  const channel = options.channel ?? new LoopbackEdgeChannel(agent);
  const distributor = new ModelDistributor({
    catalog,
    channel,
    config: runtimeConfig.distribution,
    bus,
    log,
    metrics: registry,
    random: options.random
  });

  const analysis = new DeepAnalysis({ detector, blobs, config: runtimeConfig.analysis, log, metrics: registry, now });
  const baselines = new BaselineBuilder({
    store,
    blobs,
    detector,
    config: runtimeConfig.baseline,
    timezoneOffsetMinutes: runtimeConfig.reasoning.timezoneOffsetMinutes,
    ...shared
  });
  const reasoning = new ReasoningEngine({ store, config: runtimeConfig.reasoning, log });
  const scorer = new RiskScorer({ store, config: runtimeConfig.scoring, now });
  const feedback = new FeedbackService({ store, ...shared });
  const pipeline = new VmPipeline({
    store,
    analysis,
    reasoning,
    scorer,
    baselines,
    options: { analysisConcurrency: runtimeConfig.analysis.concurrency },
    ...shared
  });
  intake.attachQueue(pipeline);

  const archival = new ArchivalTask({
    catalog,
    enabled: runtimeConfig.retention.enabled,
    olderThanDays: runtimeConfig.retention.archiveAfterDays,
    intervalMs: runtimeConfig.retention.intervalMinutes * 60_000,
    logger: log,
    metrics: registry,
    now
  });

  const cameraHealth = (cameraId?: string): CameraHealthReport[] => {
    const cameras = cameraId ? [store.getCamera(cameraId)].flatMap(camera => (camera ? [camera] : [])) : store.listCameras();
    return cameras.map(camera => {
      const deployed = catalog.getDeployed(camera.id);
      const edgeModelId = engine.activeModel(camera.id)?.modelId ?? null;
      let health: CameraHealth = 'ok';
      if (!deployed) {
        health = 'no_model';
      } else if (edgeModelId !== deployed.id) {
        health = 'degraded';
      }
      return { cameraId: camera.id, health, deployedModelId: deployed?.id ?? null, edgeModelId };
    });
  };

  let started = false;
  const runtime: SentinelRuntime = {
    config: runtimeConfig,
    store,
    blobs,
    bus,
    log,
    metrics: registry,
    detector,
    datasets,
    catalog,
    orchestrator,
    distributor,
    engine,
    agent,
    channel,
    intake,
    analysis,
    baselines,
    reasoning,
    scorer,
    feedback,
    pipeline,
    archival,
    cameraHealth,
    start() {
      if (started) {
        return;
      }
      started = true;
      pipeline.start();
      const failedJobs = orchestrator.recover();
      const requeued = intake.recover();
      if (runtimeConfig.retention.enabled) {
        archival.start();
      }
      log.info({ failedJobs, requeued, detector: detector.name }, 'Sentinel started');
    },
    async whenIdle() {
      await orchestrator.whenIdle();
      await agent.whenIdle();
      await pipeline.whenIdle();
    },
    async stop() {
      archival.stop();
      await agent.whenIdle();
      pipeline.stop();
      await orchestrator.whenIdle();
      if (ownsStore) {
        store.close();
      }
      started = false;
    }
  };
  return runtime;
}

export function registerRuntimeIndicators(runtime: SentinelRuntime) {
  const disposers = [
    registerHealthIndicator('database', () => ({
      status: 'ok',
      details: { schemaVersion: runtime.store.schemaVersion() }
    })),
    registerHealthIndicator('cameras', () => {
      const cameras = runtime.cameraHealth();
      const unhealthy = cameras.filter(camera => camera.health !== 'ok');
      return {
        status: unhealthy.length > 0 ? 'degraded' : 'ok',
        details: { cameras }
      };
    }),
    registerHealthIndicator('pipeline', () => {
      const depth = runtime.pipeline.depth();
      return {
        status: depth >= runtime.config.intake.highWaterMark ? 'degraded' : 'ok',
        details: { depth, highWaterMark: runtime.config.intake.highWaterMark }
      };
    }),
    registerHealthIndicator('detector', () => ({
      status: runtime.detector.available() ? 'ok' : 'degraded',
      details: { name: runtime.detector.name }
    }))
  ];
  return () => {
    disposers.forEach(dispose => dispose());
  };
}

/**
 * Applies the reloadable settings (log level, archival schedule) whenever the
 * watched configuration file changes. Invalid edits are rolled back by the manager.
 */
export function watchRuntimeConfig(runtime: SentinelRuntime, manager: ConfigManager) {
  const log = runtime.log.child({ component: 'config' });
  const handleReload = ({ next }: ConfigReloadEvent) => {
    const resolved = resolveRuntimeConfig(next);
    try {
      setLogLevel(resolved.logging.level);
    } catch (error) {
      log.warn({ err: error, level: resolved.logging.level }, 'Ignoring invalid log level');
    }
    runtime.archival.configure({
      enabled: resolved.retention.enabled,
      olderThanDays: resolved.retention.archiveAfterDays,
      intervalMs: resolved.retention.intervalMinutes * 60_000
    });
    log.info(
      { level: resolved.logging.level, archiveAfterDays: resolved.retention.archiveAfterDays },
      'configuration reloaded'
    );
  };
  const handleError = (error: Error) => {
    log.warn({ err: error, configPath: manager.getPath(), restored: true }, 'configuration reload failed');
  };

  const stopWatching = manager.watch();
  manager.on('reload', handleReload);
  manager.on('error', handleError);
  return () => {
    manager.off('reload', handleReload);
    manager.off('error', handleError);
    stopWatching();
  };
}

function createBlobStore(runtimeConfig: RuntimeConfig): BlobStore {
  const files = new FileBlobStore(runtimeConfig.storage.root);
  const encryption = runtimeConfig.storage.encryption;
  if (encryption?.enabled) {
    return new EncryptedBlobStore(files, { secret: encryption.secret, salt: encryption.salt });
  }
  return files;
}

export async function bootstrap() {
  logger.info('Sentinel bootstrap starting');
  const runtime = await createSentinel();
  runtime.start();
  registerRuntimeIndicators(runtime);
  const server = await startHttpServer({
    runtime,
    host: runtime.config.server.host,
    port: runtime.config.server.port
  });

  const configDir = config.util.getEnv('NODE_CONFIG_DIR') || path.resolve(process.cwd(), 'config');
  const stopWatching = watchRuntimeConfig(runtime, new ConfigManager(path.resolve(configDir, 'default.json')));

  registerShutdownHook('runtime', () => runtime.stop());
  registerShutdownHook('http', () => server.close());
  registerShutdownHook('config-watch', () => stopWatching());

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Sentinel shutting down');
    runShutdownHooks({ reason: 'signal', signal })
      .then(results => {
        const failed = results.filter(result => result.status === 'error');
        if (failed.length > 0) {
          logger.error({ hooks: failed.map(result => result.name) }, 'Shutdown hooks failed');
          process.exitCode = 1;
        }
      })
      .catch(error => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info({ port: server.port }, 'Bootstrap completed');
  return runtime;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
