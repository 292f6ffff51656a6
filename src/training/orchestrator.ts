import { randomUUID } from 'node:crypto';
import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import { SentinelError, isSentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { SentinelStore } from '../db.js';
import type { ModelCatalog } from '../catalog/modelCatalog.js';
import type { TrainingConfig } from '../config/index.js';
import { contentChecksum, type BlobStore } from '../storage/blobStore.js';
import type {
  JobFailure,
  ModelVersion,
  TrainingHyperparameters,
  TrainingJob,
  TrainingProgress
} from '../types.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { WorkerPool } from '../utils/workerPool.js';
import { train, type TrainOptions, type TrainingOutcome, type TrainingSample } from './trainer.js';

export const DEFAULT_HYPERPARAMETERS: TrainingHyperparameters = {
  inputWidth: 32,
  inputHeight: 32,
  channels: 1,
  latentDim: 16,
  learningRate: 0.005,
  batchSize: 16,
  maxEpochs: 200,
  patience: 10,
  holdoutFraction: 0.2,
  thresholdPercentile: 95,
  seed: 1337
};

const EMPTY_PROGRESS: TrainingProgress = {
  epoch: 0,
  loss: null,
  validationError: null,
  bestValidationError: null
};

export type JobStatusView = Pick<TrainingJob, 'id' | 'status' | 'progress' | 'modelVersionId' | 'failure'>;

type Trainer = (samples: TrainingSample[], options: TrainOptions) => Promise<TrainingOutcome>;

interface TrainingOrchestratorDependencies {
  store: SentinelStore;
  blobs: BlobStore;
  catalog: ModelCatalog;
  config: TrainingConfig;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
  trainer?: Trainer;
  createModel?: TrainOptions['createModel'];
}

export class TrainingOrchestrator {
  private readonly store: SentinelStore;
  private readonly blobs: BlobStore;
  private readonly catalog: ModelCatalog;
  private readonly config: TrainingConfig;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly trainer: Trainer;
  private readonly createModel: TrainOptions['createModel'];
  private readonly pool: WorkerPool;
  private readonly leases = new KeyedMutex();
  private readonly controllers = new Map<string, AbortController>();
  private readonly settled = new Set<Promise<void>>();
  private running = 0;

  constructor(dependencies: TrainingOrchestratorDependencies) {
    this.store = dependencies.store;
    this.blobs = dependencies.blobs;
    this.catalog = dependencies.catalog;
    this.config = dependencies.config;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'training' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
    this.trainer = dependencies.trainer ?? train;
    this.createModel = dependencies.createModel;
    this.pool = new WorkerPool(this.config.concurrency);
  }

  submitTrainingJob(
    cameraId: string,
    datasetId: string,
    hyperparameters: Partial<TrainingHyperparameters> = {}
  ): string {
    if (!this.store.getCamera(cameraId)) {
      throw new SentinelError('NotFound', `Camera ${cameraId} not found`);
    }
    const dataset = this.store.getDataset(datasetId);
    if (!dataset || dataset.cameraId !== cameraId) {
      throw new SentinelError('NotFound', `Dataset ${datasetId} not found for camera ${cameraId}`);
    }
    const active = this.store.findActiveJob(cameraId);
    if (active) {
      throw new SentinelError('AlreadyRunning', `Job ${active.id} is ${active.status} for camera ${cameraId}`, {
        details: { jobId: active.id }
      });
    }
    if (dataset.status === 'open') {
      throw new SentinelError('InvalidTransition', `Dataset ${datasetId} is still open`);
    }
    if (this.store.findTerminalJobForDataset(datasetId)) {
      throw new SentinelError('InvalidTransition', `Dataset ${datasetId} already has a finished job`);
    }
    const normalCount = dataset.labelCounts.normal;
    if (normalCount < this.config.minNormalSnapshots) {
      throw new SentinelError(
        'InsufficientData',
        `Dataset has ${normalCount} normal snapshots, ${this.config.minNormalSnapshots} required`
      );
    }

    const job: TrainingJob = {
      id: randomUUID(),
      cameraId,
      datasetId,
      hyperparameters: resolveHyperparameters(this.config.defaults, hyperparameters),
      status: 'queued',
      progress: { ...EMPTY_PROGRESS },
      modelVersionId: null,
      failure: null,
      createdAt: this.now(),
      startedAt: null,
      finishedAt: null
    };
    this.store.insertJob(job);
    this.bus.publish({ topic: 'job', kind: 'queued', subjectId: job.id, cameraId, meta: { datasetId } });

    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    const settled = this.pool
      .run(() => this.leases.runExclusive(cameraId, () => this.execute(job.id, controller.signal)))
      .catch(error => {
        this.log.error({ err: error, jobId: job.id }, 'Training job crashed');
      })
      .finally(() => {
        this.controllers.delete(job.id);
        this.settled.delete(settled);
      });
    this.settled.add(settled);
    return job.id;
  }

  getJob(jobId: string): TrainingJob {
    const job = this.store.getJob(jobId);
    if (!job) {
      throw new SentinelError('NotFound', `Job ${jobId} not found`);
    }
    return job;
  }

  getJobStatus(jobId: string): JobStatusView {
    const { id, status, progress, modelVersionId, failure } = this.getJob(jobId);
    return { id, status, progress, modelVersionId, failure };
  }

  listJobs(cameraId: string): TrainingJob[] {
    return this.store.listJobs(cameraId);
  }

  cancelJob(jobId: string): TrainingJob {
    const job = this.getJob(jobId);
    if (job.status !== 'queued' && job.status !== 'running') {
      throw new SentinelError('InvalidTransition', `Job ${jobId} is already ${job.status}`);
    }
    this.controllers.get(jobId)?.abort();
    return this.fail(job, { code: 'Cancelled', reason: 'Cancelled' });
  }

  /**
   * Jobs left queued or running by a previous process can never finish.
   */
  recover(): number {
    const orphaned = this.store
      .listJobsByStatus(['queued', 'running'])
      .filter(job => !this.controllers.has(job.id));
    for (const job of orphaned) {
      this.fail(job, { code: 'Cancelled', reason: 'Interrupted by restart' });
    }
    return orphaned.length;
  }

  async whenIdle(): Promise<void> {
    while (this.settled.size > 0) {
      await Promise.all([...this.settled]);
    }
  }

  private async execute(jobId: string, signal: AbortSignal) {
    const queued = this.getJob(jobId);
    if (signal.aborted || queued.status !== 'queued') {
      return;
    }

    const running: TrainingJob = { ...queued, status: 'running', startedAt: this.now() };
    this.store.updateJob(running);
    this.bus.publish({ topic: 'job', kind: 'started', subjectId: jobId, cameraId: running.cameraId });
    this.running += 1;
    this.metrics.setGauge('training', 'running', this.running);

    try {
      const samples = await this.loadSamples(running.datasetId);
      const outcome = await this.metrics.time('training.duration', () =>
        this.trainer(samples, {
          hyperparameters: running.hyperparameters,
          signal,
          createModel: this.createModel,
          onProgress: progress => this.recordProgress(jobId, progress)
        })
      );
      if (signal.aborted) {
        throw new SentinelError('Cancelled', 'Training cancelled');
      }
      const model = await this.persistModel(running, outcome);
      if (!model) {
        return;
      }
      this.metrics.incrementCounter('training', 'succeeded');
      await this.autoValidate(model);
    } catch (error) {
      const latest = this.getJob(jobId);
      if (latest.status !== 'running') {
        if (latest.status === 'succeeded') {
          this.log.error({ err: error, jobId }, 'Post-training step failed');
        }
        return;
      }
      const failure: JobFailure = isSentinelError(error)
        ? { code: error.code, reason: error.reason }
        : { code: 'TrainingDiverged', reason: 'Training failed unexpectedly' };
      if (!isSentinelError(error)) {
        this.log.error({ err: error, jobId }, 'Unexpected training failure');
      }
      this.fail(latest, failure);
    } finally {
      this.running -= 1;
      this.metrics.setGauge('training', 'running', this.running);
    }
  }

  private async loadSamples(datasetId: string): Promise<TrainingSample[]> {
    const snapshots = this.store.listDatasetSnapshots(datasetId, 'normal');
    const samples: TrainingSample[] = [];
    for (const snapshot of snapshots) {
      samples.push({ key: snapshot.contentKey, content: await this.blobs.get(snapshot.contentKey) });
    }
    return samples;
  }

  private async persistModel(job: TrainingJob, outcome: TrainingOutcome): Promise<ModelVersion | null> {
    const modelId = randomUUID();
    const artifactKey = `models/${job.cameraId}/${modelId}.bin`;
    await this.blobs.put(artifactKey, outcome.artifact);

    const model = this.store.transaction(() => {
      const current = this.getJob(job.id);
      if (current.status !== 'running') {
        return null;
      }
      const at = this.now();
      const created: ModelVersion = {
        id: modelId,
        cameraId: job.cameraId,
        trainingJobId: job.id,
        datasetId: job.datasetId,
        version: this.store.nextModelVersion(job.cameraId),
        artifactKey,
        checksum: contentChecksum(outcome.artifact),
        format: outcome.format,
        sizeBytes: outcome.artifact.length,
        preprocessing: outcome.preprocessing,
        threshold: outcome.threshold,
        validationError: outcome.validationError,
        trainingStats: outcome.stats,
        holdoutKeys: outcome.holdoutKeys,
        state: 'trained',
        stateHistory: [{ state: 'trained', at }],
        createdAt: at,
        updatedAt: at,
        deployedAt: null
      };
      this.store.insertModel(created);
      this.store.updateJob({ ...current, status: 'succeeded', modelVersionId: modelId, finishedAt: at });
      return created;
    });

    if (!model) {
      await this.blobs.delete(artifactKey);
      return null;
    }

    this.bus.publish({
      topic: 'model',
      kind: 'trained',
      subjectId: model.id,
      cameraId: model.cameraId,
      meta: { version: model.version, threshold: model.threshold }
    });
    this.bus.publish({
      topic: 'job',
      kind: 'succeeded',
      subjectId: job.id,
      cameraId: job.cameraId,
      meta: { modelVersionId: model.id, epochs: outcome.stats.epochs }
    });
    return model;
  }

  private async autoValidate(model: ModelVersion) {
    if (this.config.autoValidate === false) {
      return;
    }
    try {
      await this.catalog.validate(model.id);
    } catch (error) {
      if (!isSentinelError(error, 'ValidationFailed')) {
        throw error;
      }
      this.log.warn({ modelId: model.id, reason: error.reason }, 'Trained model left unvalidated');
    }
  }

  private recordProgress(jobId: string, progress: TrainingProgress) {
    const job = this.store.getJob(jobId);
    if (!job || job.status !== 'running') {
      return;
    }
    this.store.updateJob({ ...job, progress });
    this.metrics.observeHistogram('training.loss', progress.loss ?? 0);
  }

  private fail(job: TrainingJob, failure: JobFailure): TrainingJob {
    const failed: TrainingJob = { ...job, status: 'failed', failure, finishedAt: this.now() };
    this.store.updateJob(failed);
    this.metrics.incrementCounter('training', failure.code === 'Cancelled' ? 'cancelled' : 'failed');
    this.bus.publish({
      topic: 'job',
      kind: failure.code === 'Cancelled' ? 'cancelled' : 'failed',
      subjectId: job.id,
      cameraId: job.cameraId,
      meta: { code: failure.code, reason: failure.reason }
    });
    return failed;
  }
}

export function resolveHyperparameters(
  defaults: Partial<TrainingHyperparameters> | undefined,
  overrides: Partial<TrainingHyperparameters>
): TrainingHyperparameters {
  const resolved: TrainingHyperparameters = { ...DEFAULT_HYPERPARAMETERS, ...defaults, ...overrides };
  const inputSize = resolved.inputWidth * resolved.inputHeight * resolved.channels;
  const problems: string[] = [];
  for (const key of ['inputWidth', 'inputHeight', 'latentDim', 'batchSize', 'maxEpochs', 'patience'] as const) {
    if (!Number.isInteger(resolved[key]) || resolved[key] <= 0) {
      problems.push(`${key} must be a positive integer`);
    }
  }
  if (resolved.channels !== 1 && resolved.channels !== 3) {
    problems.push('channels must be 1 or 3');
  }
  if (resolved.latentDim >= inputSize) {
    problems.push('latentDim must be smaller than the input size');
  }
  if (!(resolved.learningRate > 0) || !Number.isFinite(resolved.learningRate)) {
    problems.push('learningRate must be positive');
  }
  if (!(resolved.holdoutFraction > 0 && resolved.holdoutFraction < 1)) {
    problems.push('holdoutFraction must be between 0 and 1');
  }
  if (!(resolved.thresholdPercentile > 0 && resolved.thresholdPercentile <= 100)) {
    problems.push('thresholdPercentile must be in (0, 100]');
  }
  if (!Number.isInteger(resolved.seed)) {
    problems.push('seed must be an integer');
  }
  if (problems.length > 0) {
    throw new SentinelError('InvalidArgument', problems.join('; '));
  }
  return resolved;
}
