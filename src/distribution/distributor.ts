import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import { SentinelError, isSentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { ModelCatalog } from '../catalog/modelCatalog.js';
import type { DeploymentAck, EdgeChannel, ModelManifest } from '../channel/edgeChannel.js';
import type { DistributionConfig } from '../config/index.js';
import type { ModelVersion } from '../types.js';
import { retryWithBackoff, type RetryOptions } from '../utils/backoff.js';
import { KeyedMutex } from '../utils/keyedMutex.js';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

export type DeploymentResult = DeploymentAck & {
  streamed: boolean;
  attempts: number;
};

interface ModelDistributorDependencies {
  catalog: ModelCatalog;
  channel: EdgeChannel;
  config: DistributionConfig;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  random?: () => number;
}

export function toManifest(model: ModelVersion): ModelManifest {
  return {
    modelId: model.id,
    cameraId: model.cameraId,
    version: model.version,
    format: model.format,
    checksum: model.checksum,
    sizeBytes: model.sizeBytes,
    threshold: model.threshold,
    preprocessing: model.preprocessing
  };
}

export class ModelDistributor {
  private readonly catalog: ModelCatalog;
  private readonly channel: EdgeChannel;
  private readonly config: DistributionConfig;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly random: (() => number) | undefined;
  private readonly cameraLocks = new KeyedMutex();
  private readonly inFlight = new Map<string, AbortController>();

  constructor(dependencies: ModelDistributorDependencies) {
    this.catalog = dependencies.catalog;
    this.channel = dependencies.channel;
    this.config = dependencies.config;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'distributor' });
    this.metrics = dependencies.metrics ?? metrics;
    this.random = dependencies.random;
  }

  deploy(modelVersionId: string, cameraId: string): Promise<DeploymentResult> {
    return this.cameraLocks.runExclusive(cameraId, async () => {
      const model = this.catalog.getModel(modelVersionId);
      if (model.cameraId !== cameraId) {
        throw new SentinelError('InvalidArgument', `Model ${modelVersionId} belongs to camera ${model.cameraId}`);
      }
      if (model.state !== 'validated' && model.state !== 'superseded') {
        throw new SentinelError('InvalidTransition', `Model ${modelVersionId} is ${model.state} and cannot be deployed`);
      }

      const result = await this.push(model, false);
      this.catalog.markDeployed(model.id);
      this.bus.publish({
        topic: 'deployment',
        kind: 'activated',
        subjectId: model.id,
        cameraId,
        meta: { version: model.version, attempts: result.attempts }
      });
      return result;
    });
  }

  rollback(cameraId: string): Promise<DeploymentResult> {
    return this.cameraLocks.runExclusive(cameraId, async () => {
      if (!this.catalog.getDeployed(cameraId)) {
        throw new SentinelError('NotFound', `Camera ${cameraId} has no deployed model`);
      }
      const target = this.catalog.previousDeployable(cameraId);
      if (!target) {
        throw new SentinelError('NotFound', `Camera ${cameraId} has no rollback target`);
      }
      const cached = await this.channel.hasModel(cameraId, target.id);
      const result = await this.push(target, cached);
      this.catalog.rollback(cameraId);
      this.bus.publish({
        topic: 'deployment',
        kind: 'rolled_back',
        subjectId: target.id,
        cameraId,
        meta: { version: target.version, streamed: result.streamed }
      });
      return result;
    });
  }

  abort(cameraId: string): boolean {
    const controller = this.inFlight.get(cameraId);
    if (!controller) {
      return false;
    }
    controller.abort();
    return true;
  }

  isDeploying(cameraId: string) {
    return this.inFlight.has(cameraId);
  }

  private async push(model: ModelVersion, cachedAtEdge: boolean): Promise<DeploymentResult> {
    const cameraId = model.cameraId;
    const controller = new AbortController();
    this.inFlight.set(cameraId, controller);
    const manifest = toManifest(model);
    let attempts = 0;
    const retry: RetryOptions = {
      maxAttempts: this.config.maxAttempts,
      baseDelayMs: this.config.baseDelayMs,
      maxDelayMs: this.config.maxDelayMs,
      jitterFactor: this.config.jitterFactor,
      random: this.random,
      signal: controller.signal,
      onRetry: ({ attempt, delayMs, error }) => {
        this.metrics.incrementCounter('distribution', 'retries');
        this.log.warn({ cameraId, modelId: model.id, attempt, delayMs, err: error }, 'Model transfer retry scheduled');
      }
    };

    this.bus.publish({ topic: 'deployment', kind: 'started', subjectId: model.id, cameraId });
    try {
      if (!cachedAtEdge) {
        const artifact = await this.catalog.loadArtifact(model);
        await retryWithBackoff(attempt => {
          attempts = attempt;
          return this.transfer(manifest, artifact, controller.signal);
        }, retry);
      }
      if (controller.signal.aborted) {
        throw new SentinelError('Cancelled', 'Deployment aborted');
      }
      const ack = await retryWithBackoff(() => this.channel.activate(cameraId, model.id), retry);
      this.metrics.incrementCounter('distribution', 'deployed');
      return { ...ack, streamed: !cachedAtEdge, attempts };
    } catch (error) {
      if (isSentinelError(error, 'Cancelled')) {
        this.metrics.incrementCounter('distribution', 'cancelled');
        this.bus.publish({ topic: 'deployment', kind: 'cancelled', subjectId: model.id, cameraId });
        throw error;
      }
      const reason = isSentinelError(error) ? error.reason : 'Edge did not accept the model';
      this.metrics.incrementCounter('distribution', 'failed');
      this.bus.publish({ topic: 'deployment', kind: 'failed', subjectId: model.id, cameraId, meta: { reason, attempts } });
      throw new SentinelError('DeploymentFailed', `Deployment of model ${model.id} failed: ${reason}`, {
        cause: error,
        details: { attempts }
      });
    } finally {
      this.inFlight.delete(cameraId);
    }
  }

  private async transfer(manifest: ModelManifest, artifact: Buffer, signal: AbortSignal) {
    const chunkSize = Math.max(1, this.config.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE);
    const transferId = await this.channel.beginTransfer(manifest);
    try {
      let index = 0;
      for (let offset = 0; offset < artifact.length; offset += chunkSize) {
        if (signal.aborted) {
          throw new SentinelError('Cancelled', 'Transfer aborted');
        }
        await this.channel.sendChunk(transferId, index, artifact.subarray(offset, offset + chunkSize));
        index += 1;
      }
      if (signal.aborted) {
        throw new SentinelError('Cancelled', 'Transfer aborted');
      }
      await this.channel.commitTransfer(transferId);
      this.metrics.incrementCounter('distribution', 'bytes', artifact.length);
    } catch (error) {
      await this.channel.abortTransfer(transferId).catch(abortError => {
        this.log.warn({ err: abortError, transferId }, 'Transfer abort was not delivered');
      });
      throw error;
    }
  }
}
