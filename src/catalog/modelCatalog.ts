import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import { SentinelError, isSentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import type { SentinelStore } from '../db.js';
import { createScorer, type ReconstructionScorer } from '../edge/scorers.js';
import { contentChecksum, type BlobStore } from '../storage/blobStore.js';
import { preprocessFrame } from '../training/preprocess.js';
import type { ModelState, ModelStateChange, ModelVersion } from '../types.js';
import { decodePng } from '../video/utils.js';

const DEFAULT_SANITY_BOUND_MULTIPLIER = 3;
const FALLBACK_SAMPLE_SIZE = 20;
export const VALIDATION_REJECTED_NOTE = 'validation rejected';

const TRANSITIONS: Record<ModelState, readonly ModelState[]> = {
  trained: ['validated', 'archived'],
  validated: ['deployed', 'archived'],
  deployed: ['superseded', 'rolled_back'],
  superseded: ['deployed', 'archived'],
  rolled_back: ['archived'],
  archived: []
};

export type ValidationReport = {
  model: ModelVersion;
  meanError: number;
  bound: number;
  samples: number;
};

export type RollbackResult = {
  rolledBack: ModelVersion;
  restored: ModelVersion;
};

interface ModelCatalogDependencies {
  store: SentinelStore;
  blobs: BlobStore;
  bus?: LifecycleBus;
  log?: Logger;
  now?: () => number;
  sanityBoundMultiplier?: number;
}

export function canTransition(from: ModelState, to: ModelState) {
  return TRANSITIONS[from].includes(to);
}

export class ModelCatalog {
  private readonly store: SentinelStore;
  private readonly blobs: BlobStore;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly sanityBoundMultiplier: number;

  constructor(dependencies: ModelCatalogDependencies) {
    this.store = dependencies.store;
    this.blobs = dependencies.blobs;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'catalog' });
    this.now = dependencies.now ?? Date.now;
    this.sanityBoundMultiplier = dependencies.sanityBoundMultiplier ?? DEFAULT_SANITY_BOUND_MULTIPLIER;
  }

  getModel(modelId: string): ModelVersion {
    const model = this.store.getModel(modelId);
    if (!model) {
      throw new SentinelError('NotFound', `Model ${modelId} not found`);
    }
    return model;
  }

  listModels(cameraId?: string): ModelVersion[] {
    return this.store.listModels(cameraId);
  }

  getDeployed(cameraId: string): ModelVersion | null {
    return this.store.findModelsByState(cameraId, 'deployed')[0] ?? null;
  }

  previousDeployable(cameraId: string): ModelVersion | null {
    return this.store.findModelsByState(cameraId, 'superseded')[0] ?? null;
  }

  async loadArtifact(model: ModelVersion): Promise<Buffer> {
    const artifact = await this.blobs.get(model.artifactKey);
    if (contentChecksum(artifact) !== model.checksum) {
      throw new SentinelError('ChecksumMismatch', `Artifact for model ${model.id} does not match its checksum`, {
        retryable: false
      });
    }
    return artifact;
  }

  async validate(modelId: string): Promise<ValidationReport> {
    const model = this.getModel(modelId);
    if (model.state !== 'trained') {
      throw new SentinelError('InvalidTransition', `Model ${modelId} is ${model.state}, expected trained`);
    }

    let report: Omit<ValidationReport, 'model'>;
    try {
      report = await this.measure(model);
    } catch (error) {
      const reason = isSentinelError(error) && error.code === 'ValidationFailed' ? error.reason : describeFailure(error);
      this.reject(model, reason);
      throw new SentinelError('ValidationFailed', reason, { cause: error });
    }

    if (report.meanError > report.bound) {
      const reason = `Holdout error ${report.meanError.toFixed(6)} exceeds bound ${report.bound.toFixed(6)}`;
      this.reject(model, reason);
      throw new SentinelError('ValidationFailed', reason, { details: { ...report } });
    }

    const validated = this.store.transaction(() => this.transition(this.getModel(modelId), 'validated'));
    this.bus.publish({
      topic: 'model',
      kind: 'validated',
      subjectId: validated.id,
      cameraId: validated.cameraId,
      meta: { meanError: report.meanError, samples: report.samples }
    });
    return { model: validated, ...report };
  }

  markDeployed(modelId: string): ModelVersion {
    const { deployed, superseded } = this.store.transaction(() => {
      const model = this.getModel(modelId);
      if (model.state !== 'validated' && model.state !== 'superseded') {
        throw new SentinelError('InvalidTransition', `Model ${modelId} is ${model.state} and cannot be deployed`);
      }
      const current = this.getDeployed(model.cameraId);
      const previous = current && current.id !== model.id ? this.transition(current, 'superseded') : null;
      const next = this.transition(model, 'deployed');
      this.store.setCameraActiveModel(next.cameraId, next.id, next.threshold);
      return { deployed: next, superseded: previous };
    });

    if (superseded) {
      this.bus.publish({ topic: 'model', kind: 'superseded', subjectId: superseded.id, cameraId: superseded.cameraId });
    }
    this.bus.publish({
      topic: 'model',
      kind: 'deployed',
      subjectId: deployed.id,
      cameraId: deployed.cameraId,
      meta: { version: deployed.version }
    });
    return deployed;
  }

  rollback(cameraId: string): RollbackResult {
    const result = this.store.transaction(() => {
      const current = this.getDeployed(cameraId);
      if (!current) {
        throw new SentinelError('NotFound', `Camera ${cameraId} has no deployed model`);
      }
      const target = this.previousDeployable(cameraId);
      if (!target) {
        throw new SentinelError('NotFound', `Camera ${cameraId} has no rollback target`);
      }
      const rolledBack = this.transition(current, 'rolled_back');
      const restored = this.transition(target, 'deployed', `rollback from version ${current.version}`);
      this.store.setCameraActiveModel(cameraId, restored.id, restored.threshold);
      return { rolledBack, restored };
    });

    this.bus.publish({
      topic: 'model',
      kind: 'rolled_back',
      subjectId: result.rolledBack.id,
      cameraId,
      meta: { restored: result.restored.id }
    });
    return result;
  }

  archive(modelId: string, reason?: string): ModelVersion {
    const archived = this.store.transaction(() => this.transition(this.getModel(modelId), 'archived', reason));
    this.bus.publish({ topic: 'model', kind: 'archived', subjectId: archived.id, cameraId: archived.cameraId });
    return archived;
  }

  private transition(model: ModelVersion, next: ModelState, reason?: string): ModelVersion {
    if (!canTransition(model.state, next)) {
      throw new SentinelError('InvalidTransition', `Model ${model.id} cannot move from ${model.state} to ${next}`);
    }
    const at = this.now();
    const change: ModelStateChange = reason ? { state: next, at, reason } : { state: next, at };
    const updated: ModelVersion = {
      ...model,
      state: next,
      stateHistory: [...model.stateHistory, change],
      updatedAt: at,
      deployedAt: next === 'deployed' ? at : model.deployedAt
    };
    this.store.updateModelState(updated);
    return updated;
  }

  private reject(model: ModelVersion, reason: string) {
    const at = this.now();
    this.store.updateModelState({
      ...model,
      stateHistory: [...model.stateHistory, { state: model.state, at, reason: `${VALIDATION_REJECTED_NOTE}: ${reason}` }],
      updatedAt: at
    });
    this.log.warn({ modelId: model.id, cameraId: model.cameraId, reason }, 'Model validation rejected');
    this.bus.publish({ topic: 'model', kind: 'rejected', subjectId: model.id, cameraId: model.cameraId, meta: { reason } });
  }

  private async measure(model: ModelVersion): Promise<Omit<ValidationReport, 'model'>> {
    let artifact: Buffer;
    try {
      artifact = await this.loadArtifact(model);
    } catch (error) {
      if (isSentinelError(error, 'ChecksumMismatch')) {
        throw new SentinelError('ValidationFailed', 'Artifact checksum mismatch', { cause: error });
      }
      throw error;
    }

    let scorer: ReconstructionScorer;
    try {
      scorer = await createScorer(model.format, artifact, model.preprocessing);
    } catch (error) {
      throw new SentinelError('ValidationFailed', 'Artifact cannot be decoded', { cause: error });
    }

    const keys = this.sampleKeys(model);
    if (keys.length === 0) {
      throw new SentinelError('ValidationFailed', 'No holdout sample is available');
    }

    let total = 0;
    for (const key of keys) {
      const frame = decodePng(await this.blobs.get(key));
      total += await scorer.score(preprocessFrame(frame, model.preprocessing));
    }
    const meanError = total / keys.length;
    return { meanError, bound: model.threshold * this.sanityBoundMultiplier, samples: keys.length };
  }

  private sampleKeys(model: ModelVersion): string[] {
    if (model.holdoutKeys.length > 0) {
      return model.holdoutKeys;
    }
    const dataset = this.store.findDataset(model.cameraId, 'closed');
    if (!dataset) {
      return [];
    }
    return this.store
      .listDatasetSnapshots(dataset.id, 'normal')
      .slice(-FALLBACK_SAMPLE_SIZE)
      .map(snapshot => snapshot.contentKey);
  }
}

function describeFailure(error: unknown) {
  if (isSentinelError(error)) {
    return error.reason;
  }
  return 'Holdout sample could not be scored';
}
