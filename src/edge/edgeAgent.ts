import { randomUUID } from 'node:crypto';
import type {
  DeploymentAck,
  EdgeEndpoint,
  EdgeHealthReport,
  ModelManifest
} from '../channel/edgeChannel.js';
import { SentinelError, isSentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { EventSubmission } from '../types.js';
import { retryWithBackoff, type BackoffOptions } from '../utils/backoff.js';
import { encodePng, type Frame } from '../video/utils.js';
import { InferenceEngine, type EdgeEventDraft, type FrameOutcome } from './inferenceEngine.js';
import { ModelCache } from './modelCache.js';

const EDGE_CAPABILITIES = ['reconstruction-scoring', 'linear-autoencoder', 'onnx-autoencoder', 'clip-buffer'];

export type SubmitResult = {
  accepted: boolean;
  duplicate: boolean;
  shed?: boolean;
};

export interface EventSink {
  submit(submission: unknown): Promise<SubmitResult>;
}

type InboundTransfer = {
  manifest: ModelManifest;
  chunks: Uint8Array[];
  nextIndex: number;
};

interface EdgeAgentDependencies {
  engine: InferenceEngine;
  blobs: BlobStore;
  sink: EventSink;
  cache?: ModelCache;
  log?: Logger;
  metrics?: MetricsRegistry;
  submitRetry?: BackoffOptions;
  now?: () => number;
}

const DEFAULT_SUBMIT_RETRY: BackoffOptions = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
  jitterFactor: 0.2
};

export class EdgeAgent implements EdgeEndpoint {
  private readonly engine: InferenceEngine;
  private readonly blobs: BlobStore;
  private readonly sink: EventSink;
  private readonly cache: ModelCache;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly submitRetry: BackoffOptions;
  private readonly now: () => number;
  private readonly transfers = new Map<string, InboundTransfer>();
  private readonly submissions = new Set<Promise<void>>();

  constructor(dependencies: EdgeAgentDependencies) {
    this.engine = dependencies.engine;
    this.blobs = dependencies.blobs;
    this.sink = dependencies.sink;
    this.cache = dependencies.cache ?? new ModelCache();
    this.log = (dependencies.log ?? logger).child({ component: 'edge-agent' });
    this.metrics = dependencies.metrics ?? metrics;
    this.submitRetry = dependencies.submitRetry ?? DEFAULT_SUBMIT_RETRY;
    this.now = dependencies.now ?? Date.now;

    this.engine.on('event', (draft: EdgeEventDraft) => {
      const pending = this.forward(draft).finally(() => {
        this.submissions.delete(pending);
      });
      this.submissions.add(pending);
    });
  }

  handleFrame(cameraId: string, frame: Frame, ts?: number): Promise<FrameOutcome> {
    return this.engine.handleFrame(cameraId, frame, ts);
  }

  beginTransfer(manifest: ModelManifest): string {
    const transferId = randomUUID();
    this.transfers.set(transferId, { manifest, chunks: [], nextIndex: 0 });
    return transferId;
  }

  receiveChunk(transferId: string, index: number, chunk: Uint8Array) {
    const transfer = this.requireTransfer(transferId);
    if (index !== transfer.nextIndex) {
      this.transfers.delete(transferId);
      throw new SentinelError('TransferFailed', `Expected chunk ${transfer.nextIndex}, received ${index}`);
    }
    transfer.chunks.push(chunk);
    transfer.nextIndex += 1;
  }

  async commitTransfer(transferId: string) {
    const transfer = this.requireTransfer(transferId);
    this.transfers.delete(transferId);
    this.cache.put(transfer.manifest, Buffer.concat(transfer.chunks));
    this.log.info(
      { cameraId: transfer.manifest.cameraId, modelId: transfer.manifest.modelId, chunks: transfer.chunks.length },
      'Model artifact cached'
    );
  }

  abortTransfer(transferId: string) {
    this.transfers.delete(transferId);
  }

  async activate(cameraId: string, modelId: string): Promise<DeploymentAck> {
    const cached = this.cache.get(modelId);
    if (!cached || cached.manifest.cameraId !== cameraId) {
      throw new SentinelError('NotFound', `Model ${modelId} is not cached for camera ${cameraId}`);
    }
    const alreadyActive = this.engine.activeModel(cameraId)?.modelId === modelId;
    if (!alreadyActive) {
      await this.engine.loadModel(cached.manifest, cached.artifact);
    }
    this.cache.markActive(cameraId, modelId);
    return {
      cameraId,
      modelId,
      version: cached.manifest.version,
      activatedAt: this.now()
    };
  }

  hasModel(cameraId: string, modelId: string) {
    return this.cache.has(cameraId, modelId);
  }

  health(cameraId?: string): EdgeHealthReport[] {
    const ids = cameraId ? [cameraId] : this.engine.cameras();
    return ids.map(id => {
      const active = this.engine.activeModel(id);
      const record = this.cache.record(id);
      const stats = this.engine.stats(id);
      return {
        cameraId: id,
        state: this.engine.state(id),
        activeModelId: active?.modelId ?? null,
        activeVersion: active?.version ?? null,
        lastKnownGoodModelId: record.lastKnownGoodModelId,
        recordVersion: record.version,
        cachedModelIds: this.cache.list(id),
        framesProcessed: stats.framesProcessed,
        eventsEmitted: stats.eventsEmitted,
        capabilities: [...EDGE_CAPABILITIES]
      };
    });
  }

  async whenIdle() {
    await this.engine.whenIdle();
    while (this.submissions.size > 0) {
      await Promise.all([...this.submissions]);
    }
  }

  private async forward(draft: EdgeEventDraft) {
    try {
      const submission = await this.storeClip(draft);
      const result = await retryWithBackoff(() => this.sink.submit(submission), this.submitRetry);
      this.metrics.incrementCounter('edge', result.duplicate ? 'submissions_duplicate' : 'submissions');
    } catch (error) {
      this.metrics.recordError('edge', 'event submission failed');
      const reason = isSentinelError(error) ? error.reason : undefined;
      this.log.error({ err: error, eventId: draft.id, cameraId: draft.cameraId, reason }, 'Event submission failed');
    }
  }

  private async storeClip(draft: EdgeEventDraft): Promise<EventSubmission> {
    const prefix = `events/${draft.cameraId}/${draft.id}`;
    const frameKeys: string[] = [];
    for (const [index, entry] of draft.frames.entries()) {
      const key = `${prefix}/${index}.png`;
      await this.blobs.put(key, encodePng(entry.frame));
      frameKeys.push(key);
    }
    const frameTimestamps = draft.frames.map(entry => entry.ts);
    const clipKey = `${prefix}/clip.json`;
    const clip = {
      eventId: draft.id,
      cameraId: draft.cameraId,
      frameKeys,
      frameTimestamps,
      triggerFrameIndex: draft.triggerFrameIndex
    };
    await this.blobs.put(clipKey, Buffer.from(JSON.stringify(clip), 'utf8'));
    return {
      id: draft.id,
      cameraId: draft.cameraId,
      triggeredAt: draft.triggeredAt,
      modelVersionId: draft.modelVersionId,
      reconstructionError: draft.reconstructionError,
      threshold: draft.threshold,
      frameKeys,
      frameTimestamps,
      triggerFrameIndex: draft.triggerFrameIndex,
      clipKey
    };
  }

  private requireTransfer(transferId: string): InboundTransfer {
    const transfer = this.transfers.get(transferId);
    if (!transfer) {
      throw new SentinelError('TransferFailed', `Transfer ${transferId} is not open`);
    }
    return transfer;
  }
}
