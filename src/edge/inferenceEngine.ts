import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { EdgeCameraState, ModelManifest } from '../channel/edgeChannel.js';
import { SentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { contentChecksum } from '../storage/blobStore.js';
import { preprocessFrame } from '../training/preprocess.js';
import type { Frame } from '../video/utils.js';
import { ClipBuffer, type BufferedFrame } from './clipBuffer.js';
import { createScorer, type ReconstructionScorer } from './scorers.js';

const DEFAULT_PRE_BUFFER_FRAMES = 5;
const DEFAULT_POST_BUFFER_FRAMES = 5;

export type ActiveModel = {
  manifest: ModelManifest;
  scorer: ReconstructionScorer;
  loadedAt: number;
};

export type EdgeEventDraft = {
  id: string;
  cameraId: string;
  triggeredAt: number;
  modelVersionId: string;
  reconstructionError: number;
  threshold: number;
  frames: BufferedFrame[];
  triggerFrameIndex: number;
};

export type FrameOutcome =
  | { status: 'no_model' }
  | { status: 'normal' | 'anomaly'; error: number; modelId: string }
  | { status: 'failed'; modelId: string };

type PendingTrigger = {
  draft: EdgeEventDraft;
  remaining: number;
};

type CameraLane = {
  chain: Promise<void>;
  active: ActiveModel | null;
  buffer: ClipBuffer;
  pending: PendingTrigger[];
  lastTriggerTs: number | null;
  framesProcessed: number;
  eventsEmitted: number;
};

type ScorerFactory = typeof createScorer;

export interface InferenceEngineOptions {
  preBufferFrames?: number;
  postBufferFrames?: number;
  cooldownMs?: number;
  log?: Logger;
  metrics?: MetricsRegistry;
  createScorer?: ScorerFactory;
  now?: () => number;
}

export class InferenceEngine extends EventEmitter {
  private readonly lanes = new Map<string, CameraLane>();
  private readonly preBufferFrames: number;
  private readonly postBufferFrames: number;
  private readonly cooldownMs: number;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly createScorer: ScorerFactory;
  private readonly now: () => number;

  constructor(options: InferenceEngineOptions = {}) {
    super();
    this.preBufferFrames = Math.max(0, Math.floor(options.preBufferFrames ?? DEFAULT_PRE_BUFFER_FRAMES));
    this.postBufferFrames = Math.max(0, Math.floor(options.postBufferFrames ?? DEFAULT_POST_BUFFER_FRAMES));
    this.cooldownMs = Math.max(0, options.cooldownMs ?? 0);
    this.log = (options.log ?? logger).child({ component: 'edge-inference' });
    this.metrics = options.metrics ?? metrics;
    this.createScorer = options.createScorer ?? createScorer;
    this.now = options.now ?? Date.now;
  }

  state(cameraId: string): EdgeCameraState {
    return this.lanes.get(cameraId)?.active ? 'model_loaded' : 'no_model';
  }

  activeModel(cameraId: string): ModelManifest | null {
    return this.lanes.get(cameraId)?.active?.manifest ?? null;
  }

  stats(cameraId: string) {
    const lane = this.lanes.get(cameraId);
    return { framesProcessed: lane?.framesProcessed ?? 0, eventsEmitted: lane?.eventsEmitted ?? 0 };
  }

  cameras(): string[] {
    return [...this.lanes.keys()];
  }

  /**
   * Builds and checks the scorer off to the side, then swaps it in. A failure
   * leaves the current model in place.
   */
  async loadModel(manifest: ModelManifest, artifact: Uint8Array): Promise<ModelManifest> {
    if (contentChecksum(artifact) !== manifest.checksum) {
      throw new SentinelError('ChecksumMismatch', `Model ${manifest.modelId} failed checksum verification`, {
        retryable: false
      });
    }
    const scorer = await this.createScorer(manifest.format, artifact, manifest.preprocessing);
    const { width, height, channels } = manifest.preprocessing;
    const probe = await scorer.score(new Float32Array(width * height * channels));
    if (!Number.isFinite(probe) || !Number.isFinite(manifest.threshold) || manifest.threshold <= 0) {
      throw new SentinelError('ValidationFailed', `Model ${manifest.modelId} produced an unusable score`);
    }

    const lane = this.lane(manifest.cameraId);
    const previous = lane.active?.manifest.modelId ?? null;
    lane.active = { manifest, scorer, loadedAt: this.now() };
    this.log.info(
      { cameraId: manifest.cameraId, modelId: manifest.modelId, previous, threshold: manifest.threshold },
      'Edge model swapped'
    );
    this.metrics.incrementCounter('edge', 'model_swaps');
    this.emit('model', manifest);
    return manifest;
  }

  handleFrame(cameraId: string, frame: Frame, ts = this.now()): Promise<FrameOutcome> {
    const lane = this.lane(cameraId);
    const result = lane.chain.then(() => this.processFrame(cameraId, lane, { frame, ts }));
    lane.chain = result.then(noop, noop);
    return result;
  }

  /**
   * Emits triggers still waiting on post-buffer frames with what they have.
   */
  async flush(cameraId: string) {
    const lane = this.lanes.get(cameraId);
    if (!lane) {
      return;
    }
    await lane.chain;
    const pending = lane.pending.splice(0);
    pending.forEach(trigger => this.emitTrigger(lane, trigger));
  }

  async whenIdle() {
    await Promise.all([...this.lanes.values()].map(lane => lane.chain));
  }

  private async processFrame(cameraId: string, lane: CameraLane, entry: BufferedFrame): Promise<FrameOutcome> {
    const model = lane.active;
    lane.framesProcessed += 1;

    for (const trigger of lane.pending) {
      trigger.draft.frames.push(entry);
      trigger.remaining -= 1;
    }
    const ready = lane.pending.filter(trigger => trigger.remaining <= 0);
    lane.pending = lane.pending.filter(trigger => trigger.remaining > 0);
    ready.forEach(trigger => this.emitTrigger(lane, trigger));

    if (!model) {
      lane.buffer.push(entry);
      this.metrics.incrementCounter('edge', 'frames_without_model');
      return { status: 'no_model' };
    }

    const started = performance.now();
    let error: number;
    try {
      error = await model.scorer.score(preprocessFrame(entry.frame, model.manifest.preprocessing));
    } catch (scoreError) {
      lane.buffer.push(entry);
      this.metrics.recordError('edge', 'frame scoring failed');
      this.log.error({ err: scoreError, cameraId, modelId: model.manifest.modelId }, 'Frame scoring failed');
      return { status: 'failed', modelId: model.manifest.modelId };
    } finally {
      this.metrics.observeLatency('edge.inference', performance.now() - started);
    }

    const modelId = model.manifest.modelId;
    const threshold = model.manifest.threshold;
    const coolingDown = lane.lastTriggerTs !== null && entry.ts - lane.lastTriggerTs < this.cooldownMs;
    if (error > threshold && !coolingDown) {
      const pre = lane.buffer.snapshot();
      const trigger: PendingTrigger = {
        draft: {
          id: randomUUID(),
          cameraId,
          triggeredAt: entry.ts,
          modelVersionId: modelId,
          reconstructionError: error,
          threshold,
          frames: [...pre, entry],
          triggerFrameIndex: pre.length
        },
        remaining: this.postBufferFrames
      };
      lane.lastTriggerTs = entry.ts;
      if (trigger.remaining <= 0) {
        this.emitTrigger(lane, trigger);
      } else {
        lane.pending.push(trigger);
      }
    }
    lane.buffer.push(entry);

    return { status: error > threshold ? 'anomaly' : 'normal', error, modelId };
  }

  private emitTrigger(lane: CameraLane, trigger: PendingTrigger) {
    lane.eventsEmitted += 1;
    this.metrics.incrementCounter('edge', 'events');
    this.emit('event', trigger.draft);
  }

  private lane(cameraId: string): CameraLane {
    let lane = this.lanes.get(cameraId);
    if (!lane) {
      lane = {
        chain: Promise.resolve(),
        active: null,
        buffer: new ClipBuffer(this.preBufferFrames),
        pending: [],
        lastTriggerTs: null,
        framesProcessed: 0,
        eventsEmitted: 0
      };
      this.lanes.set(cameraId, lane);
    }
    return lane;
  }
}

function noop() {}
