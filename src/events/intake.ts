import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import { SentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { isRecord, type IntakeConfig } from '../config/index.js';
import type { SentinelStore } from '../db.js';
import { isValidBlobKey, type BlobStore } from '../storage/blobStore.js';
import type { EventSubmission, SentinelEvent } from '../types.js';

const EARLIEST_EVENT_MS = Date.UTC(2000, 0, 1);
const DEFAULT_DUPLICATE_WINDOW_MS = 10_000;
const MAX_FRAMES = 256;

export type IntakeResult = {
  accepted: boolean;
  duplicate: boolean;
  shed: boolean;
  eventId: string;
};

export interface AnalysisQueue {
  enqueue(event: SentinelEvent): boolean;
  depth(): number;
}

interface EventIntakeDependencies {
  store: SentinelStore;
  blobs: BlobStore;
  config: IntakeConfig;
  queue?: AnalysisQueue;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export class EventIntake {
  private readonly store: SentinelStore;
  private readonly blobs: BlobStore;
  private readonly config: IntakeConfig;
  private queue: AnalysisQueue | null;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(dependencies: EventIntakeDependencies) {
    this.store = dependencies.store;
    this.blobs = dependencies.blobs;
    this.config = dependencies.config;
    this.queue = dependencies.queue ?? null;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'intake' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
  }

  attachQueue(queue: AnalysisQueue) {
    this.queue = queue;
  }

  async submit(input: unknown): Promise<IntakeResult> {
    let submission: EventSubmission;
    try {
      submission = parseSubmission(input, this.now(), this.config.maxClockSkewMs);
    } catch (error) {
      throw this.rejected(error, input);
    }

    const existing = this.store.getEvent(submission.id);
    if (existing) {
      this.metrics.incrementCounter('intake', 'duplicates');
      return { accepted: false, duplicate: true, shed: existing.shed, eventId: existing.id };
    }

    try {
      if (!this.store.getCamera(submission.cameraId)) {
        throw new SentinelError('InvalidEvent', `Camera ${submission.cameraId} is not registered`);
      }
      await this.assertResolvable(submission);
    } catch (error) {
      throw this.rejected(error, input);
    }

    const receivedAt = this.now();
    const event: SentinelEvent = {
      ...submission,
      clipCoverageMs: clipCoverage(submission.frameTimestamps),
      status: 'received',
      degraded: false,
      shed: false,
      detection: null,
      verdictId: null,
      receivedAt,
      analyzedAt: null
    };

    const shedReason = this.shedReason(event);
    const stored: SentinelEvent = shedReason
      ? { ...event, status: 'analyzed', degraded: true, shed: true, analyzedAt: receivedAt }
      : event;
    if (!this.store.insertEvent(stored)) {
      this.metrics.incrementCounter('intake', 'duplicates');
      return { accepted: false, duplicate: true, shed: false, eventId: stored.id };
    }

    if (shedReason) {
      this.metrics.incrementCounter('intake', 'shed');
      this.bus.publish({
        topic: 'event',
        kind: 'shed',
        subjectId: stored.id,
        cameraId: stored.cameraId,
        meta: { reason: shedReason, depth: this.queueDepth() }
      });
      return { accepted: true, duplicate: false, shed: true, eventId: stored.id };
    }

    this.metrics.incrementCounter('intake', 'accepted');
    this.metrics.observeRatio('intake.edge_confidence', edgeConfidence(stored));
    this.bus.publish({
      topic: 'event',
      kind: 'received',
      subjectId: stored.id,
      cameraId: stored.cameraId,
      meta: { frames: stored.frameKeys.length, modelVersionId: stored.modelVersionId }
    });
    this.queue?.enqueue(stored);
    return { accepted: true, duplicate: false, shed: false, eventId: stored.id };
  }

  recover(): number {
    const pending = this.store.listPendingEvents();
    let requeued = 0;
    for (const event of pending) {
      if (this.queue?.enqueue(event)) {
        requeued += 1;
      }
    }
    if (requeued > 0) {
      this.log.info({ requeued }, 'Pending events re-queued');
    }
    return requeued;
  }

  private shedReason(event: SentinelEvent): string | null {
    if (this.queueDepth() < this.config.highWaterMark) {
      return null;
    }
    if (edgeConfidence(event) < this.config.minEdgeConfidence) {
      return 'low_confidence';
    }
    const window = this.config.duplicateWindowMs ?? DEFAULT_DUPLICATE_WINDOW_MS;
    if (this.store.hasRecentPendingEvent(event.cameraId, event.triggeredAt - window, event.id)) {
      return 'near_duplicate';
    }
    return null;
  }

  private queueDepth() {
    return this.queue?.depth() ?? 0;
  }

  private rejected(error: unknown, input: unknown) {
    this.metrics.incrementCounter('intake', 'rejected');
    const eventId = isRecord(input) && typeof input.id === 'string' ? input.id : null;
    this.log.warn({ err: error, eventId }, 'Event submission rejected');
    return error;
  }

  private async assertResolvable(submission: EventSubmission) {
    const keys = submission.clipKey ? [...submission.frameKeys, submission.clipKey] : submission.frameKeys;
    for (const key of keys) {
      if (!(await this.blobs.has(key))) {
        throw new SentinelError('InvalidEvent', `Blob ${key} cannot be resolved`);
      }
    }
  }
}

export function edgeConfidence(event: Pick<SentinelEvent, 'reconstructionError' | 'threshold'>) {
  if (event.threshold <= 0) {
    return 0;
  }
  return event.reconstructionError / event.threshold;
}

function clipCoverage(timestamps: number[]) {
  if (timestamps.length < 2) {
    return 0;
  }
  return Math.max(...timestamps) - Math.min(...timestamps);
}

export function parseSubmission(input: unknown, now: number, maxClockSkewMs: number): EventSubmission {
  if (!isRecord(input)) {
    throw new SentinelError('InvalidEvent', 'Event must be an object');
  }
  const id = nonEmptyString(input.id, 'id');
  const cameraId = nonEmptyString(input.cameraId, 'cameraId');
  const triggeredAt = finiteNumber(input.triggeredAt, 'triggeredAt');
  if (triggeredAt < EARLIEST_EVENT_MS || triggeredAt > now + maxClockSkewMs) {
    throw new SentinelError('InvalidEvent', 'Event timestamp is out of range');
  }
  const reconstructionError = finiteNumber(input.reconstructionError, 'reconstructionError');
  const threshold = finiteNumber(input.threshold, 'threshold');
  if (threshold <= 0 || reconstructionError < 0) {
    throw new SentinelError('InvalidEvent', 'Reconstruction error and threshold must be non-negative');
  }

  const frameKeys = input.frameKeys;
  if (!Array.isArray(frameKeys) || frameKeys.length === 0 || frameKeys.length > MAX_FRAMES) {
    throw new SentinelError('InvalidEvent', 'Event must reference between 1 and 256 frames');
  }
  const keys: string[] = [];
  for (const key of frameKeys) {
    if (!isValidBlobKey(key)) {
      throw new SentinelError('InvalidEvent', 'Event references an invalid blob key');
    }
    keys.push(key);
  }

  let frameTimestamps: number[] = keys.map(() => triggeredAt);
  if (input.frameTimestamps !== undefined) {
    const raw = input.frameTimestamps;
    if (!Array.isArray(raw) || raw.length !== keys.length) {
      throw new SentinelError('InvalidEvent', 'Frame timestamps must match the frame list');
    }
    frameTimestamps = raw.map(value => finiteNumber(value, 'frameTimestamps'));
    for (let i = 1; i < frameTimestamps.length; i += 1) {
      if (frameTimestamps[i] < frameTimestamps[i - 1]) {
        throw new SentinelError('InvalidEvent', 'Frame timestamps must be ordered');
      }
    }
  }

  const triggerFrameIndex = input.triggerFrameIndex === undefined ? 0 : finiteNumber(input.triggerFrameIndex, 'triggerFrameIndex');
  if (!Number.isInteger(triggerFrameIndex) || triggerFrameIndex < 0 || triggerFrameIndex >= keys.length) {
    throw new SentinelError('InvalidEvent', 'Trigger frame index is out of range');
  }

  const modelVersionId = input.modelVersionId;
  if (modelVersionId !== undefined && modelVersionId !== null && typeof modelVersionId !== 'string') {
    throw new SentinelError('InvalidEvent', 'modelVersionId must be a string');
  }
  const clipKey = input.clipKey;
  if (clipKey !== undefined && clipKey !== null && !isValidBlobKey(clipKey)) {
    throw new SentinelError('InvalidEvent', 'Event references an invalid clip key');
  }

  return {
    id,
    cameraId,
    triggeredAt: Math.floor(triggeredAt),
    modelVersionId: typeof modelVersionId === 'string' ? modelVersionId : null,
    reconstructionError,
    threshold,
    frameKeys: keys,
    frameTimestamps,
    triggerFrameIndex,
    clipKey: typeof clipKey === 'string' ? clipKey : null
  };
}

function nonEmptyString(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new SentinelError('InvalidEvent', `${field} is required`);
  }
  return value.trim();
}

function finiteNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SentinelError('InvalidEvent', `${field} must be a finite number`);
  }
  return value;
}
