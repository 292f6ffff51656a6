import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { createSentinel, type SentinelOptions, type SentinelRuntime } from '../../src/app.js';
import type { FrameDetections, ObjectDetector } from '../../src/analysis/detector.js';
import type { SentinelConfig } from '../../src/config/index.js';
import { SentinelStore } from '../../src/db.js';
import type { createScorer } from '../../src/edge/scorers.js';
import type { Logger } from '../../src/logger.js';
import { MetricsRegistry } from '../../src/metrics/index.js';
import { contentChecksum, MemoryBlobStore, type BlobStore } from '../../src/storage/blobStore.js';
import { LinearAutoencoder } from '../../src/training/autoencoder.js';
import type { ModelVersion, PreprocessingParams, SentinelEvent } from '../../src/types.js';
import { createSeededRandom } from '../../src/utils/random.js';
import { createFrame, encodePng, type Frame } from '../../src/video/utils.js';

export const BASE_TIME = Date.UTC(2024, 2, 4, 12, 0, 0);

export const TEST_PREPROCESSING: PreprocessingParams = {
  width: 8,
  height: 8,
  channels: 1,
  mean: [0.5],
  std: [0.2]
};

export function createTestConfig(): SentinelConfig {
  return {
    app: { name: 'Sentinel' },
    logging: { level: 'silent' },
    database: { path: ':memory:' },
    storage: { root: 'data/test-blobs' },
    training: {
      minNormalSnapshots: 5,
      concurrency: 2,
      autoValidate: true,
      sanityBoundMultiplier: 3,
      defaults: {
        inputWidth: 8,
        inputHeight: 8,
        channels: 1,
        latentDim: 4,
        learningRate: 0.01,
        batchSize: 8,
        maxEpochs: 30,
        patience: 5,
        holdoutFraction: 0.25,
        thresholdPercentile: 95,
        seed: 7
      }
    },
    distribution: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 4, jitterFactor: 0, chunkSizeBytes: 256 },
    edge: { preBufferFrames: 2, postBufferFrames: 1, cooldownMs: 0, submitAttempts: 1 },
    analysis: { timeoutMs: 1000, batchSize: 4, batchWindowMs: 5, concurrency: 2 },
    baseline: { rebuildDelta: 0.2, gridSize: 4, timeBucketMinutes: 60, minConfidence: 0.4, positionShare: 0.05 },
    reasoning: {
      correlationWindowMs: 300_000,
      countMultiple: 2,
      minClipCoverageMs: 2000,
      expectedFrequency: 0.8,
      dwellThresholdMs: 30_000,
      timezoneOffsetMinutes: 0
    },
    scoring: { criticalAt: 0.75, warningAt: 0.5, feedbackWeight: 0.15 },
    intake: { highWaterMark: 50, minEdgeConfidence: 1.2, maxClockSkewMs: 300_000, duplicateWindowMs: 10_000 },
    retention: { enabled: false, archiveAfterDays: 30, intervalMinutes: 60 },
    server: { host: '127.0.0.1', port: 0 }
  };
}

export type SceneOptions = {
  size?: number;
  marker?: number;
};

/**
 * Grayscale gradient with seeded noise. Pixel 0 carries `marker` so a
 * scripted detector can tell frames apart after a PNG round trip.
 */
export function sceneFrame(seed: number, options: SceneOptions = {}): Frame {
  const size = options.size ?? 16;
  const random = createSeededRandom(seed);
  const frame = createFrame(size, size, 1);
  for (let y = 0; y < size; y += 1) {
    for (let x = 0; x < size; x += 1) {
      const gradient = 60 + Math.round((120 * (x + y)) / (2 * (size - 1)));
      const noise = Math.round((random() * 2 - 1) * 8);
      frame.data[y * size + x] = gradient + noise;
    }
  }
  frame.data[0] = options.marker ?? 0;
  return frame;
}

export function flatFrame(value: number, size = 16): Frame {
  const frame = createFrame(size, size, 1);
  frame.data.fill(value);
  return frame;
}

// Blocks of 2x2 pixels alternate sign so the pattern survives downscaling to 8x8.
export function perturbedFrame(base: Frame, amplitude: number): Frame {
  const frame = createFrame(base.width, base.height, 1);
  for (let y = 0; y < base.height; y += 1) {
    for (let x = 0; x < base.width; x += 1) {
      const sign = (Math.floor(x / 2) + Math.floor(y / 2)) % 2 === 0 ? 1 : -1;
      const index = y * base.width + x;
      frame.data[index] = Math.max(0, Math.min(255, base.data[index] + sign * amplitude));
    }
  }
  return frame;
}

export function scenePng(seed: number, options: SceneOptions = {}): Buffer {
  return encodePng(sceneFrame(seed, options));
}

export class ScriptedDetector implements ObjectDetector {
  readonly name = 'scripted';
  readonly maxBatchSize: number;
  enabled = true;
  readonly calls: number[] = [];

  constructor(
    private readonly script: (frame: Frame) => FrameDetections = () => [],
    maxBatchSize = 4
  ) {
    this.maxBatchSize = maxBatchSize;
  }

  available() {
    return this.enabled;
  }

  async detect(frames: Frame[]): Promise<FrameDetections[]> {
    this.calls.push(frames.length);
    return frames.map(frame => this.script(frame));
  }
}

/** Detections keyed by the marker value in pixel 0. */
export function detectByMarker(table: Record<number, FrameDetections>) {
  return (frame: Frame): FrameDetections => table[frame.data[0]] ?? [];
}

export function box(col: number, row: number, gridSize = 4) {
  const cell = 1 / gridSize;
  return { left: col * cell + cell / 4, top: row * cell + cell / 4, width: cell / 2, height: cell / 2 };
}

export async function createTestSentinel(options: SentinelOptions = {}): Promise<SentinelRuntime> {
  return createSentinel({
    config: createTestConfig(),
    store: new SentinelStore(':memory:'),
    blobs: new MemoryBlobStore(),
    detector: new ScriptedDetector(),
    metrics: new MetricsRegistry(),
    ...options
  });
}

export async function seedNormalDataset(
  runtime: SentinelRuntime,
  cameraId: string,
  count: number,
  options: { capturedAt?: (index: number) => number; marker?: (index: number) => number } = {}
) {
  if (!runtime.store.getCamera(cameraId)) {
    runtime.datasets.registerCamera({ id: cameraId });
  }
  const snapshots = [];
  for (let index = 0; index < count; index += 1) {
    snapshots.push({
      label: 'normal',
      capturedAt: options.capturedAt?.(index) ?? BASE_TIME + index * 60_000,
      content: scenePng(index + 1, { marker: options.marker?.(index) })
    });
  }
  return runtime.datasets.ingestExport(cameraId, snapshots);
}

export async function storeEventFrames(blobs: BlobStore, cameraId: string, eventId: string, frames: Frame[]) {
  const frameKeys: string[] = [];
  for (const [index, frame] of frames.entries()) {
    const key = `events/${cameraId}/${eventId}/${index}.png`;
    await blobs.put(key, encodePng(frame));
    frameKeys.push(key);
  }
  return frameKeys;
}

export type EventInput = {
  id?: string;
  cameraId: string;
  triggeredAt?: number;
  frameKeys: string[];
  frameTimestamps?: number[];
  reconstructionError?: number;
  threshold?: number;
  modelVersionId?: string | null;
};

export function eventSubmission(input: EventInput) {
  const triggeredAt = input.triggeredAt ?? BASE_TIME;
  return {
    id: input.id ?? randomUUID(),
    cameraId: input.cameraId,
    triggeredAt,
    modelVersionId: input.modelVersionId ?? null,
    reconstructionError: input.reconstructionError ?? 2,
    threshold: input.threshold ?? 1,
    frameKeys: input.frameKeys,
    frameTimestamps: input.frameTimestamps ?? input.frameKeys.map((_, index) => triggeredAt + index * 1000),
    triggerFrameIndex: 0,
    clipKey: null
  };
}

/** An event as intake would have stored it. */
export function storedEvent(input: EventInput & { clipCoverageMs?: number }): SentinelEvent {
  const submission = eventSubmission(input);
  return {
    ...submission,
    clipCoverageMs: input.clipCoverageMs ?? 0,
    status: 'received',
    degraded: false,
    shed: false,
    detection: null,
    verdictId: null,
    receivedAt: submission.triggeredAt,
    analyzedAt: null
  };
}

export type ModelOverrides = Partial<Pick<ModelVersion, 'state' | 'threshold' | 'holdoutKeys' | 'updatedAt'>> & {
  seed?: number;
};

/** Stores a freshly initialised 8x8 autoencoder as a catalog entry; the camera must exist. */
export async function insertTrainedModel(
  store: SentinelStore,
  blobs: BlobStore,
  cameraId: string,
  overrides: ModelOverrides = {}
): Promise<ModelVersion> {
  const model = new LinearAutoencoder({ inputSize: 64, latentDim: 4, learningRate: 0.01, seed: overrides.seed ?? 3 });
  const artifact = model.serialize();
  const id = randomUUID();
  const artifactKey = `models/${cameraId}/${id}.bin`;
  await blobs.put(artifactKey, artifact);
  const state = overrides.state ?? 'validated';
  const at = overrides.updatedAt ?? BASE_TIME;
  const entry: ModelVersion = {
    id,
    cameraId,
    trainingJobId: null,
    datasetId: null,
    version: store.nextModelVersion(cameraId),
    artifactKey,
    checksum: contentChecksum(artifact),
    format: 'linear-autoencoder',
    sizeBytes: artifact.length,
    preprocessing: TEST_PREPROCESSING,
    threshold: overrides.threshold ?? 0.5,
    validationError: 0.1,
    trainingStats: null,
    holdoutKeys: overrides.holdoutKeys ?? [],
    state,
    stateHistory: [{ state, at }],
    createdAt: at,
    updatedAt: at,
    deployedAt: null
  };
  store.insertModel(entry);
  return entry;
}

/** Scores an input by its mean value, so uniform frames give predictable errors. */
export const meanValueScorer: typeof createScorer = async format => ({
  format,
  score: async (input: Float32Array) => input.reduce((sum, value) => sum + value, 0) / Math.max(1, input.length)
});

export type CapturedLog = {
  level: number;
  msg: string;
  component?: string;
  [key: string]: unknown;
};

export function createCaptureLogger(): { log: Logger; records: CapturedLog[] } {
  const records: CapturedLog[] = [];
  const log = pino(
    { level: 'trace' },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      }
    }
  );
  return { log, records };
}
