import type { AnalysisConfig } from '../config/index.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { DetectedObject, DetectionResult, SentinelEvent } from '../types.js';
import { decodePng, type Frame } from '../video/utils.js';
import type { FrameDetections, ObjectDetector } from './detector.js';

type BatchRequest = {
  frame: Frame;
  resolve: (detections: FrameDetections) => void;
  reject: (error: unknown) => void;
};

interface DeepAnalysisDependencies {
  detector: ObjectDetector;
  blobs: BlobStore;
  config: AnalysisConfig;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export class DeepAnalysis {
  private readonly detector: ObjectDetector;
  private readonly blobs: BlobStore;
  private readonly config: AnalysisConfig;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<DetectionResult>>();
  private pending: BatchRequest[] = [];
  private batchTimer: NodeJS.Timeout | null = null;

  constructor(dependencies: DeepAnalysisDependencies) {
    this.detector = dependencies.detector;
    this.blobs = dependencies.blobs;
    this.config = dependencies.config;
    this.log = (dependencies.log ?? logger).child({ component: 'deep-analysis' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
  }

  analyze(event: SentinelEvent): Promise<DetectionResult> {
    const existing = this.inFlight.get(event.id);
    if (existing) {
      return existing;
    }
    const task = this.run(event).finally(() => {
      this.inFlight.delete(event.id);
    });
    this.inFlight.set(event.id, task);
    return task;
  }

  isAnalyzing(eventId: string) {
    return this.inFlight.has(eventId);
  }

  private async run(event: SentinelEvent): Promise<DetectionResult> {
    const startedAt = this.now();
    if (!this.detector.available()) {
      this.metrics.incrementCounter('analysis', 'degraded');
      return this.result([], 0, startedAt, { degraded: true, timedOut: false });
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>(resolve => {
      timer = setTimeout(() => resolve(null), this.config.timeoutMs);
    });

    try {
      const outcome = await Promise.race([this.detectClip(event), timeout]);
      if (outcome === null) {
        this.metrics.incrementCounter('analysis', 'timeouts');
        this.log.warn({ eventId: event.id, timeoutMs: this.config.timeoutMs }, 'Deep analysis timed out');
        return this.result([], 0, startedAt, { degraded: true, timedOut: true });
      }
      this.metrics.incrementCounter('analysis', 'completed');
      return this.result(outcome.objects, outcome.framesAnalyzed, startedAt, { degraded: false, timedOut: false });
    } catch (error) {
      this.metrics.recordError('analysis', 'detector failed');
      this.log.error({ err: error, eventId: event.id }, 'Deep analysis failed');
      return this.result([], 0, startedAt, { degraded: true, timedOut: false });
    } finally {
      clearTimeout(timer);
    }
  }

  private async detectClip(event: SentinelEvent) {
    const frames: Frame[] = [];
    for (const key of event.frameKeys) {
      frames.push(decodePng(await this.blobs.get(key)));
    }
    const perFrame = await Promise.all(frames.map(frame => this.detectFrame(frame)));
    const objects: DetectedObject[] = perFrame.flatMap((detections, frameIndex) =>
      detections.map(detection => ({ ...detection, frameIndex }))
    );
    return { objects, framesAnalyzed: frames.length };
  }

  private detectFrame(frame: Frame): Promise<FrameDetections> {
    return new Promise((resolve, reject) => {
      this.pending.push({ frame, resolve, reject });
      if (this.pending.length >= this.batchLimit()) {
        this.flush();
      } else if (!this.batchTimer) {
        this.batchTimer = setTimeout(() => this.flush(), this.config.batchWindowMs);
      }
    });
  }

  private batchLimit() {
    return Math.max(1, Math.min(this.config.batchSize, this.detector.maxBatchSize));
  }

  private flush() {
    if (this.batchTimer) {
      clearTimeout(this.batchTimer);
      this.batchTimer = null;
    }
    while (this.pending.length > 0) {
      const batch = this.pending.splice(0, this.batchLimit());
      this.metrics.observeHistogram('analysis.batch_size', batch.length);
      void this.detector.detect(batch.map(request => request.frame)).then(
        results => {
          batch.forEach((request, index) => request.resolve(results[index] ?? []));
        },
        (error: unknown) => {
          batch.forEach(request => request.reject(error));
        }
      );
    }
  }

  private result(
    objects: DetectedObject[],
    framesAnalyzed: number,
    startedAt: number,
    flags: { degraded: boolean; timedOut: boolean }
  ): DetectionResult {
    const completedAt = this.now();
    const durationMs = Math.max(0, completedAt - startedAt);
    this.metrics.observeLatency('analysis.duration', durationMs);
    return { objects, framesAnalyzed, ...flags, durationMs, completedAt };
  }
}
