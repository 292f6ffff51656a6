import { randomUUID } from 'node:crypto';
import type { BaselineConfig } from '../config/index.js';
import type { SentinelStore } from '../db.js';
import { SentinelError } from '../errors.js';
import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { BlobStore } from '../storage/blobStore.js';
import type { BaselineInventory, LabeledSnapshot, ObjectProfile } from '../types.js';
import { mean, percentile } from '../utils/stats.js';
import { decodePng } from '../video/utils.js';
import type { FrameDetections, ObjectDetector } from './detector.js';
import { gridCell, mergeBuckets, minuteOfDay, windowContains } from './timeWindows.js';

const DETECTION_CHUNK = 16;
const DEFAULT_MIN_CONFIDENCE = 0.4;
const DEFAULT_POSITION_SHARE = 0.05;

/** What one snapshot contributed for one class. */
type ClassObservation = {
  count: number;
  cells: number[];
  minute: number;
};

interface BaselineBuilderDependencies {
  store: SentinelStore;
  blobs: BlobStore;
  detector: ObjectDetector;
  config: BaselineConfig;
  timezoneOffsetMinutes?: number;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export class BaselineBuilder {
  private readonly store: SentinelStore;
  private readonly blobs: BlobStore;
  private readonly detector: ObjectDetector;
  private readonly config: BaselineConfig;
  private readonly timezoneOffsetMinutes: number;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(dependencies: BaselineBuilderDependencies) {
    this.store = dependencies.store;
    this.blobs = dependencies.blobs;
    this.detector = dependencies.detector;
    this.config = dependencies.config;
    this.timezoneOffsetMinutes = dependencies.timezoneOffsetMinutes ?? 0;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'baseline' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
  }

  latest(cameraId: string): BaselineInventory | null {
    return this.store.latestBaseline(cameraId);
  }

  shouldRebuild(cameraId: string, normalCount: number) {
    const current = this.store.latestBaseline(cameraId);
    if (!current) {
      return normalCount > 0;
    }
    return normalCount >= current.snapshotCount * (1 + this.config.rebuildDelta) && normalCount > current.snapshotCount;
  }

  async rebuild(cameraId: string, normalDatasetId: string): Promise<BaselineInventory> {
    const dataset = this.store.getDataset(normalDatasetId);
    if (!dataset || dataset.cameraId !== cameraId) {
      throw new SentinelError('NotFound', `Dataset ${normalDatasetId} not found for camera ${cameraId}`);
    }
    if (dataset.status === 'open') {
      throw new SentinelError('InvalidTransition', `Dataset ${normalDatasetId} is still open`);
    }
    if (!this.detector.available()) {
      throw new SentinelError('InvalidArgument', 'Object detector is unavailable');
    }
    const snapshots = this.store.listDatasetSnapshots(normalDatasetId, 'normal');
    if (snapshots.length === 0) {
      throw new SentinelError('InsufficientData', `Dataset ${normalDatasetId} has no normal snapshots`);
    }

    const started = this.now();
    const observations = new Map<string, ClassObservation[]>();
    for (let offset = 0; offset < snapshots.length; offset += DETECTION_CHUNK) {
      const chunk = snapshots.slice(offset, offset + DETECTION_CHUNK);
      const detections = await this.detectSnapshots(chunk);
      chunk.forEach((snapshot, index) => {
        this.collect(observations, snapshot, detections[index] ?? []);
      });
    }

    const snapshotMinutes = snapshots.map(snapshot => minuteOfDay(snapshot.capturedAt, this.timezoneOffsetMinutes));
    const profiles = [...observations.entries()]
      .map(([objectClass, entries]) => this.profile(objectClass, entries, snapshotMinutes))
      .sort((a, b) => a.objectClass.localeCompare(b.objectClass));

    const inventory: BaselineInventory = {
      id: randomUUID(),
      cameraId,
      version: this.store.nextBaselineVersion(cameraId),
      datasetId: normalDatasetId,
      snapshotCount: snapshots.length,
      gridSize: this.config.gridSize,
      profiles,
      createdAt: this.now()
    };
    this.store.insertBaseline(inventory);
    this.metrics.observeLatency('baseline.rebuild', this.now() - started);
    this.bus.publish({
      topic: 'baseline',
      kind: 'rebuilt',
      subjectId: inventory.id,
      cameraId,
      meta: { version: inventory.version, snapshots: snapshots.length, classes: profiles.length }
    });
    this.log.info({ cameraId, version: inventory.version, classes: profiles.length }, 'Baseline rebuilt');
    return inventory;
  }

  private async detectSnapshots(snapshots: LabeledSnapshot[]): Promise<FrameDetections[]> {
    const frames = [];
    for (const snapshot of snapshots) {
      frames.push(decodePng(await this.blobs.get(snapshot.contentKey)));
    }
    return this.detector.detect(frames);
  }

  private collect(observations: Map<string, ClassObservation[]>, snapshot: LabeledSnapshot, detections: FrameDetections) {
    const minConfidence = this.config.minConfidence ?? DEFAULT_MIN_CONFIDENCE;
    const perClass = new Map<string, ClassObservation>();
    for (const detection of detections) {
      if (detection.confidence < minConfidence) {
        continue;
      }
      let entry = perClass.get(detection.objectClass);
      if (!entry) {
        entry = { count: 0, cells: [], minute: minuteOfDay(snapshot.capturedAt, this.timezoneOffsetMinutes) };
        perClass.set(detection.objectClass, entry);
      }
      entry.count += 1;
      entry.cells.push(gridCell(detection.bbox, this.config.gridSize));
    }
    for (const [objectClass, entry] of perClass) {
      const list = observations.get(objectClass) ?? [];
      list.push(entry);
      observations.set(objectClass, list);
    }
  }

  private profile(objectClass: string, entries: ClassObservation[], snapshotMinutes: number[]): ObjectProfile {
    const counts = entries.map(entry => entry.count);
    const cells = entries.flatMap(entry => entry.cells);
    const share = this.config.positionShare ?? DEFAULT_POSITION_SHARE;
    const cellTotals = new Map<number, number>();
    for (const cell of cells) {
      cellTotals.set(cell, (cellTotals.get(cell) ?? 0) + 1);
    }
    const typicalPositions = [...cellTotals.entries()]
      .filter(([, total]) => total / cells.length >= share)
      .map(([cell]) => cell)
      .sort((a, b) => a - b);
    const bucketMinutes = this.config.timeBucketMinutes;
    const typicalTimeWindows = mergeBuckets(
      entries.map(entry => Math.floor(entry.minute / bucketMinutes)),
      bucketMinutes
    );
    const windowFrequencies = typicalTimeWindows.map(window => {
      const taken = snapshotMinutes.filter(minute => windowContains(window, minute)).length;
      const seen = entries.filter(entry => windowContains(window, entry.minute)).length;
      return { ...window, frequency: seen / taken };
    });

    return {
      objectClass,
      frequency: entries.length / snapshotMinutes.length,
      occurrences: entries.length,
      typicalCountRange: [Math.min(...counts), Math.max(...counts)],
      percentileCountRange: [percentile(counts, 10), percentile(counts, 90)],
      meanCount: mean(counts),
      typicalPositions,
      typicalTimeWindows,
      windowFrequencies
    };
  }
}
