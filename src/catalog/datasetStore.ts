import { randomUUID } from 'node:crypto';
import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import { SentinelError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import type { SentinelStore } from '../db.js';
import type { BlobStore } from '../storage/blobStore.js';
import {
  SNAPSHOT_LABELS,
  type Camera,
  type Dataset,
  type LabelCounts,
  type LabeledSnapshot,
  type Resolution,
  type SnapshotLabel
} from '../types.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const EARLIEST_CAPTURE_MS = Date.UTC(2000, 0, 1);

export type CameraInput = {
  id: string;
  name?: string;
  resolution?: Resolution;
  profile?: string | null;
};

export type SnapshotContent = {
  label: string;
  capturedAt: number;
  conditions?: string | null;
  content: Uint8Array;
};

export type SnapshotInput = SnapshotContent & {
  cameraId: string;
};

interface DatasetStoreDependencies {
  store: SentinelStore;
  blobs: BlobStore;
  bus?: LifecycleBus;
  log?: Logger;
  now?: () => number;
}

export class DatasetStore {
  private readonly store: SentinelStore;
  private readonly blobs: BlobStore;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(dependencies: DatasetStoreDependencies) {
    this.store = dependencies.store;
    this.blobs = dependencies.blobs;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'datasets' });
    this.now = dependencies.now ?? Date.now;
  }

  registerCamera(input: CameraInput): Camera {
    const id = input.id.trim();
    if (!id) {
      throw new SentinelError('InvalidArgument', 'Camera id is required');
    }
    const existing = this.store.getCamera(id);
    const camera: Camera = {
      id,
      name: input.name ?? existing?.name ?? id,
      resolution: input.resolution ?? existing?.resolution ?? { width: 0, height: 0 },
      profile: input.profile ?? existing?.profile ?? null,
      activeModelId: existing?.activeModelId ?? null,
      threshold: existing?.threshold ?? null,
      createdAt: existing?.createdAt ?? this.now()
    };
    this.store.upsertCamera(camera);
    return camera;
  }

  async ingestSnapshot(input: SnapshotInput): Promise<LabeledSnapshot> {
    const camera = this.requireCamera(input.cameraId);
    const label = parseLabel(input.label);
    if (!Number.isFinite(input.capturedAt) || input.capturedAt < EARLIEST_CAPTURE_MS) {
      throw new SentinelError('InvalidSnapshot', 'Snapshot capture time is invalid');
    }
    const content = Buffer.from(input.content);
    if (content.length <= PNG_SIGNATURE.length || !content.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
      throw new SentinelError('InvalidSnapshot', 'Snapshot content must be a PNG image');
    }

    const id = randomUUID();
    const contentKey = `snapshots/${camera.id}/${id}.png`;
    await this.blobs.put(contentKey, content);

    const snapshot: LabeledSnapshot = {
      id,
      cameraId: camera.id,
      label,
      capturedAt: Math.floor(input.capturedAt),
      conditions: normalizeConditions(input.conditions),
      contentKey,
      sizeBytes: content.length,
      createdAt: this.now()
    };

    this.store.transaction(() => {
      this.store.insertSnapshot(snapshot);
      const dataset = this.store.findDataset(camera.id, 'open') ?? this.openDataset(camera.id);
      this.store.linkSnapshot(dataset.id, snapshot.id);
    });

    return snapshot;
  }

  async ingestExport(cameraId: string, snapshots: SnapshotContent[]): Promise<Dataset> {
    this.requireCamera(cameraId);
    for (const snapshot of snapshots) {
      await this.ingestSnapshot({ ...snapshot, cameraId });
    }
    const open = this.store.findDataset(cameraId, 'open');
    if (!open) {
      throw new SentinelError('InsufficientData', 'Export contained no snapshots');
    }
    this.log.info({ cameraId, snapshots: snapshots.length, datasetId: open.id }, 'Edge export ingested');
    return this.closeDataset(open.id);
  }

  closeDataset(datasetId: string): Dataset {
    const dataset = this.getDataset(datasetId);
    if (dataset.status !== 'open') {
      throw new SentinelError('InvalidTransition', `Dataset ${datasetId} is ${dataset.status}`);
    }
    if (dataset.snapshotCount === 0) {
      throw new SentinelError('InvalidTransition', 'Dataset has no snapshots');
    }

    const previous = this.store.findDataset(dataset.cameraId, 'closed');
    const closedAt = this.now();
    this.store.transaction(() => {
      if (previous) {
        this.store.updateDatasetStatus(previous.id, 'superseded');
      }
      this.store.updateDatasetStatus(dataset.id, 'closed', closedAt);
    });

    const closed = this.getDataset(datasetId);
    this.bus.publish({
      topic: 'dataset',
      kind: 'closed',
      subjectId: closed.id,
      cameraId: closed.cameraId,
      meta: {
        version: closed.version,
        normalCount: closed.labelCounts.normal,
        previousNormalCount: previous?.labelCounts.normal ?? 0
      }
    });
    return closed;
  }

  getDataset(datasetId: string): Dataset {
    const dataset = this.store.getDataset(datasetId);
    if (!dataset) {
      throw new SentinelError('NotFound', `Dataset ${datasetId} not found`);
    }
    return dataset;
  }

  listDatasets(cameraId: string): Dataset[] {
    return this.store.listDatasets(cameraId);
  }

  latestClosedDataset(cameraId: string): Dataset | null {
    return this.store.findDataset(cameraId, 'closed');
  }

  listSnapshots(datasetId: string, label?: SnapshotLabel): LabeledSnapshot[] {
    return this.store.listDatasetSnapshots(datasetId, label);
  }

  labelCounts(datasetId: string): LabelCounts {
    return this.getDataset(datasetId).labelCounts;
  }

  private requireCamera(cameraId: string): Camera {
    const camera = this.store.getCamera(cameraId);
    if (!camera) {
      throw new SentinelError('NotFound', `Camera ${cameraId} not found`);
    }
    return camera;
  }

  private openDataset(cameraId: string): Dataset {
    const previous = this.store.findDataset(cameraId, 'closed');
    const id = randomUUID();
    this.store.insertDataset({
      id,
      cameraId,
      version: this.store.nextDatasetVersion(cameraId),
      supersedes: previous?.id ?? null,
      createdAt: this.now()
    });
    if (previous) {
      this.store.copyDatasetLinks(previous.id, id);
    }
    this.bus.publish({ topic: 'dataset', kind: 'opened', subjectId: id, cameraId });
    return this.getDataset(id);
  }
}

export function sanitizeLabel(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/\.\./g, '_')
    .replace(/[\s/\\]+/g, '_');
}

function isSnapshotLabel(value: string): value is SnapshotLabel {
  return SNAPSHOT_LABELS.some(label => label === value);
}

function parseLabel(label: string): SnapshotLabel {
  const sanitized = sanitizeLabel(typeof label === 'string' ? label : '');
  if (!isSnapshotLabel(sanitized)) {
    throw new SentinelError('InvalidSnapshot', `Unknown snapshot label "${sanitized}"`);
  }
  return sanitized;
}

function normalizeConditions(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim().toLowerCase();
  return trimmed ? trimmed : null;
}
