import type { ModelManifest } from '../channel/edgeChannel.js';
import { SentinelError } from '../errors.js';
import { contentChecksum } from '../storage/blobStore.js';

export type CachedModel = {
  manifest: ModelManifest;
  artifact: Buffer;
  cachedAt: number;
};

export type EdgeModelRecord = {
  cameraId: string;
  version: number;
  activeModelId: string | null;
  lastKnownGoodModelId: string | null;
  updatedAt: number;
};

const DEFAULT_MAX_PER_CAMERA = 3;

export class ModelCache {
  private readonly models = new Map<string, CachedModel>();
  private readonly records = new Map<string, EdgeModelRecord>();

  constructor(
    private readonly maxPerCamera = DEFAULT_MAX_PER_CAMERA,
    private readonly now: () => number = Date.now
  ) {}

  put(manifest: ModelManifest, artifact: Uint8Array): CachedModel {
    const bytes = Buffer.from(artifact);
    if (bytes.length !== manifest.sizeBytes || contentChecksum(bytes) !== manifest.checksum) {
      throw new SentinelError('ChecksumMismatch', `Model ${manifest.modelId} failed checksum verification`);
    }
    const entry: CachedModel = { manifest, artifact: bytes, cachedAt: this.now() };
    this.models.set(manifest.modelId, entry);
    this.evict(manifest.cameraId, manifest.modelId);
    return entry;
  }

  get(modelId: string): CachedModel | null {
    return this.models.get(modelId) ?? null;
  }

  has(cameraId: string, modelId: string) {
    return this.models.get(modelId)?.manifest.cameraId === cameraId;
  }

  list(cameraId: string): string[] {
    return [...this.models.values()]
      .filter(entry => entry.manifest.cameraId === cameraId)
      .sort((a, b) => a.cachedAt - b.cachedAt)
      .map(entry => entry.manifest.modelId);
  }

  record(cameraId: string): EdgeModelRecord {
    return (
      this.records.get(cameraId) ?? {
        cameraId,
        version: 0,
        activeModelId: null,
        lastKnownGoodModelId: null,
        updatedAt: 0
      }
    );
  }

  markActive(cameraId: string, modelId: string): EdgeModelRecord {
    const previous = this.record(cameraId);
    const next: EdgeModelRecord = {
      cameraId,
      version: previous.version + 1,
      activeModelId: modelId,
      lastKnownGoodModelId:
        previous.activeModelId && previous.activeModelId !== modelId
          ? previous.activeModelId
          : previous.lastKnownGoodModelId,
      updatedAt: this.now()
    };
    this.records.set(cameraId, next);
    return next;
  }

  private evict(cameraId: string, incoming: string) {
    const record = this.record(cameraId);
    const pinned = new Set([incoming, record.activeModelId, record.lastKnownGoodModelId]);
    const ids = this.list(cameraId);
    let excess = ids.length - this.maxPerCamera;
    for (const id of ids) {
      if (excess <= 0) {
        break;
      }
      if (!pinned.has(id)) {
        this.models.delete(id);
        excess -= 1;
      }
    }
  }
}
