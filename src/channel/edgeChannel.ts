import type { ModelFormat, PreprocessingParams } from '../types.js';

export interface ModelManifest {
  modelId: string;
  cameraId: string;
  version: number;
  format: ModelFormat;
  checksum: string;
  sizeBytes: number;
  threshold: number;
  preprocessing: PreprocessingParams;
}

export interface DeploymentAck {
  cameraId: string;
  modelId: string;
  version: number;
  activatedAt: number;
}

export type EdgeCameraState = 'no_model' | 'model_loaded';

export interface EdgeHealthReport {
  cameraId: string;
  state: EdgeCameraState;
  activeModelId: string | null;
  activeVersion: number | null;
  lastKnownGoodModelId: string | null;
  recordVersion: number;
  cachedModelIds: string[];
  framesProcessed: number;
  eventsEmitted: number;
  capabilities: string[];
}

/**
 * Edge side of the VM link. Delivery is reliable and ordered; retries belong
 * to the caller.
 */
export interface EdgeChannel {
  beginTransfer(manifest: ModelManifest): Promise<string>;
  sendChunk(transferId: string, index: number, chunk: Uint8Array): Promise<void>;
  commitTransfer(transferId: string): Promise<void>;
  abortTransfer(transferId: string): Promise<void>;
  activate(cameraId: string, modelId: string): Promise<DeploymentAck>;
  hasModel(cameraId: string, modelId: string): Promise<boolean>;
  syncHealth(cameraId?: string): Promise<EdgeHealthReport[]>;
}

export interface EdgeEndpoint {
  beginTransfer(manifest: ModelManifest): string;
  receiveChunk(transferId: string, index: number, chunk: Uint8Array): void;
  commitTransfer(transferId: string): Promise<void>;
  abortTransfer(transferId: string): void;
  activate(cameraId: string, modelId: string): Promise<DeploymentAck>;
  hasModel(cameraId: string, modelId: string): boolean;
  health(cameraId?: string): EdgeHealthReport[];
}

export class LoopbackEdgeChannel implements EdgeChannel {
  constructor(private readonly endpoint: EdgeEndpoint) {}

  async beginTransfer(manifest: ModelManifest) {
    return this.endpoint.beginTransfer(manifest);
  }

  async sendChunk(transferId: string, index: number, chunk: Uint8Array) {
    this.endpoint.receiveChunk(transferId, index, Uint8Array.from(chunk));
  }

  async commitTransfer(transferId: string) {
    await this.endpoint.commitTransfer(transferId);
  }

  async abortTransfer(transferId: string) {
    this.endpoint.abortTransfer(transferId);
  }

  async activate(cameraId: string, modelId: string) {
    return this.endpoint.activate(cameraId, modelId);
  }

  async hasModel(cameraId: string, modelId: string) {
    return this.endpoint.hasModel(cameraId, modelId);
  }

  async syncHealth(cameraId?: string) {
    return this.endpoint.health(cameraId);
  }
}
