import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSentinel, type SentinelRuntime } from '../src/app.js';
import {
  LoopbackEdgeChannel,
  type DeploymentAck,
  type EdgeChannel,
  type EdgeHealthReport,
  type ModelManifest
} from '../src/channel/edgeChannel.js';
import { SentinelStore } from '../src/db.js';
import { SentinelError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { MemoryBlobStore } from '../src/storage/blobStore.js';
import {
  ScriptedDetector,
  createCaptureLogger,
  createTestConfig,
  insertTrainedModel
} from './helpers/fixtures.js';

/** Forwards to the loopback link, failing or pausing chunk delivery on demand. */
class FlakyChannel implements EdgeChannel {
  inner: EdgeChannel | null = null;
  failures = 0;
  chunksSent = 0;
  aborts = 0;
  private gate: Promise<void> | null = null;
  private openGate: () => void = () => {};
  private reachedGate: () => void = () => {};

  pauseAfterFirstChunk(): Promise<void> {
    this.gate = new Promise(resolve => {
      this.openGate = resolve;
    });
    return new Promise(resolve => {
      this.reachedGate = resolve;
    });
  }

  release() {
    this.openGate();
  }

  private link(): EdgeChannel {
    if (!this.inner) {
      throw new Error('channel is not connected');
    }
    return this.inner;
  }

  beginTransfer(manifest: ModelManifest): Promise<string> {
    return this.link().beginTransfer(manifest);
  }

  async sendChunk(transferId: string, index: number, chunk: Uint8Array): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new SentinelError('TransferFailed', 'Link dropped');
    }
    await this.link().sendChunk(transferId, index, chunk);
    this.chunksSent += 1;
    if (this.gate && index === 0) {
      this.reachedGate();
      await this.gate;
    }
  }

  commitTransfer(transferId: string): Promise<void> {
    return this.link().commitTransfer(transferId);
  }

  abortTransfer(transferId: string): Promise<void> {
    this.aborts += 1;
    return this.link().abortTransfer(transferId);
  }

  activate(cameraId: string, modelId: string): Promise<DeploymentAck> {
    return this.link().activate(cameraId, modelId);
  }

  hasModel(cameraId: string, modelId: string): Promise<boolean> {
    return this.link().hasModel(cameraId, modelId);
  }

  syncHealth(cameraId?: string): Promise<EdgeHealthReport[]> {
    return this.link().syncHealth(cameraId);
  }
}

describe('ModelDistributor', () => {
  let runtime: SentinelRuntime;
  let channel: FlakyChannel;
  let deploymentNotices: string[];

  beforeEach(async () => {
    channel = new FlakyChannel();
    runtime = await createSentinel({
      config: createTestConfig(),
      store: new SentinelStore(':memory:'),
      blobs: new MemoryBlobStore(),
      detector: new ScriptedDetector(),
      metrics: new MetricsRegistry(),
      log: createCaptureLogger().log,
      channel
    });
    channel.inner = new LoopbackEdgeChannel(runtime.agent);
    runtime.datasets.registerCamera({ id: 'cam-1' });
    deploymentNotices = [];
    runtime.bus.subscribe('deployment', notice => deploymentNotices.push(notice.kind));
  });

  afterEach(async () => {
    await runtime.stop();
  });

  it('streams the artifact in chunks and activates it on the edge', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');

    const result = await runtime.distributor.deploy(model.id, 'cam-1');

    expect(result).toMatchObject({ cameraId: 'cam-1', modelId: model.id, version: 1, streamed: true, attempts: 1 });
    expect(channel.chunksSent).toBe(Math.ceil(model.sizeBytes / 256));
    expect(runtime.catalog.getModel(model.id).state).toBe('deployed');
    expect(runtime.engine.activeModel('cam-1')?.modelId).toBe(model.id);
    expect(runtime.cameraHealth('cam-1')).toEqual([
      { cameraId: 'cam-1', health: 'ok', deployedModelId: model.id, edgeModelId: model.id }
    ]);
    expect(deploymentNotices).toEqual(['started', 'activated']);

    const [report] = await channel.syncHealth('cam-1');
    expect(report).toMatchObject({
      state: 'model_loaded',
      activeModelId: model.id,
      activeVersion: 1,
      recordVersion: 1,
      cachedModelIds: [model.id]
    });
  });

  it('keeps a single deployed model under concurrent deploys', async () => {
    const first = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    const second = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { seed: 5 });

    const results = await Promise.all([
      runtime.distributor.deploy(first.id, 'cam-1'),
      runtime.distributor.deploy(second.id, 'cam-1')
    ]);

    expect(results.map(result => result.modelId)).toEqual([first.id, second.id]);
    expect(runtime.store.findModelsByState('cam-1', 'deployed').map(model => model.id)).toEqual([second.id]);
    expect(runtime.catalog.getModel(first.id).state).toBe('superseded');
    expect(runtime.cameraHealth('cam-1')[0]).toMatchObject({ health: 'ok', edgeModelId: second.id });
  });

  it('retries transient transfer failures with backoff', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    channel.failures = 2;

    const result = await runtime.distributor.deploy(model.id, 'cam-1');

    expect(result.attempts).toBe(3);
    expect(channel.aborts).toBe(2);
    expect(runtime.metrics.snapshot().components.distribution.counters).toMatchObject({ retries: 2, deployed: 1 });
  });

  it('reports a failed deployment after the attempt budget and keeps the catalog unchanged', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    channel.failures = 10;

    await expect(runtime.distributor.deploy(model.id, 'cam-1')).rejects.toThrow(
      `DeploymentFailed: Deployment of model ${model.id} failed: Link dropped`
    );

    expect(runtime.catalog.getModel(model.id).state).toBe('validated');
    expect(runtime.engine.activeModel('cam-1')).toBeNull();
    expect(runtime.cameraHealth('cam-1')[0].health).toBe('no_model');
    expect(deploymentNotices).toEqual(['started', 'failed']);
    expect(channel.failures).toBe(7);
  });

  it('rolls back to the cached previous model without streaming it again', async () => {
    const first = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    const second = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { seed: 9 });
    await runtime.distributor.deploy(first.id, 'cam-1');
    await runtime.distributor.deploy(second.id, 'cam-1');
    const chunksBefore = channel.chunksSent;

    const result = await runtime.distributor.rollback('cam-1');

    expect(result).toMatchObject({ modelId: first.id, streamed: false, attempts: 0 });
    expect(channel.chunksSent).toBe(chunksBefore);
    expect(runtime.catalog.getModel(first.id).state).toBe('deployed');
    expect(runtime.catalog.getModel(second.id).state).toBe('rolled_back');
    expect(runtime.engine.activeModel('cam-1')?.modelId).toBe(first.id);
    expect(deploymentNotices.at(-1)).toBe('rolled_back');
  });

  it('refuses models that cannot be deployed to the camera', async () => {
    runtime.datasets.registerCamera({ id: 'cam-2' });
    const trained = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { state: 'trained' });
    const other = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-2');

    await expect(runtime.distributor.deploy(trained.id, 'cam-1')).rejects.toThrow(
      `InvalidTransition: Model ${trained.id} is trained and cannot be deployed`
    );
    await expect(runtime.distributor.deploy(other.id, 'cam-1')).rejects.toThrow(
      `InvalidArgument: Model ${other.id} belongs to camera cam-2`
    );
    await expect(runtime.distributor.rollback('cam-1')).rejects.toThrow('Camera cam-1 has no deployed model');
    expect(deploymentNotices).toEqual([]);
  });

  it('aborts an in-flight transfer', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    const paused = channel.pauseAfterFirstChunk();

    const pending = runtime.distributor.deploy(model.id, 'cam-1');
    await paused;
    expect(runtime.distributor.isDeploying('cam-1')).toBe(true);
    expect(runtime.distributor.abort('cam-1')).toBe(true);
    channel.release();

    await expect(pending).rejects.toMatchObject({ code: 'Cancelled' });
    expect(runtime.distributor.isDeploying('cam-1')).toBe(false);
    expect(runtime.distributor.abort('cam-1')).toBe(false);
    expect(channel.aborts).toBe(1);
    expect(await channel.hasModel('cam-1', model.id)).toBe(false);
    expect(deploymentNotices).toEqual(['started', 'cancelled']);
  });

  it('flags cameras whose edge model differs from the catalog', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    runtime.catalog.markDeployed(model.id);
    expect(runtime.cameraHealth()).toEqual([
      { cameraId: 'cam-1', health: 'degraded', deployedModelId: model.id, edgeModelId: null }
    ]);
  });
});
