import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SentinelRuntime } from '../src/app.js';
import { canTransition } from '../src/catalog/modelCatalog.js';
import {
  createCaptureLogger,
  createTestSentinel,
  insertTrainedModel,
  seedNormalDataset
} from './helpers/fixtures.js';

describe('ModelCatalog', () => {
  let runtime: SentinelRuntime;
  let holdoutKeys: string[];
  let modelNotices: string[];

  beforeEach(async () => {
    runtime = await createTestSentinel({ log: createCaptureLogger().log });
    const dataset = await seedNormalDataset(runtime, 'cam-1', 6);
    holdoutKeys = runtime.datasets.listSnapshots(dataset.id).slice(0, 2).map(snapshot => snapshot.contentKey);
    modelNotices = [];
    runtime.bus.subscribe('model', notice => modelNotices.push(notice.kind));
  });

  afterEach(async () => {
    await runtime.stop();
  });

  it('validates a trained model against its holdout images', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', {
      state: 'trained',
      threshold: 1e6,
      holdoutKeys
    });

    const report = await runtime.catalog.validate(model.id);

    expect(report.samples).toBe(2);
    expect(report.bound).toBe(3e6);
    expect(report.meanError).toBeGreaterThan(0);
    expect(report.model.state).toBe('validated');
    expect(modelNotices).toEqual(['validated']);
  });

  it('falls back to the latest closed dataset when no holdout was recorded', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { state: 'trained', threshold: 1e6 });
    const report = await runtime.catalog.validate(model.id);
    expect(report.samples).toBe(6);
  });

  it('rejects a model whose holdout error exceeds the sanity bound', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', {
      state: 'trained',
      threshold: 1e-9,
      holdoutKeys
    });

    await expect(runtime.catalog.validate(model.id)).rejects.toThrow(/^ValidationFailed: Holdout error \d+\.\d{6} exceeds bound 0\.000000$/);

    const stored = runtime.catalog.getModel(model.id);
    expect(stored.state).toBe('trained');
    expect(stored.stateHistory.at(-1)?.reason?.startsWith('validation rejected: Holdout error')).toBe(true);
    expect(modelNotices).toEqual(['rejected']);
  });

  it('rejects artifacts that do not match their checksum', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { state: 'trained', holdoutKeys });
    await runtime.blobs.put(model.artifactKey, Buffer.from('tampered'));

    await expect(runtime.catalog.validate(model.id)).rejects.toThrow('ValidationFailed: Artifact checksum mismatch');
    await expect(runtime.catalog.loadArtifact(model)).rejects.toMatchObject({
      code: 'ChecksumMismatch',
      retryable: false
    });
  });

  it('only validates trained models', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    await expect(runtime.catalog.validate(model.id)).rejects.toThrow(
      `InvalidTransition: Model ${model.id} is validated, expected trained`
    );
    await expect(runtime.catalog.validate('missing')).rejects.toThrow('NotFound: Model missing not found');
  });

  it('supersedes the previous deployment and rolls back to it', async () => {
    const first = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    const second = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { seed: 4 });

    runtime.catalog.markDeployed(first.id);
    runtime.catalog.markDeployed(second.id);

    expect(runtime.catalog.getModel(first.id).state).toBe('superseded');
    expect(runtime.catalog.getDeployed('cam-1')?.id).toBe(second.id);
    expect(runtime.catalog.previousDeployable('cam-1')?.id).toBe(first.id);
    expect(runtime.store.getCamera('cam-1')?.activeModelId).toBe(second.id);

    const { rolledBack, restored } = runtime.catalog.rollback('cam-1');
    expect(rolledBack).toMatchObject({ id: second.id, state: 'rolled_back' });
    expect(restored).toMatchObject({ id: first.id, state: 'deployed' });
    expect(restored.stateHistory.at(-1)?.reason).toBe('rollback from version 2');
    expect(runtime.store.getCamera('cam-1')?.activeModelId).toBe(first.id);
    expect(modelNotices).toEqual(['deployed', 'superseded', 'deployed', 'rolled_back']);

    expect(() => runtime.catalog.rollback('cam-1')).toThrow('NotFound: Camera cam-1 has no rollback target');
  });

  it('guards the state machine', async () => {
    const trained = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1', { state: 'trained' });
    expect(() => runtime.catalog.markDeployed(trained.id)).toThrow(
      `Model ${trained.id} is trained and cannot be deployed`
    );
    expect(() => runtime.catalog.rollback('cam-1')).toThrow('Camera cam-1 has no deployed model');

    const deployed = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');
    runtime.catalog.markDeployed(deployed.id);
    expect(() => runtime.catalog.archive(deployed.id)).toThrow(
      `Model ${deployed.id} cannot move from deployed to archived`
    );
    expect(runtime.catalog.archive(trained.id, 'cleanup').stateHistory.at(-1)).toMatchObject({
      state: 'archived',
      reason: 'cleanup'
    });

    expect(canTransition('superseded', 'deployed')).toBe(true);
    expect(canTransition('rolled_back', 'deployed')).toBe(false);
    expect(canTransition('archived', 'trained')).toBe(false);
  });
});
