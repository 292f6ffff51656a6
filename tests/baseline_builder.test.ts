import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { SentinelRuntime } from '../src/app.js';
import {
  BASE_TIME,
  ScriptedDetector,
  box,
  createCaptureLogger,
  createTestSentinel,
  detectByMarker,
  scenePng,
  seedNormalDataset
} from './helpers/fixtures.js';

describe('BaselineBuilder', () => {
  let runtime: SentinelRuntime;
  let detector: ScriptedDetector;

  beforeEach(async () => {
    detector = new ScriptedDetector(
      detectByMarker({
        1: [
          { objectClass: 'person', confidence: 0.9, bbox: box(1, 1) },
          { objectClass: 'car', confidence: 0.8, bbox: box(2, 2) }
        ],
        2: [
          { objectClass: 'person', confidence: 0.9, bbox: box(1, 1) },
          { objectClass: 'person', confidence: 0.7, bbox: box(1, 2) },
          { objectClass: 'car', confidence: 0.3, bbox: box(2, 2) }
        ],
        3: [{ objectClass: 'person', confidence: 0.9, bbox: box(1, 1) }]
      })
    );
    runtime = await createTestSentinel({ detector, log: createCaptureLogger().log });
  });

  afterEach(async () => {
    await runtime.stop();
  });

  it('profiles each object class seen in the normal snapshots', async () => {
    const notices: string[] = [];
    runtime.bus.subscribe('baseline', notice => notices.push(notice.kind));
    const dataset = await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });

    const inventory = await runtime.baselines.rebuild('cam-1', dataset.id);

    expect(detector.calls).toEqual([4]);
    expect(inventory).toMatchObject({ cameraId: 'cam-1', version: 1, datasetId: dataset.id, snapshotCount: 4, gridSize: 4 });
    expect(inventory.profiles.map(profile => profile.objectClass)).toEqual(['car', 'person']);

    const [car, person] = inventory.profiles;
    expect(car).toEqual({
      objectClass: 'car',
      frequency: 0.25,
      occurrences: 1,
      typicalCountRange: [1, 1],
      percentileCountRange: [1, 1],
      meanCount: 1,
      typicalPositions: [10],
      typicalTimeWindows: [{ startMinute: 720, endMinute: 780 }],
      windowFrequencies: [{ startMinute: 720, endMinute: 780, frequency: 0.25 }]
    });
    expect(person).toMatchObject({
      frequency: 0.75,
      occurrences: 3,
      typicalCountRange: [1, 2],
      typicalPositions: [5, 9],
      typicalTimeWindows: [{ startMinute: 720, endMinute: 780 }]
    });
    expect(person.percentileCountRange[0]).toBe(1);
    expect(person.percentileCountRange[1]).toBeCloseTo(1.8, 10);
    expect(person.meanCount).toBeCloseTo(4 / 3, 10);

    expect(runtime.baselines.latest('cam-1')?.id).toBe(inventory.id);
    expect(notices).toEqual(['rebuilt']);
  });

  it('records how often a class appears within each of its windows', async () => {
    const dataset = await seedNormalDataset(runtime, 'cam-1', 4, {
      capturedAt: index => (index < 2 ? BASE_TIME + index * 60_000 : BASE_TIME - 10 * 3_600_000 + index * 60_000),
      marker: index => (index < 2 ? 3 : 4)
    });

    const inventory = await runtime.baselines.rebuild('cam-1', dataset.id);

    expect(inventory.profiles).toHaveLength(1);
    expect(inventory.profiles[0]).toMatchObject({
      objectClass: 'person',
      frequency: 0.5,
      typicalTimeWindows: [{ startMinute: 720, endMinute: 780 }],
      windowFrequencies: [{ startMinute: 720, endMinute: 780, frequency: 1 }]
    });
  });

  it('rebuilds only after the normal set has grown enough', async () => {
    expect(runtime.baselines.shouldRebuild('cam-1', 0)).toBe(false);
    expect(runtime.baselines.shouldRebuild('cam-1', 1)).toBe(true);

    const dataset = await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });
    await runtime.baselines.rebuild('cam-1', dataset.id);

    expect(runtime.baselines.shouldRebuild('cam-1', 4)).toBe(false);
    expect(runtime.baselines.shouldRebuild('cam-1', 5)).toBe(true);

    const second = await runtime.baselines.rebuild('cam-1', dataset.id);
    expect(second.version).toBe(2);
    expect(runtime.baselines.latest('cam-1')?.version).toBe(2);
  });

  it('refuses datasets it cannot build from', async () => {
    await expect(runtime.baselines.rebuild('cam-1', 'missing')).rejects.toThrow(
      'NotFound: Dataset missing not found for camera cam-1'
    );

    runtime.datasets.registerCamera({ id: 'cam-1' });
    const threats = await runtime.datasets.ingestExport('cam-1', [
      { label: 'threat', capturedAt: BASE_TIME, content: scenePng(1) }
    ]);
    await expect(runtime.baselines.rebuild('cam-1', threats.id)).rejects.toThrow(
      `InsufficientData: Dataset ${threats.id} has no normal snapshots`
    );

    detector.enabled = false;
    await expect(runtime.baselines.rebuild('cam-1', threats.id)).rejects.toThrow(
      'InvalidArgument: Object detector is unavailable'
    );
  });
});
