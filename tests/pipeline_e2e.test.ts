import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SentinelRuntime } from '../src/app.js';
import type { FrameDetections, ObjectDetector } from '../src/analysis/detector.js';
import {
  BASE_TIME,
  ScriptedDetector,
  box,
  createCaptureLogger,
  createTestConfig,
  createTestSentinel,
  detectByMarker,
  eventSubmission,
  flatFrame,
  seedNormalDataset,
  storeEventFrames
} from './helpers/fixtures.js';

const NOW = BASE_TIME + 60_000;
const DOG_MARKER = 9;

class StalledDetector implements ObjectDetector {
  readonly name = 'stalled';
  readonly maxBatchSize = 4;

  available() {
    return true;
  }

  detect(): Promise<FrameDetections[]> {
    return new Promise(() => {});
  }
}

describe('VmPipeline', () => {
  let runtime: SentinelRuntime;
  let detector: ScriptedDetector;
  let verdictNotices: string[];

  beforeEach(async () => {
    detector = new ScriptedDetector(
      detectByMarker({
        1: [{ objectClass: 'person', confidence: 0.9, bbox: box(1, 1) }],
        2: [{ objectClass: 'person', confidence: 0.9, bbox: box(1, 1) }],
        3: [{ objectClass: 'person', confidence: 0.9, bbox: box(1, 1) }],
        4: [{ objectClass: 'person', confidence: 0.9, bbox: box(1, 1) }],
        [DOG_MARKER]: [{ objectClass: 'dog', confidence: 0.7, bbox: box(0, 0) }]
      })
    );
    runtime = await createTestSentinel({ detector, log: createCaptureLogger().log, now: () => NOW });
    verdictNotices = [];
    runtime.bus.subscribe('verdict', notice => verdictNotices.push(notice.kind));
    runtime.start();
  });

  afterEach(async () => {
    await runtime.stop();
  });

  async function submitDogEvent(id: string, triggeredAt: number) {
    const frameKeys = await storeEventFrames(runtime.blobs, 'cam-1', id, [1, 2, 3].map(() => flatFrame(DOG_MARKER, 8)));
    const result = await runtime.intake.submit(eventSubmission({ id, cameraId: 'cam-1', triggeredAt, frameKeys }));
    await runtime.whenIdle();
    return result;
  }

  it('rebuilds the baseline when a normal dataset closes', async () => {
    await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });
    await runtime.whenIdle();

    const baseline = runtime.baselines.latest('cam-1');
    expect(baseline?.version).toBe(1);
    expect(baseline?.profiles.map(profile => profile.objectClass)).toEqual(['person']);
  });

  it('turns an accepted event into a persisted verdict', async () => {
    await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });
    await runtime.whenIdle();

    const result = await submitDogEvent('e1', BASE_TIME);

    expect(result).toEqual({ accepted: true, duplicate: false, shed: false, eventId: 'e1' });
    const event = runtime.store.getEvent('e1');
    expect(event).toMatchObject({ status: 'analyzed', degraded: false, analyzedAt: NOW });
    expect(event?.detection?.objects).toHaveLength(3);

    const verdict = runtime.store.getVerdict(event?.verdictId ?? '');
    expect(verdict).toMatchObject({
      eventId: 'e1',
      cameraId: 'cam-1',
      version: 1,
      anomalyType: 'new_object',
      riskLevel: 'critical',
      confidence: 0.7,
      correlatedEventIds: ['e1'],
      explanation: 'dog present 12:00, never observed on this camera in baseline',
      degraded: false
    });
    expect(verdict?.score).toBeCloseTo(0.81, 10);
    expect(verdictNotices).toEqual(['created']);
    expect(runtime.metrics.snapshot().components.verdicts.counters.critical).toBe(1);
  });

  it('groups events of the same kind close together in time', async () => {
    await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });
    await runtime.whenIdle();

    await submitDogEvent('e1', BASE_TIME);
    await submitDogEvent('e2', BASE_TIME + 30_000);

    const second = runtime.store.listVerdictsForEvent('e2')[0];
    expect(second.correlatedEventIds).toEqual(['e1', 'e2']);
    expect(second.score).toBeCloseTo(0.835, 10);
    expect(second.explanation).toBe(
      'dog present 12:00, never observed on this camera in baseline (correlated with 1 other event)'
    );
  });

  it('revises a verdict after operator feedback without touching the original', async () => {
    await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });
    await runtime.whenIdle();
    await submitDogEvent('e1', BASE_TIME);
    await submitDogEvent('e2', BASE_TIME + 30_000);
    const original = runtime.store.listVerdictsForEvent('e1')[0];

    const signal = runtime.feedback.markFalsePositive(original.id);
    const revised = await runtime.pipeline.reanalyze('e1');

    expect(signal).toMatchObject({
      verdictId: original.id,
      eventId: 'e1',
      cameraId: 'cam-1',
      anomalyType: 'new_object',
      kind: 'false_positive',
      createdAt: NOW
    });
    expect(revised).toMatchObject({ version: 2, anomalyType: 'new_object', correlatedEventIds: ['e1', 'e2'] });
    expect(revised.score).toBeCloseTo(0.76, 10);
    expect(runtime.store.listVerdictsForEvent('e1').map(verdict => verdict.version)).toEqual([1, 2]);
    expect(runtime.store.getVerdict(original.id)?.score).toBeCloseTo(0.81, 10);
    expect(runtime.store.getEvent('e1')?.verdictId).toBe(revised.id);
    expect(verdictNotices).toEqual(['created', 'created', 'revised']);
  });

  it('flags a known class seen outside its usual hours', async () => {
    await seedNormalDataset(runtime, 'cam-1', 4, { marker: index => index + 1 });
    await runtime.whenIdle();
    const triggeredAt = BASE_TIME - 10 * 3_600_000;
    const frameKeys = await storeEventFrames(runtime.blobs, 'cam-1', 'night', [flatFrame(1, 8), flatFrame(1, 8)]);

    await runtime.intake.submit(eventSubmission({ id: 'night', cameraId: 'cam-1', triggeredAt, frameKeys }));
    await runtime.whenIdle();

    const verdict = runtime.store.listVerdictsForEvent('night')[0];
    expect(verdict).toMatchObject({
      anomalyType: 'abnormal_time',
      riskLevel: 'critical',
      confidence: 0.9,
      explanation: 'person present 02:00, never observed on this camera 13:00–12:00 in baseline'
    });
    expect(verdict.score).toBeCloseTo(0.82, 10);
  });

  it('falls back to a degraded edge-only verdict when the detector is down', async () => {
    runtime.datasets.registerCamera({ id: 'cam-1' });
    detector.enabled = false;

    await submitDogEvent('e1', BASE_TIME);

    const event = runtime.store.getEvent('e1');
    expect(event).toMatchObject({ status: 'analyzed', degraded: true });
    const verdict = runtime.store.getVerdict(event?.verdictId ?? '');
    expect(verdict).toMatchObject({
      anomalyType: 'none',
      riskLevel: 'normal',
      confidence: 0.5,
      degraded: true,
      explanation:
        'edge anomaly 12:00, reconstruction error 2.0000 over threshold 1.0000, no object-level corroboration [degraded analysis]'
    });
    expect(verdict?.score).toBeCloseTo(0.35, 10);
  });

  it('stores an edge-only verdict when reasoning fails', async () => {
    runtime.datasets.registerCamera({ id: 'cam-1' });
    vi.spyOn(runtime.reasoning, 'reason').mockImplementation(() => {
      throw new Error('profile lookup failed');
    });

    await submitDogEvent('e1', BASE_TIME);

    const event = runtime.store.getEvent('e1');
    expect(event).toMatchObject({ status: 'analyzed', degraded: true });
    const verdict = runtime.store.getVerdict(event?.verdictId ?? '');
    expect(verdict).toMatchObject({
      anomalyType: 'none',
      riskLevel: 'normal',
      confidence: 0.5,
      correlatedEventIds: ['e1'],
      degraded: true,
      explanation:
        'edge anomaly 12:00, reconstruction error 2.0000 over threshold 1.0000, no object-level corroboration [degraded analysis]'
    });
    expect(verdict?.score).toBeCloseTo(0.35, 10);
    expect(runtime.metrics.snapshot().components.reasoning.lastErrorMessage).toBe('reasoning failed');
    expect(verdictNotices).toEqual(['created']);
  });

  it('refuses to reanalyze unknown events', async () => {
    await expect(runtime.pipeline.reanalyze('missing')).rejects.toThrow('NotFound: Event missing not found');
  });
});

describe('VmPipeline analysis timeout', () => {
  it('reaches a degraded verdict shortly after the analysis deadline', async () => {
    const config = createTestConfig();
    const runtime = await createTestSentinel({
      config: { ...config, analysis: { ...config.analysis, timeoutMs: 50 } },
      detector: new StalledDetector(),
      log: createCaptureLogger().log,
      now: () => NOW
    });
    try {
      runtime.datasets.registerCamera({ id: 'cam-1' });
      const frameKeys = await storeEventFrames(runtime.blobs, 'cam-1', 'e1', [flatFrame(1, 8)]);
      const startedAt = Date.now();

      await runtime.intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));
      await runtime.whenIdle();

      expect(Date.now() - startedAt).toBeLessThan(1000);
      const event = runtime.store.getEvent('e1');
      expect(event).toMatchObject({ status: 'analyzed', degraded: true });
      expect(event?.detection).toMatchObject({ degraded: true, timedOut: true });
      expect(runtime.store.getVerdict(event?.verdictId ?? '')?.degraded).toBe(true);
    } finally {
      await runtime.stop();
    }
  });
});

describe('FeedbackService', () => {
  let runtime: SentinelRuntime;

  beforeEach(async () => {
    runtime = await createTestSentinel({ log: createCaptureLogger().log, now: () => NOW });
    runtime.datasets.registerCamera({ id: 'cam-1' });
  });

  afterEach(async () => {
    await runtime.stop();
  });

  it('flags every frame of the event for the next dataset revision', async () => {
    const frameKeys = await storeEventFrames(runtime.blobs, 'cam-1', 'e1', [flatFrame(1, 8), flatFrame(2, 8)]);
    await runtime.intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));
    await runtime.whenIdle();
    const verdictId = runtime.store.getEvent('e1')?.verdictId ?? '';
    const notices: string[] = [];
    runtime.bus.subscribe('feedback', notice => notices.push(notice.kind));

    const signal = runtime.feedback.confirmThreat(verdictId);

    expect(runtime.store.listSnapshotFlags('e1')).toEqual([
      { id: 1, eventId: 'e1', frameKey: frameKeys[0], reason: 'confirmed_threat', createdAt: NOW },
      { id: 2, eventId: 'e1', frameKey: frameKeys[1], reason: 'confirmed_threat', createdAt: NOW }
    ]);
    expect(runtime.feedback.list('cam-1')).toEqual([signal]);
    expect(runtime.store.tallyFeedback('cam-1', 'none')).toEqual({ false_positive: 0, confirmed_threat: 1 });
    expect(runtime.metrics.snapshot().components.feedback.counters.confirmed_threat).toBe(1);
    expect(notices).toEqual(['confirmed_threat']);
  });

  it('rejects feedback on unknown verdicts', () => {
    expect(() => runtime.feedback.markFalsePositive('nope')).toThrow('NotFound: Verdict nope not found');
  });
});
