import { beforeEach, describe, expect, it } from 'vitest';
import { ReasoningEngine } from '../src/analysis/reasoning.js';
import { SentinelStore } from '../src/db.js';
import type { BaselineInventory, DetectedObject, DetectionResult, ObjectProfile } from '../src/types.js';
import { BASE_TIME, box, createCaptureLogger, createTestConfig, storedEvent } from './helpers/fixtures.js';

const DAYTIME = [{ startMinute: 480, endMinute: 1080 }];
const EVENING = BASE_TIME + 8 * 3_600_000;

function profile(objectClass: string, overrides: Partial<ObjectProfile> = {}): ObjectProfile {
  const base = {
    objectClass,
    frequency: 0.5,
    occurrences: 5,
    typicalCountRange: [1, 1] satisfies [number, number],
    percentileCountRange: [1, 1] satisfies [number, number],
    meanCount: 1,
    typicalPositions: [10],
    typicalTimeWindows: DAYTIME,
    ...overrides
  };
  return {
    ...base,
    windowFrequencies:
      overrides.windowFrequencies ?? base.typicalTimeWindows.map(window => ({ ...window, frequency: base.frequency }))
  };
}

const BASELINE: BaselineInventory = {
  id: 'b1',
  cameraId: 'cam-1',
  version: 3,
  datasetId: 'd1',
  snapshotCount: 10,
  gridSize: 4,
  profiles: [
    profile('car'),
    profile('person', { frequency: 0.9, occurrences: 9, typicalCountRange: [1, 2], typicalPositions: [5, 6] })
  ],
  createdAt: BASE_TIME
};

function sighting(objectClass: string, frameIndex: number, col: number, row: number, confidence = 0.8): DetectedObject {
  return { objectClass, confidence, bbox: box(col, row), frameIndex };
}

function detection(objects: DetectedObject[], options: { framesAnalyzed?: number; degraded?: boolean } = {}): DetectionResult {
  return {
    objects,
    framesAnalyzed: options.framesAnalyzed ?? 3,
    degraded: options.degraded ?? false,
    timedOut: false,
    durationMs: 5,
    completedAt: BASE_TIME
  };
}

describe('ReasoningEngine', () => {
  let engine: ReasoningEngine;

  beforeEach(() => {
    engine = new ReasoningEngine({
      store: new SentinelStore(':memory:'),
      config: createTestConfig().reasoning,
      log: createCaptureLogger().log
    });
  });

  const event = (options: { triggeredAt?: number; clipCoverageMs?: number } = {}) =>
    storedEvent({
      id: 'e1',
      cameraId: 'cam-1',
      frameKeys: ['events/cam-1/e1/0.png'],
      triggeredAt: options.triggeredAt,
      clipCoverageMs: options.clipCoverageMs
    });

  it('reports classes absent from the baseline first', () => {
    const objects = [
      sighting('dog', 0, 0, 0, 0.7),
      ...[0, 1, 2, 3, 4].map(() => sighting('person', 0, 1, 1))
    ];

    const verdict = engine.reason(event(), detection(objects), BASELINE);

    expect(verdict).toMatchObject({
      eventId: 'e1',
      anomalyType: 'new_object',
      confidence: 0.7,
      correlatedEventIds: ['e1'],
      degraded: false
    });
    expect(verdict.evidence).toEqual({
      objectClass: 'dog',
      observedCount: 1,
      expectedRange: null,
      expectedFrequency: null,
      minuteOfDay: 720,
      baselineWindows: [],
      observedCells: [0],
      dwellMs: null,
      clipCoverageMs: 0,
      reconstructionError: 2,
      threshold: 1,
      baselineVersion: 3
    });
  });

  it('stops reporting a new object once it leaves the clip', () => {
    const withDog = engine.reason(event(), detection([sighting('dog', 0, 0, 0), sighting('person', 0, 1, 1)]), BASELINE);
    const withoutDog = engine.reason(event(), detection([sighting('person', 0, 1, 1)]), BASELINE);

    expect(withDog.anomalyType).toBe('new_object');
    expect(withoutDog.anomalyType).toBe('none');
  });

  it('reports an expected class missing from a long enough clip', () => {
    const verdict = engine.reason(event({ clipCoverageMs: 3000 }), detection([]), BASELINE);

    expect(verdict.anomalyType).toBe('missing_object');
    expect(verdict.confidence).toBe(0.9);
    expect(verdict.evidence).toMatchObject({
      objectClass: 'person',
      observedCount: 0,
      expectedRange: [1, 2],
      expectedFrequency: 0.9,
      baselineWindows: DAYTIME
    });
  });

  it('judges absence by how often the class appears in the current window', () => {
    const dayOnly: BaselineInventory = {
      ...BASELINE,
      profiles: [profile('person', { windowFrequencies: [{ ...DAYTIME[0], frequency: 1 }] })]
    };

    const noon = engine.reason(event({ clipCoverageMs: 3000 }), detection([]), dayOnly);
    const night = engine.reason(
      event({ triggeredAt: BASE_TIME - 10 * 3_600_000, clipCoverageMs: 3000 }),
      detection([]),
      dayOnly
    );

    expect(noon.anomalyType).toBe('missing_object');
    expect(noon.confidence).toBe(1);
    expect(noon.evidence).toMatchObject({ objectClass: 'person', expectedFrequency: 1 });
    expect(night.anomalyType).toBe('none');
  });

  it('does not infer absence from a short clip', () => {
    const verdict = engine.reason(event({ clipCoverageMs: 1000 }), detection([]), BASELINE);
    expect(verdict.anomalyType).toBe('none');
  });

  it('reports counts outside the typical range', () => {
    const objects = [0, 1, 2, 3, 4].map(index => sighting('person', 0, 1, 1, 0.5 + index * 0.1));
    const verdict = engine.reason(event(), detection(objects), BASELINE);

    expect(verdict.anomalyType).toBe('abnormal_count');
    expect(verdict.confidence).toBeCloseTo(0.9, 10);
    expect(verdict.evidence).toMatchObject({ objectClass: 'person', observedCount: 5, expectedRange: [1, 2] });
  });

  it('reports known classes outside their usual hours', () => {
    const verdict = engine.reason(event({ triggeredAt: EVENING }), detection([sighting('person', 0, 1, 1)]), BASELINE);

    expect(verdict.anomalyType).toBe('abnormal_time');
    expect(verdict.evidence).toMatchObject({ objectClass: 'person', minuteOfDay: 1200, baselineWindows: DAYTIME });
  });

  it('reports tracks through cells outside the typical positions', () => {
    const objects = [sighting('person', 0, 1, 1), sighting('person', 1, 3, 3)];
    const verdict = engine.reason(event(), detection(objects), BASELINE);

    expect(verdict.anomalyType).toBe('unusual_path');
    expect(verdict.evidence.observedCells).toEqual([5, 15]);
  });

  it('reports objects that stay for the whole of a long clip', () => {
    const objects = [0, 1, 2].map(frameIndex => sighting('person', frameIndex, 1, 1));
    const verdict = engine.reason(event({ clipCoverageMs: 40_000 }), detection(objects), BASELINE);

    expect(verdict.anomalyType).toBe('unusual_dwell');
    expect(verdict.evidence.dwellMs).toBe(40_000);
  });

  it('falls back to the edge signal when nothing unusual is found', () => {
    const verdict = engine.reason(event(), detection([sighting('person', 0, 1, 1)]), BASELINE);

    expect(verdict.anomalyType).toBe('none');
    expect(verdict.confidence).toBe(0.5);
  });

  it('does not classify degraded analyses or cameras without a baseline', () => {
    const degraded = engine.reason(event(), detection([sighting('dog', 0, 0, 0)], { degraded: true }), BASELINE);
    expect(degraded).toMatchObject({ anomalyType: 'none', degraded: true });

    const unprofiled = engine.reason(event(), detection([sighting('dog', 0, 0, 0)]), null);
    expect(unprofiled.anomalyType).toBe('none');
    expect(unprofiled.evidence.baselineVersion).toBeNull();
  });
});
