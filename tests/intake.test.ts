import { beforeEach, describe, expect, it } from 'vitest';
import { SentinelStore } from '../src/db.js';
import { LifecycleBus } from '../src/eventBus.js';
import { EventIntake, edgeConfidence, parseSubmission, type AnalysisQueue } from '../src/events/intake.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { MemoryBlobStore } from '../src/storage/blobStore.js';
import type { SentinelEvent } from '../src/types.js';
import {
  BASE_TIME,
  createCaptureLogger,
  createTestConfig,
  eventSubmission,
  flatFrame,
  storeEventFrames
} from './helpers/fixtures.js';

const NOW = BASE_TIME + 60_000;

class FakeQueue implements AnalysisQueue {
  events: SentinelEvent[] = [];
  currentDepth = 0;

  enqueue(event: SentinelEvent) {
    this.events.push(event);
    return true;
  }

  depth() {
    return this.currentDepth;
  }
}

describe('EventIntake', () => {
  let store: SentinelStore;
  let blobs: MemoryBlobStore;
  let metrics: MetricsRegistry;
  let queue: FakeQueue;
  let notices: string[];
  let intake: EventIntake;
  let frameKeys: string[];

  function createIntake(withQueue: boolean) {
    const { log } = createCaptureLogger();
    const bus = new LifecycleBus({ log, metrics });
    bus.subscribe('event', notice => notices.push(`${notice.kind}:${String(notice.meta?.reason ?? '')}`));
    return new EventIntake({
      store,
      blobs,
      config: createTestConfig().intake,
      queue: withQueue ? queue : undefined,
      bus,
      log,
      metrics,
      now: () => NOW
    });
  }

  beforeEach(async () => {
    store = new SentinelStore(':memory:');
    blobs = new MemoryBlobStore();
    metrics = new MetricsRegistry();
    queue = new FakeQueue();
    notices = [];
    for (const id of ['cam-1', 'cam-2']) {
      store.upsertCamera({
        id,
        name: id,
        resolution: { width: 16, height: 16 },
        profile: null,
        activeModelId: null,
        threshold: null,
        createdAt: BASE_TIME
      });
    }
    frameKeys = await storeEventFrames(blobs, 'cam-1', 'e1', [flatFrame(10), flatFrame(20)]);
    intake = createIntake(true);
  });

  it('records an accepted event and hands it to the analysis queue', async () => {
    const result = await intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));

    expect(result).toEqual({ accepted: true, duplicate: false, shed: false, eventId: 'e1' });
    expect(store.getEvent('e1')).toMatchObject({
      status: 'received',
      clipCoverageMs: 1000,
      degraded: false,
      shed: false,
      receivedAt: NOW,
      frameTimestamps: [BASE_TIME, BASE_TIME + 1000]
    });
    expect(queue.events.map(event => event.id)).toEqual(['e1']);
    expect(notices).toEqual(['received:']);
  });

  it('acknowledges resubmissions without processing them twice', async () => {
    await intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));
    const again = await intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));

    expect(again).toEqual({ accepted: false, duplicate: true, shed: false, eventId: 'e1' });
    expect(queue.events).toHaveLength(1);
    expect(metrics.snapshot().components.intake.counters).toMatchObject({ accepted: 1, duplicates: 1 });
  });

  it('acknowledges a resubmission after its frames were removed', async () => {
    await intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));
    for (const key of frameKeys) {
      await blobs.delete(key);
    }

    const again = await intake.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));

    expect(again).toEqual({ accepted: false, duplicate: true, shed: false, eventId: 'e1' });
    expect(metrics.snapshot().components.intake.counters.rejected).toBeUndefined();
  });

  it('rejects malformed or unresolvable submissions', async () => {
    const base = eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys });
    const cases: Array<[unknown, string]> = [
      [null, 'InvalidEvent: Event must be an object'],
      [{ ...base, id: ' ' }, 'id is required'],
      [{ ...base, triggeredAt: NOW + 300_001 }, 'Event timestamp is out of range'],
      [{ ...base, threshold: 0 }, 'Reconstruction error and threshold must be non-negative'],
      [{ ...base, frameKeys: ['../secrets'] }, 'Event references an invalid blob key'],
      [{ ...base, frameTimestamps: [BASE_TIME + 1000, BASE_TIME] }, 'Frame timestamps must be ordered'],
      [{ ...base, cameraId: 'cam-9' }, 'Camera cam-9 is not registered'],
      [{ ...base, frameKeys: ['events/cam-1/x/0.png'], frameTimestamps: [BASE_TIME] }, 'Blob events/cam-1/x/0.png cannot be resolved']
    ];

    for (const [input, message] of cases) {
      await expect(intake.submit(input)).rejects.toThrow(message);
    }
    expect(store.getEvent('e1')).toBeNull();
    expect(metrics.snapshot().components.intake.counters.rejected).toBe(cases.length);
  });

  it('sheds low-confidence events above the high-water mark', async () => {
    queue.currentDepth = 50;

    const result = await intake.submit(
      eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys, reconstructionError: 1.1, threshold: 1 })
    );

    expect(result).toEqual({ accepted: true, duplicate: false, shed: true, eventId: 'e1' });
    expect(store.getEvent('e1')).toMatchObject({ status: 'analyzed', degraded: true, shed: true, analyzedAt: NOW });
    expect(queue.events).toEqual([]);
    expect(notices).toEqual(['shed:low_confidence']);
  });

  it('sheds near-duplicates of a pending event above the high-water mark', async () => {
    await intake.submit(eventSubmission({ id: 'a1', cameraId: 'cam-1', frameKeys }));
    queue.currentDepth = 50;

    const nearby = await intake.submit(
      eventSubmission({ id: 'a2', cameraId: 'cam-1', frameKeys, triggeredAt: BASE_TIME + 5000 })
    );
    const otherKeys = await storeEventFrames(blobs, 'cam-2', 'a3', [flatFrame(30)]);
    const elsewhere = await intake.submit(
      eventSubmission({ id: 'a3', cameraId: 'cam-2', frameKeys: otherKeys, triggeredAt: BASE_TIME + 5000 })
    );

    expect(nearby.shed).toBe(true);
    expect(elsewhere.shed).toBe(false);
    expect(queue.events.map(event => event.id)).toEqual(['a1', 'a3']);
    expect(notices).toEqual(['received:', 'shed:near_duplicate', 'received:']);
  });

  it('re-queues pending events on recovery', async () => {
    const detached = createIntake(false);
    await detached.submit(eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys }));
    expect(queue.events).toEqual([]);

    detached.attachQueue(queue);
    expect(detached.recover()).toBe(1);
    expect(queue.events.map(event => event.id)).toEqual(['e1']);
  });
});

describe('parseSubmission', () => {
  it('fills defaults for optional fields', () => {
    const parsed = parseSubmission(
      {
        id: ' e1 ',
        cameraId: 'cam-1',
        triggeredAt: BASE_TIME,
        reconstructionError: 2,
        threshold: 1,
        frameKeys: ['events/a.png', 'events/b.png']
      },
      BASE_TIME,
      0
    );

    expect(parsed).toEqual({
      id: 'e1',
      cameraId: 'cam-1',
      triggeredAt: BASE_TIME,
      modelVersionId: null,
      reconstructionError: 2,
      threshold: 1,
      frameKeys: ['events/a.png', 'events/b.png'],
      frameTimestamps: [BASE_TIME, BASE_TIME],
      triggerFrameIndex: 0,
      clipKey: null
    });
  });

  it('bounds the trigger frame index', () => {
    expect(() =>
      parseSubmission(
        { id: 'e1', cameraId: 'cam-1', triggeredAt: BASE_TIME, reconstructionError: 2, threshold: 1, frameKeys: ['a.png'], triggerFrameIndex: 1 },
        BASE_TIME,
        0
      )
    ).toThrow('Trigger frame index is out of range');
  });
});

describe('edgeConfidence', () => {
  it('is the error relative to the threshold', () => {
    expect(edgeConfidence({ reconstructionError: 3, threshold: 2 })).toBe(1.5);
    expect(edgeConfidence({ reconstructionError: 3, threshold: 0 })).toBe(0);
  });
});
