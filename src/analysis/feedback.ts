import { randomUUID } from 'node:crypto';
import type { SentinelStore } from '../db.js';
import { SentinelError } from '../errors.js';
import lifecycleBus, { type LifecycleBus } from '../eventBus.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { FeedbackKind, FeedbackSignal } from '../types.js';

interface FeedbackServiceDependencies {
  store: SentinelStore;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

/** Operator feedback is appended; verdicts themselves are never edited. */
export class FeedbackService {
  private readonly store: SentinelStore;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;

  constructor(dependencies: FeedbackServiceDependencies) {
    this.store = dependencies.store;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'feedback' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;
  }

  markFalsePositive(verdictId: string): FeedbackSignal {
    return this.record(verdictId, 'false_positive');
  }

  confirmThreat(verdictId: string): FeedbackSignal {
    return this.record(verdictId, 'confirmed_threat');
  }

  list(cameraId: string): FeedbackSignal[] {
    return this.store.listFeedback(cameraId);
  }

  private record(verdictId: string, kind: FeedbackKind): FeedbackSignal {
    const verdict = this.store.getVerdict(verdictId);
    if (!verdict) {
      throw new SentinelError('NotFound', `Verdict ${verdictId} not found`);
    }
    const event = this.store.getEvent(verdict.eventId);
    const createdAt = this.now();
    const signal: FeedbackSignal = {
      id: randomUUID(),
      verdictId,
      eventId: verdict.eventId,
      cameraId: verdict.cameraId,
      anomalyType: verdict.anomalyType,
      kind,
      createdAt
    };

    this.store.transaction(() => {
      this.store.insertFeedback(signal);
      for (const frameKey of event?.frameKeys ?? []) {
        this.store.insertSnapshotFlag({ eventId: verdict.eventId, frameKey, reason: kind, createdAt });
      }
    });

    this.metrics.incrementCounter('feedback', kind);
    this.bus.publish({
      topic: 'feedback',
      kind,
      subjectId: signal.id,
      cameraId: verdict.cameraId,
      meta: { verdictId, eventId: verdict.eventId, anomalyType: verdict.anomalyType }
    });
    this.log.info({ verdictId, kind, frames: event?.frameKeys.length ?? 0 }, 'Operator feedback recorded');
    return signal;
  }
}
