import { EventEmitter } from 'node:events';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';

const NOTICE_CHANNEL = 'notice';

export type LifecycleTopic =
  | 'dataset'
  | 'job'
  | 'model'
  | 'deployment'
  | 'event'
  | 'verdict'
  | 'baseline'
  | 'feedback';

export interface LifecycleNotice {
  topic: LifecycleTopic;
  kind: string;
  subjectId: string;
  cameraId: string | null;
  ts: number;
  meta?: Record<string, unknown>;
}

export type LifecycleNoticeInput = Omit<LifecycleNotice, 'ts'> & { ts?: number };

type NoticeListener = (notice: LifecycleNotice) => void;

interface LifecycleBusDependencies {
  log: Logger;
  metrics?: MetricsRegistry;
}

const WARN_KINDS = new Set(['failed', 'cancelled', 'rejected', 'shed', 'rolled_back']);

class LifecycleBus extends EventEmitter {
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: LifecycleBusDependencies = { log: logger }) {
    super();
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;

    this.on(NOTICE_CHANNEL, (notice: LifecycleNotice) => {
      this.metrics.recordLifecycle(notice.topic, notice.kind);
      const payload = {
        topic: notice.topic,
        kind: notice.kind,
        subjectId: notice.subjectId,
        cameraId: notice.cameraId,
        meta: notice.meta
      };
      if (WARN_KINDS.has(notice.kind)) {
        this.log.warn(payload, `${notice.topic} ${notice.kind}`);
      } else {
        this.log.info(payload, `${notice.topic} ${notice.kind}`);
      }
    });
  }

  publish(input: LifecycleNoticeInput): LifecycleNotice {
    const notice: LifecycleNotice = {
      topic: input.topic,
      kind: input.kind,
      subjectId: input.subjectId,
      cameraId: input.cameraId,
      ts: input.ts ?? Date.now(),
      meta: input.meta
    };
    this.emit(NOTICE_CHANNEL, notice);
    this.emit(notice.topic, notice);
    return notice;
  }

  subscribe(topic: LifecycleTopic | '*', listener: NoticeListener): () => void {
    const channel = topic === '*' ? NOTICE_CHANNEL : topic;
    const wrapper = (notice: LifecycleNotice) => {
      try {
        listener(notice);
      } catch (error) {
        this.log.error({ err: error, topic: notice.topic, kind: notice.kind }, 'Lifecycle listener failed');
      }
    };
    this.on(channel, wrapper);
    return () => {
      this.off(channel, wrapper);
    };
  }
}

const lifecycleBus = new LifecycleBus();

export default lifecycleBus;
export { LifecycleBus };
