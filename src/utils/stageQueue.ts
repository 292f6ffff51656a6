import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';

export type StageQueueOptions = {
  concurrency: number;
  log?: Logger;
  metrics?: MetricsRegistry;
};

export class StageQueue<T> {
  readonly name: string;
  private readonly handler: (item: T) => Promise<void>;
  private readonly keyOf: (item: T) => string;
  private readonly concurrency: number;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly pending: Array<{ key: string; item: T }> = [];
  private readonly inFlight = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(
    name: string,
    handler: (item: T) => Promise<void>,
    keyOf: (item: T) => string,
    options: StageQueueOptions
  ) {
    this.name = name;
    this.handler = handler;
    this.keyOf = keyOf;
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
  }

  enqueue(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const key = this.keyOf(item);
    if (this.inFlight.has(key) || this.pending.some(entry => entry.key === key)) {
      return false;
    }
    this.pending.push({ key, item });
    this.reportDepth();
    this.drain();
    return true;
  }

  has(key: string) {
    return this.inFlight.has(key) || this.pending.some(entry => entry.key === key);
  }

  depth() {
    return this.pending.length + this.inFlight.size;
  }

  onIdle(): Promise<void> {
    if (this.depth() === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  close() {
    this.closed = true;
    this.pending.length = 0;
    this.reportDepth();
    this.notifyIdle();
  }

  private drain() {
    while (this.inFlight.size < this.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) {
        break;
      }
      this.inFlight.add(next.key);
      void this.process(next.key, next.item);
    }
  }

  private async process(key: string, item: T) {
    try {
      await this.metrics.time(`stage.${this.name}`, () => this.handler(item));
      this.metrics.incrementCounter(`stage.${this.name}`, 'processed');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.metrics.recordError(`stage.${this.name}`, message);
      this.log.error({ err: error, stage: this.name, key }, 'Stage handler failed');
    } finally {
      this.inFlight.delete(key);
      this.reportDepth();
      this.drain();
      this.notifyIdle();
    }
  }

  private notifyIdle() {
    if (this.depth() > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private reportDepth() {
    this.metrics.setQueueDepth(this.name, this.depth());
  }
}
