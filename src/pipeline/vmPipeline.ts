import type { BaselineBuilder } from '../analysis/baselineBuilder.js';
import type { DeepAnalysis } from '../analysis/deepAnalysis.js';
import type { ReasoningEngine } from '../analysis/reasoning.js';
import type { RiskScorer } from '../analysis/riskScoring.js';
import type { SentinelStore } from '../db.js';
import { SentinelError } from '../errors.js';
import lifecycleBus, { type LifecycleBus, type LifecycleNotice } from '../eventBus.js';
import type { AnalysisQueue } from '../events/intake.js';
import logger, { type Logger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { AnomalyVerdict, DetectionResult, SentinelEvent, VerdictDraft } from '../types.js';
import { StageQueue } from '../utils/stageQueue.js';

type ReasoningItem = {
  event: SentinelEvent;
  detection: DetectionResult;
};

export type VmPipelineOptions = {
  analysisConcurrency?: number;
};

interface VmPipelineDependencies {
  store: SentinelStore;
  analysis: DeepAnalysis;
  reasoning: ReasoningEngine;
  scorer: RiskScorer;
  baselines: BaselineBuilder;
  options?: VmPipelineOptions;
  bus?: LifecycleBus;
  log?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

/**
 * intake → analysis → reasoning/scoring → persisted verdict. Reasoning runs
 * one event at a time so correlation sees every earlier verdict.
 */
export class VmPipeline implements AnalysisQueue {
  private readonly store: SentinelStore;
  private readonly analysis: DeepAnalysis;
  private readonly reasoning: ReasoningEngine;
  private readonly scorer: RiskScorer;
  private readonly baselines: BaselineBuilder;
  private readonly bus: LifecycleBus;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private readonly analysisQueue: StageQueue<SentinelEvent>;
  private readonly reasoningQueue: StageQueue<ReasoningItem>;
  private readonly rebuilds = new Set<Promise<void>>();
  private unsubscribe: (() => void) | null = null;

  constructor(dependencies: VmPipelineDependencies) {
    this.store = dependencies.store;
    this.analysis = dependencies.analysis;
    this.reasoning = dependencies.reasoning;
    this.scorer = dependencies.scorer;
    this.baselines = dependencies.baselines;
    this.bus = dependencies.bus ?? lifecycleBus;
    this.log = (dependencies.log ?? logger).child({ component: 'vm-pipeline' });
    this.metrics = dependencies.metrics ?? metrics;
    this.now = dependencies.now ?? Date.now;

    const stageOptions = { log: this.log, metrics: this.metrics };
    this.analysisQueue = new StageQueue(
      'analysis',
      event => this.analyzeStage(event),
      event => event.id,
      { ...stageOptions, concurrency: dependencies.options?.analysisConcurrency ?? 2 }
    );
    this.reasoningQueue = new StageQueue(
      'reasoning',
      item => this.reasoningStage(item),
      item => item.event.id,
      { ...stageOptions, concurrency: 1 }
    );
  }

  start() {
    if (!this.unsubscribe) {
      this.unsubscribe = this.bus.subscribe('dataset', notice => this.onDatasetNotice(notice));
    }
  }

  stop() {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.analysisQueue.close();
    this.reasoningQueue.close();
  }

  enqueue(event: SentinelEvent): boolean {
    return this.analysisQueue.enqueue(event);
  }

  depth() {
    return this.analysisQueue.depth() + this.reasoningQueue.depth();
  }

  async reanalyze(eventId: string): Promise<AnomalyVerdict> {
    const event = this.store.getEvent(eventId);
    if (!event) {
      throw new SentinelError('NotFound', `Event ${eventId} not found`);
    }
    if (event.status !== 'analyzed' || this.analysisQueue.has(eventId) || this.reasoningQueue.has(eventId)) {
      throw new SentinelError('InvalidTransition', `Event ${eventId} is still being analyzed`);
    }
    const detection = await this.analysis.analyze(event);
    return this.conclude(event, detection);
  }

  async whenIdle() {
    while (this.depth() > 0 || this.rebuilds.size > 0) {
      await this.analysisQueue.onIdle();
      await this.reasoningQueue.onIdle();
      await Promise.all([...this.rebuilds]);
    }
  }

  private async analyzeStage(event: SentinelEvent) {
    const current = this.store.getEvent(event.id) ?? event;
    if (current.status === 'analyzed') {
      return;
    }
    const analyzing: SentinelEvent = { ...current, status: 'analyzing' };
    this.store.updateEvent(analyzing);
    const detection = await this.analysis.analyze(analyzing);
    this.reasoningQueue.enqueue({ event: analyzing, detection });
  }

  private async reasoningStage(item: ReasoningItem) {
    try {
      this.conclude(item.event, item.detection);
    } catch (error) {
      this.metrics.recordError('reasoning', 'reasoning failed');
      this.log.error({ err: error, eventId: item.event.id }, 'Reasoning failed, storing edge-only verdict');
      this.persist(item.event, { ...item.detection, degraded: true }, this.reasoning.edgeOnly(item.event));
    }
  }

  private conclude(event: SentinelEvent, detection: DetectionResult): AnomalyVerdict {
    const baseline = this.baselines.latest(event.cameraId);
    return this.persist(event, detection, this.reasoning.reason(event, detection, baseline));
  }

  private persist(event: SentinelEvent, detection: DetectionResult, draft: VerdictDraft): AnomalyVerdict {
    const verdict = this.scorer.score(draft);
    const analyzedAt = this.now();
    this.store.transaction(() => {
      this.store.insertVerdict(verdict);
      this.store.updateEvent({
        ...event,
        status: 'analyzed',
        detection,
        degraded: event.degraded || detection.degraded,
        verdictId: verdict.id,
        analyzedAt
      });
    });
    this.metrics.incrementCounter('verdicts', verdict.riskLevel);
    this.metrics.observeLatency('pipeline.event_to_verdict', Math.max(0, analyzedAt - event.receivedAt));
    this.bus.publish({
      topic: 'verdict',
      kind: verdict.version > 1 ? 'revised' : 'created',
      subjectId: verdict.id,
      cameraId: verdict.cameraId,
      meta: {
        eventId: event.id,
        anomalyType: verdict.anomalyType,
        riskLevel: verdict.riskLevel,
        version: verdict.version,
        degraded: verdict.degraded
      }
    });
    return verdict;
  }

  private onDatasetNotice(notice: LifecycleNotice) {
    if (notice.kind !== 'closed' || !notice.cameraId) {
      return;
    }
    const cameraId = notice.cameraId;
    const normalCount = typeof notice.meta?.normalCount === 'number' ? notice.meta.normalCount : 0;
    if (!this.baselines.shouldRebuild(cameraId, normalCount)) {
      return;
    }
    const rebuild = this.baselines
      .rebuild(cameraId, notice.subjectId)
      .then(() => undefined)
      .catch((error: unknown) => {
        this.metrics.recordError('baseline', 'rebuild failed');
        this.log.error({ err: error, cameraId, datasetId: notice.subjectId }, 'Baseline rebuild failed');
      })
      .finally(() => {
        this.rebuilds.delete(rebuild);
      });
    this.rebuilds.add(rebuild);
  }
}
