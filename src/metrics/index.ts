import { performance } from 'node:perf_hooks';

type CounterMap = Record<string, number>;

type HistogramSnapshot = Record<string, number>;

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type LatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type LatencySnapshot = LatencyState & {
  averageMs: number;
};

type ComponentMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

type ComponentSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type QueueSnapshot = {
  depth: number;
  peak: number;
};

type LogLevelSnapshot = {
  byLevel: CounterMap;
  byComponent: Record<string, CounterMap>;
  currentLevel: string;
  lastLevelChangeAt: string | null;
  levelChanges: CounterMap;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  logs: LogLevelSnapshot;
  components: Record<string, ComponentSnapshot>;
  lifecycle: Record<string, CounterMap>;
  queues: Record<string, QueueSnapshot>;
  latencies: Record<string, LatencySnapshot>;
  histograms: Record<string, HistogramSnapshot>;
};

type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

type PrometheusSample = {
  value: number;
  labels: Record<string, string>;
};

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return `${previous}-${bucket}`;
  }
};

const RATIO_HISTOGRAM: HistogramConfig = {
  buckets: [0.5, 1, 1.5, 2, 3, 5, 10],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return `${previous}-${bucket}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByComponent = new Map<string, Map<string, number>>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly components = new Map<string, ComponentMetricState>();
  private readonly lifecycle = new Map<string, Map<string, number>>();
  private readonly queues = new Map<string, QueueSnapshot>();
  private readonly latencyStats = new Map<string, LatencyState>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.components.clear();
    this.lifecycle.clear();
    this.queues.clear();
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramStats.clear();
    this.histogramConfigs.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.component) {
      const byLevel = this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      byLevel.set(normalized, (byLevel.get(normalized) ?? 0) + 1);
      this.logLevelByComponent.set(context.component, byLevel);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
  }

  recordLifecycle(topic: string, kind: string) {
    const byKind = this.lifecycle.get(topic) ?? new Map<string, number>();
    byKind.set(kind, (byKind.get(kind) ?? 0) + 1);
    this.lifecycle.set(topic, byKind);
  }

  incrementCounter(component: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getComponentState(this.components, component);
    const next = (state.counters.get(counter) ?? 0) + amount;
    if (!Number.isFinite(next)) {
      return;
    }
    state.counters.set(counter, next);
    state.lastRunAt = Date.now();
  }

  setGauge(component: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getComponentState(this.components, component);
    state.gauges.set(gauge, value);
    state.lastRunAt = Date.now();
  }

  recordError(component: string, message: string) {
    const state = getComponentState(this.components, component);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  setQueueDepth(stage: string, depth: number) {
    if (!Number.isFinite(depth)) {
      return;
    }
    const current = this.queues.get(stage);
    const peak = Math.max(current?.peak ?? 0, depth);
    this.queues.set(stage, { depth, peak });
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
    this.observeHistogram(metric, durationMs);
  }

  observeRatio(metric: string, ratio: number) {
    this.observeHistogram(metric, ratio, RATIO_HISTOGRAM);
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    this.histogramConfigs.set(metric, histogramConfig);
    const histogram = this.histograms.get(metric) ?? new Map<string, number>();
    this.histograms.set(metric, histogram);

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric) ?? { sum: 0, count: 0 };
      stats.sum += value;
      stats.count += 1;
      this.histogramStats.set(metric, stats);
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelMetrics(): LogLevelSnapshot {
    return {
      byLevel: Object.fromEntries(mapLogLevelCounters(this.logLevelCounters)),
      byComponent: mapFromNested(this.logLevelByComponent),
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
      levelChanges: mapFrom(this.logLevelChangeCounters),
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage
    };
  }

  exportPrometheus(options: PrometheusOptions = {}): string {
    const prefix = options.prefix ?? 'sentinel';
    const baseLabels = options.labels ?? {};
    const blocks: string[] = [];

    const logSamples = Array.from(mapLogLevelCounters(this.logLevelCounters).entries()).map(
      ([level, value]) => ({ value, labels: { level } })
    );
    blocks.push(
      formatPrometheusMetric(`${prefix}_log_level_total`, 'counter', 'Log lines grouped by level', logSamples, baseLabels)
    );

    const counterSamples: PrometheusSample[] = [];
    const gaugeSamples: PrometheusSample[] = [];
    for (const [component, state] of sortedEntries(this.components)) {
      for (const [counter, value] of sortedEntries(state.counters)) {
        counterSamples.push({ value, labels: { component, counter } });
      }
      for (const [gauge, value] of sortedEntries(state.gauges)) {
        gaugeSamples.push({ value, labels: { component, gauge } });
      }
    }
    blocks.push(
      formatPrometheusMetric(
        `${prefix}_component_counter_total`,
        'counter',
        'Component counters grouped by component and counter name',
        counterSamples,
        baseLabels
      )
    );
    blocks.push(
      formatPrometheusMetric(
        `${prefix}_component_gauge`,
        'gauge',
        'Component gauges grouped by component and gauge name',
        gaugeSamples,
        baseLabels
      )
    );

    const lifecycleSamples: PrometheusSample[] = [];
    for (const [topic, byKind] of sortedEntries(this.lifecycle)) {
      for (const [kind, value] of sortedEntries(byKind)) {
        lifecycleSamples.push({ value, labels: { topic, kind } });
      }
    }
    blocks.push(
      formatPrometheusMetric(
        `${prefix}_lifecycle_total`,
        'counter',
        'Lifecycle notifications grouped by topic and kind',
        lifecycleSamples,
        baseLabels
      )
    );

    const queueSamples = Array.from(sortedEntries(this.queues)).map(([stage, queue]) => ({
      value: queue.depth,
      labels: { stage }
    }));
    blocks.push(
      formatPrometheusMetric(`${prefix}_queue_depth`, 'gauge', 'Stage queue depth', queueSamples, baseLabels)
    );

    for (const [metric, histogram] of sortedEntries(this.histograms)) {
      const config = this.histogramConfigs.get(metric) ?? DEFAULT_HISTOGRAM;
      blocks.push(
        formatPrometheusHistogram(
          `${prefix}_${metric}`,
          histogram,
          config,
          this.histogramStats.get(metric),
          baseLabels
        )
      );
    }

    return blocks.filter(Boolean).join('\n') + '\n';
  }

  snapshot(): MetricsSnapshot {
    const components: Record<string, ComponentSnapshot> = {};
    for (const [component, state] of sortedEntries(this.components)) {
      components[component] = {
        counters: mapFrom(state.counters),
        gauges: mapFrom(state.gauges),
        lastRunAt: toIso(state.lastRunAt),
        lastErrorAt: toIso(state.lastErrorAt),
        lastErrorMessage: state.lastErrorMessage
      };
    }

    const latencies: Record<string, LatencySnapshot> = {};
    for (const [metric, stats] of sortedEntries(this.latencyStats)) {
      latencies[metric] = {
        ...stats,
        minMs: Number.isFinite(stats.minMs) ? stats.minMs : 0,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [metric, histogram] of sortedEntries(this.histograms)) {
      histograms[metric] = mapFrom(histogram);
    }

    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      components,
      lifecycle: mapFromNested(this.lifecycle),
      queues: Object.fromEntries(sortedEntries(this.queues)),
      latencies,
      histograms
    };
  }
}

function getComponentState(map: Map<string, ComponentMetricState>, component: string) {
  const existing = map.get(component);
  if (existing) {
    return existing;
  }
  const created: ComponentMetricState = {
    counters: new Map(),
    gauges: new Map(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null
  };
  map.set(component, created);
  return created;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    if (value < bucket) {
      return config.format(bucket, previous);
    }
    previous = bucket;
  }
  return `${config.buckets[config.buckets.length - 1]}+`;
}

function sortedEntries<V>(source: Map<string, V>): Array<[string, V]> {
  return Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(sortedEntries(source));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  for (const [key, inner] of sortedEntries(source)) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapLogLevelCounters(source: Map<string, number>): Map<string, number> {
  const ordered = new Map<string, number>();
  for (const level of PINO_LEVEL_ORDER) {
    const value = source.get(level);
    if (typeof value === 'number') {
      ordered.set(level, value);
    }
  }
  for (const [level, value] of sortedEntries(source)) {
    if (!ordered.has(level)) {
      ordered.set(level, value);
    }
  }
  return ordered;
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

function formatPrometheusMetric(
  name: string,
  type: 'counter' | 'gauge',
  help: string,
  samples: PrometheusSample[],
  baseLabels: Record<string, string>
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }
  const metricName = sanitizePrometheusName(name);
  const lines = [`# HELP ${metricName} ${help}`, `# TYPE ${metricName} ${type}`];
  for (const sample of filtered) {
    lines.push(
      `${metricName}${formatPrometheusLabels({ ...baseLabels, ...sample.labels })} ${formatPrometheusValue(sample.value)}`
    );
  }
  return lines.join('\n');
}

function formatPrometheusHistogram(
  name: string,
  histogram: Map<string, number>,
  config: HistogramConfig,
  stats: { sum: number; count: number } | undefined,
  baseLabels: Record<string, string>
): string {
  const metricName = sanitizePrometheusName(name);
  const lines = [`# TYPE ${metricName} histogram`];
  let cumulative = 0;
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    cumulative += histogram.get(config.format(bucket, previous)) ?? 0;
    lines.push(
      `${metricName}_bucket${formatPrometheusLabels({ ...baseLabels, le: formatPrometheusValue(bucket) })} ${cumulative}`
    );
    previous = bucket;
  }
  const overflow = histogram.get(`${config.buckets[config.buckets.length - 1]}+`) ?? 0;
  const total = Math.max(cumulative + overflow, stats?.count ?? 0);
  lines.push(`${metricName}_bucket${formatPrometheusLabels({ ...baseLabels, le: '+Inf' })} ${total}`);
  lines.push(`${metricName}_sum${formatPrometheusLabels(baseLabels)} ${formatPrometheusValue(stats?.sum ?? 0)}`);
  lines.push(`${metricName}_count${formatPrometheusLabels(baseLabels)} ${total}`);
  return lines.join('\n');
}

function sanitizePrometheusName(name: string): string {
  const collapsed = name
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  if (!collapsed) {
    return 'sentinel_metric';
  }
  return /^[0-9]/.test(collapsed) ? `sentinel_${collapsed}` : collapsed;
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) {
    return '';
  }
  const rendered = entries.map(
    ([key, value]) =>
      `${sanitizePrometheusName(key)}="${value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"')}"`
  );
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export type {
  ComponentSnapshot,
  HistogramConfig,
  HistogramSnapshot,
  LatencySnapshot,
  LogLevelSnapshot,
  MetricsSnapshot,
  PrometheusOptions
};
export { MetricsRegistry };
export default defaultRegistry;
