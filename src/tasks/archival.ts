import { VALIDATION_REJECTED_NOTE, type ModelCatalog } from '../catalog/modelCatalog.js';
import logger, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { ModelVersion } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ArchivalTaskOptions {
  catalog: ModelCatalog;
  enabled?: boolean;
  olderThanDays: number;
  keepRollbackTargets?: boolean;
  intervalMs?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type ArchivalRunResult = {
  skipped: boolean;
  archived: string[];
  kept: string[];
};

export class ArchivalTask {
  private options: ArchivalTaskOptions;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;

  constructor(options: ArchivalTaskOptions) {
    this.options = options;
    this.log = (options.logger ?? logger).child({ component: 'archival' });
  }

  start() {
    if (this.timer) {
      return;
    }
    this.stopped = false;
    this.scheduleNext(0);
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  configure(options: Partial<Omit<ArchivalTaskOptions, 'catalog'>>) {
    this.options = { ...this.options, ...options };
    if (this.stopped || this.running) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.scheduleNext(0);
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped || this.options.enabled === false) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce();
    }, delayMs);
    this.timer.unref();
  }

  private async runOnce() {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      await runArchivalOnce(this.options);
    } catch (error) {
      this.log.error({ err: error }, 'Archival task failed');
    } finally {
      this.running = false;
      this.scheduleNext(this.options.intervalMs ?? 60 * 60 * 1000);
    }
  }
}

/**
 * Archives superseded, rolled back and validation-rejected models older
 * than the cutoff. The newest superseded model per camera is kept as the
 * rollback target unless `keepRollbackTargets` is false.
 */
export async function runArchivalOnce(options: ArchivalTaskOptions): Promise<ArchivalRunResult> {
  const log = (options.logger ?? logger).child({ component: 'archival' });
  const metrics = options.metrics ?? metricsModule;
  if (options.enabled === false) {
    return { skipped: true, archived: [], kept: [] };
  }

  const now = (options.now ?? Date.now)();
  const cutoff = now - Math.max(0, options.olderThanDays) * DAY_MS;
  const keepTargets = options.keepRollbackTargets ?? true;
  const models = options.catalog.listModels();

  const rollbackTargets = new Set<string>();
  if (keepTargets) {
    const newestSuperseded = new Map<string, ModelVersion>();
    for (const model of models) {
      if (model.state !== 'superseded') {
        continue;
      }
      const current = newestSuperseded.get(model.cameraId);
      if (!current || model.version > current.version) {
        newestSuperseded.set(model.cameraId, model);
      }
    }
    for (const model of newestSuperseded.values()) {
      rollbackTargets.add(model.id);
    }
  }

  const archived: string[] = [];
  const kept: string[] = [];
  for (const model of models) {
    if (!isArchivable(model) || model.updatedAt > cutoff) {
      continue;
    }
    if (rollbackTargets.has(model.id)) {
      kept.push(model.id);
      continue;
    }
    options.catalog.archive(model.id, `archived after ${options.olderThanDays} days`);
    archived.push(model.id);
  }

  metrics.incrementCounter('archival', 'runs');
  if (archived.length > 0) {
    metrics.incrementCounter('archival', 'archived', archived.length);
  }
  log.info({ archived: archived.length, kept: kept.length }, 'Model archival completed');
  return { skipped: false, archived, kept };
}

function isArchivable(model: ModelVersion) {
  if (model.state === 'superseded' || model.state === 'rolled_back') {
    return true;
  }
  return (
    model.state === 'trained' &&
    model.stateHistory.some(change => change.reason?.startsWith(VALIDATION_REJECTED_NOTE) ?? false)
  );
}
