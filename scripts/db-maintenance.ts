#!/usr/bin/env tsx
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createSentinel, type SentinelRuntime } from '../src/app.js';
import type { VacuumOptions, VacuumResult } from '../src/db.js';
import logger, { type Logger } from '../src/logger.js';
import { runArchivalOnce, type ArchivalRunResult } from '../src/tasks/archival.js';

export interface MaintenanceOptions {
  runtime?: SentinelRuntime;
  vacuum?: VacuumOptions;
  logger?: Logger;
}

export interface MaintenanceRunResult {
  archival: ArchivalRunResult;
  vacuum: VacuumResult;
}

export async function runMaintenance(options: MaintenanceOptions = {}): Promise<MaintenanceRunResult> {
  const log = options.logger ?? logger;
  const runtime = options.runtime ?? (await createSentinel());
  log.info('Sentinel maintenance starting');

  try {
    const archival = await runArchivalOnce({
      catalog: runtime.catalog,
      enabled: runtime.config.retention.enabled,
      olderThanDays: runtime.config.retention.archiveAfterDays,
      logger: log,
      metrics: runtime.metrics
    });
    const vacuum = runtime.store.vacuum(options.vacuum);
    log.info({ archived: archival.archived.length, kept: archival.kept.length, vacuum }, 'Database maintenance completed');
    return { archival, vacuum };
  } finally {
    if (!options.runtime) {
      await runtime.stop();
    }
  }
}

function parseArgs(argv: string[]): VacuumOptions {
  const options: VacuumOptions = {};
  for (const arg of argv) {
    if (arg === '--full') {
      options.mode = 'full';
    } else if (arg === '--analyze') {
      options.analyze = true;
    } else if (arg === '--reindex') {
      options.reindex = true;
    } else if (arg === '--optimize') {
      options.optimize = true;
    }
  }
  return options;
}

if (path.resolve(process.argv[1] ?? '') === fileURLToPath(import.meta.url)) {
  runMaintenance({ vacuum: parseArgs(process.argv.slice(2)) }).catch(error => {
    logger.error({ err: error }, 'Sentinel maintenance failed');
    process.exitCode = 1;
  });
}
