import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadSentinelConfig, watchRuntimeConfig } from '../src/app.js';
import {
  ConfigManager,
  parseConfig,
  resolveRuntimeConfig,
  validateConfig,
  type ConfigReloadEvent,
  type SentinelConfig
} from '../src/config/index.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import { createCaptureLogger, createTestConfig, createTestSentinel } from './helpers/fixtures.js';

function withChanges(mutate: (config: SentinelConfig) => void): SentinelConfig {
  const config = createTestConfig();
  mutate(config);
  return config;
}

describe('ConfigValidation', () => {
  it('accepts the test configuration', () => {
    expect(() => validateConfig(createTestConfig())).not.toThrow();
  });

  it('reports missing sections and unknown keys', () => {
    const { app: _app, ...withoutApp } = createTestConfig();
    expect(() => validateConfig(withoutApp)).toThrow('config.app is required');

    const unknownKey = { ...createTestConfig(), training: { ...createTestConfig().training, foo: 1 } };
    expect(() => validateConfig(unknownKey)).toThrow('config.training.foo is not allowed');
  });

  it('joins every schema violation', () => {
    const config = withChanges(draft => {
      draft.distribution.maxAttempts = 0;
      draft.baseline.gridSize = 2.5;
    });
    expect(() => validateConfig(config)).toThrow(
      'config.distribution.maxAttempts must be >= 1; config.baseline.gridSize must be an integer'
    );
  });

  it('rejects inconsistent settings', () => {
    const config = withChanges(draft => {
      draft.analysis.batchWindowMs = 2000;
      draft.distribution.baseDelayMs = 10;
    });
    expect(() => validateConfig(config)).toThrow(
      'config.analysis.batchWindowMs must be below config.analysis.timeoutMs; ' +
        'config.distribution.baseDelayMs must not exceed config.distribution.maxDelayMs'
    );
  });

  it('requires a latent size below the input size', () => {
    const config = withChanges(draft => {
      draft.training.defaults = { ...draft.training.defaults, latentDim: 64 };
    });
    expect(() => validateConfig(config)).toThrow(
      'config.training.defaults.latentDim must be smaller than the input size'
    );
  });

  it('requires a usable secret when blob encryption is on', () => {
    const config = withChanges(draft => {
      draft.storage.encryption = { enabled: true, secret: 'short' };
    });
    expect(() => validateConfig(config)).toThrow('config.storage.encryption.secret must be at least 8 characters');
  });

  it('wraps JSON syntax errors', () => {
    expect(() => parseConfig('{ "app": ')).toThrow(/^Failed to parse configuration: /);
  });

  it('fills runtime defaults for optional sections', () => {
    const { scoring: _scoring, retention: _retention, server: _server, ...required } = createTestConfig();
    const runtime = resolveRuntimeConfig(required);
    expect(runtime.scoring).toEqual({ criticalAt: 0.75, warningAt: 0.5, feedbackWeight: 0.15 });
    expect(runtime.retention).toEqual({ enabled: true, archiveAfterDays: 30, intervalMinutes: 60 });
    expect(runtime.server).toEqual({ host: '127.0.0.1', port: 8080 });
  });

  it('merges the environment overrides from the config directory', () => {
    const runtime = loadSentinelConfig();
    expect(runtime.database.path).toBe(':memory:');
    expect(runtime.logging.level).toBe('silent');
    expect(runtime.retention.enabled).toBe(false);
    expect(runtime.retention.archiveAfterDays).toBe(30);
    expect(runtime.training.minNormalSnapshots).toBe(50);
  });
});

describe('ConfigManager', () => {
  let dir: string;
  let file: string;
  const initialLevel = getLogLevel();

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-config-'));
    file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify(createTestConfig()), 'utf-8');
  });

  afterEach(() => {
    setLogLevel(initialLevel);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('emits the previous and next configuration on reload', () => {
    const manager = new ConfigManager(file);
    const reloads: Array<[number, number]> = [];
    manager.on('reload', ({ previous, next }: ConfigReloadEvent) => {
      reloads.push([previous.intake.highWaterMark, next.intake.highWaterMark]);
    });

    fs.writeFileSync(
      file,
      JSON.stringify(withChanges(draft => {
        draft.intake.highWaterMark = 75;
      })),
      'utf-8'
    );
    manager.reload();

    expect(reloads).toEqual([[50, 75]]);
    expect(manager.getConfig().intake.highWaterMark).toBe(75);
  });

  it('keeps the last good configuration when the file is invalid', () => {
    const manager = new ConfigManager(file);
    fs.writeFileSync(file, '{"app": {}}', 'utf-8');

    expect(() => manager.reload()).toThrow('config.app.name is required');
    expect(manager.getConfig().intake.highWaterMark).toBe(50);
  });

  it('applies log level and archival schedule changes to a running runtime', async () => {
    const { log, records } = createCaptureLogger();
    const runtime = await createTestSentinel({ log });
    const manager = new ConfigManager(file);
    const stop = watchRuntimeConfig(runtime, manager);

    try {
      fs.writeFileSync(
        file,
        JSON.stringify(withChanges(draft => {
          draft.logging.level = 'warn';
          draft.retention = { enabled: true, archiveAfterDays: 7, intervalMinutes: 60 };
        })),
        'utf-8'
      );
      manager.reload();

      expect(getLogLevel()).toBe('warn');
      const reloaded = records.find(record => record.msg === 'configuration reloaded');
      expect(reloaded).toMatchObject({ component: 'config', archiveAfterDays: 7 });
      await vi.waitFor(() => {
        expect(records.some(record => record.msg === 'Model archival completed')).toBe(true);
      });
    } finally {
      stop();
      await runtime.stop();
    }
  });
});
