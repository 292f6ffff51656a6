import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Writable } from 'node:stream';
import type { SentinelRuntime } from '../src/app.js';
import { resolveHealthExitCode, runCli } from '../src/cli.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import { createCaptureLogger, createTestSentinel, insertTrainedModel } from './helpers/fixtures.js';

type TestIo = {
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream };
  stdout: () => string;
  stderr: () => string;
};

function createTestIo(): TestIo {
  let stdout = '';
  let stderr = '';

  const makeWritable = (setter: (value: string) => void) =>
    new Writable({
      write(chunk, _enc, callback) {
        setter(typeof chunk === 'string' ? chunk : chunk.toString());
        callback();
      }
    });

  return {
    io: {
      stdout: makeWritable(value => {
        stdout += value;
      }),
      stderr: makeWritable(value => {
        stderr += value;
      })
    },
    stdout: () => stdout,
    stderr: () => stderr
  };
}

describe('runCli', () => {
  let runtime: SentinelRuntime;
  let output: TestIo;

  beforeEach(async () => {
    runtime = await createTestSentinel({ log: createCaptureLogger().log });
    runtime.datasets.registerCamera({ id: 'cam-1' });
    output = createTestIo();
  });

  afterEach(async () => {
    await runtime.stop();
  });

  const run = (...argv: string[]) => runCli(argv, output.io, { runtime });

  it('prints usage and rejects unknown commands', async () => {
    expect(await run('help')).toBe(0);
    expect(output.stdout().split('\n')[0]).toBe('Sentinel CLI');

    expect(await run('bogus')).toBe(1);
    expect(output.stderr()).toBe('Unknown command: bogus\n');
  });

  it('prints health checks and exits non-zero when degraded', async () => {
    expect(await run('health')).toBe(1);
    expect(output.stdout()).toBe(
      'Status: degraded\n  database: ok\n  cameras: degraded\n  pipeline: ok\n  detector: ok\n'
    );
  });

  it('lists cameras and deploys models', async () => {
    const model = await insertTrainedModel(runtime.store, runtime.blobs, 'cam-1');

    expect(await run('cameras')).toBe(0);
    expect(await run('models', 'cam-1')).toBe(0);
    expect(await run('deploy', model.id)).toBe(0);
    expect(await run('cameras')).toBe(0);

    expect(output.stdout().split('\n')).toEqual([
      'cam-1\tno_model\tdeployed=-\tedge=-',
      `v1\tvalidated\t${model.id}\tthreshold=0.500000`,
      `Deployed ${model.id} to cam-1`,
      `cam-1\tok\tdeployed=${model.id}\tedge=${model.id}`,
      ''
    ]);
  });

  it('reports empty listings', async () => {
    expect(await run('events', 'cam-1')).toBe(0);
    expect(await run('jobs', 'cam-1')).toBe(0);
    expect(await run('archive', '--json')).toBe(0);

    expect(output.stdout()).toBe(
      'No events for cam-1\nNo training jobs for cam-1\n{"skipped":false,"archived":[],"kept":[]}\n'
    );
  });

  it('reports argument and domain errors on stderr', async () => {
    expect(await run('models')).toBe(1);
    expect(await run('events', 'cam-1', '--limit', 'x')).toBe(1);
    expect(await run('feedback', 'maybe', 'v1')).toBe(1);
    expect(await run('feedback', 'confirm', 'v1')).toBe(1);
    expect(await run('rollback', 'cam-1')).toBe(1);

    expect(output.stderr().split('\n')).toEqual([
      'InvalidArgument: Missing camera argument',
      'Missing or invalid value for --limit',
      'InvalidArgument: Unknown feedback kind "maybe" (expected false-positive or confirm)',
      'NotFound: Verdict v1 not found',
      'NotFound: Camera cam-1 has no deployed model',
      ''
    ]);
  });
});

describe('log-level command', () => {
  let previous: string;

  beforeEach(() => {
    previous = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(previous);
  });

  it('changes the active level', async () => {
    const output = createTestIo();

    expect(await runCli(['log-level', 'set', 'debug'], output.io)).toBe(0);
    expect(await runCli(['log-level', 'get'], output.io)).toBe(0);
    expect(output.stdout()).toBe('Log level set to debug\ndebug\n');
  });

  it('rejects unknown levels', async () => {
    const output = createTestIo();

    expect(await runCli(['log-level', 'loud'], output.io)).toBe(1);
    expect(output.stderr().startsWith('Unknown log level "loud" (available: ')).toBe(true);
  });
});

describe('resolveHealthExitCode', () => {
  it('maps statuses to exit codes', () => {
    expect(resolveHealthExitCode('ok')).toBe(0);
    expect(resolveHealthExitCode('degraded')).toBe(1);
    expect(resolveHealthExitCode('starting')).toBe(2);
    expect(resolveHealthExitCode('stopping')).toBe(3);
  });
});
