import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { registerRuntimeIndicators, resetAppLifecycle, type SentinelRuntime } from '../src/app.js';
import { startHttpServer, type HttpServerRuntime } from '../src/server/http.js';
import {
  BASE_TIME,
  createCaptureLogger,
  createTestSentinel,
  eventSubmission,
  flatFrame,
  storeEventFrames
} from './helpers/fixtures.js';

const NOW = BASE_TIME + 60_000;

describe('HTTP API', () => {
  let runtime: SentinelRuntime;
  let server: HttpServerRuntime;
  let baseUrl: string;

  beforeEach(async () => {
    runtime = await createTestSentinel({ log: createCaptureLogger().log, now: () => NOW });
    runtime.datasets.registerCamera({ id: 'cam-1' });
    registerRuntimeIndicators(runtime);
    server = await startHttpServer({ runtime, host: '127.0.0.1', port: 0 });
    baseUrl = `http://127.0.0.1:${server.port}`;
  });

  afterEach(async () => {
    await server.close();
    await runtime.stop();
    resetAppLifecycle();
  });

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body)
    });

  it('reports component and camera health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'degraded',
      checks: [
        { name: 'database', status: 'ok' },
        { name: 'cameras', status: 'degraded' },
        { name: 'pipeline', status: 'ok' },
        { name: 'detector', status: 'ok' }
      ],
      cameras: [{ cameraId: 'cam-1', health: 'no_model', deployedModelId: null, edgeModelId: null }]
    });
  });

  it('lists cameras with their health', async () => {
    const response = await fetch(`${baseUrl}/api/cameras`);
    expect(await response.json()).toMatchObject({ cameras: [{ id: 'cam-1', health: 'no_model' }] });
  });

  it('accepts events and serves their verdicts', async () => {
    const frameKeys = await storeEventFrames(runtime.blobs, 'cam-1', 'e1', [flatFrame(1, 8)]);
    const submission = eventSubmission({ id: 'e1', cameraId: 'cam-1', frameKeys });

    const accepted = await post('/api/events', submission);
    expect(accepted.status).toBe(202);
    expect(await accepted.json()).toEqual({ accepted: true, duplicate: false, shed: false, eventId: 'e1' });

    const repeated = await post('/api/events', submission);
    expect(repeated.status).toBe(200);
    expect(await repeated.json()).toEqual({ accepted: false, duplicate: true, shed: false, eventId: 'e1' });

    await runtime.whenIdle();
    const verdictId = runtime.store.getEvent('e1')?.verdictId ?? '';
    const detail = await fetch(`${baseUrl}/api/events/e1`);
    expect(await detail.json()).toMatchObject({
      event: { id: 'e1', status: 'analyzed', verdictId },
      verdicts: [{ id: verdictId, version: 1, anomalyType: 'none' }]
    });

    const listed = await fetch(`${baseUrl}/api/cameras/cam-1/events?limit=5`);
    expect(await listed.json()).toMatchObject({ events: [{ id: 'e1' }] });

    const feedback = await post(`/api/verdicts/${verdictId}/feedback`, { kind: 'false_positive' });
    expect(feedback.status).toBe(201);
    expect(await feedback.json()).toMatchObject({ signal: { verdictId, eventId: 'e1', kind: 'false_positive', createdAt: NOW } });

    const revised = await post('/api/events/e1/reanalyze', {});
    expect(revised.status).toBe(200);
    expect(await revised.json()).toMatchObject({ verdict: { eventId: 'e1', version: 2 } });
  });

  it('maps domain errors to status codes', async () => {
    const invalid = await post('/api/events', '{not json');
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ error: 'InvalidArgument', reason: 'Request body must be valid JSON' });

    const missingCamera = await fetch(`${baseUrl}/api/cameras/nope/models`);
    expect(missingCamera.status).toBe(404);
    expect(await missingCamera.json()).toEqual({ error: 'NotFound', reason: 'Camera nope not found' });

    const job = await post('/api/jobs', {});
    expect(job.status).toBe(400);
    expect(await job.json()).toEqual({ error: 'InvalidArgument', reason: 'cameraId is required' });

    const feedback = await post('/api/verdicts/v1/feedback', { kind: 'maybe' });
    expect(feedback.status).toBe(400);
    expect(await feedback.json()).toEqual({
      error: 'InvalidArgument',
      reason: 'kind must be false_positive or confirmed_threat'
    });

    const unknown = await fetch(`${baseUrl}/api/nope`);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'NotFound', reason: 'No route for GET /api/nope' });
  });

  it('exports metrics in Prometheus text format', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    const lines = (await response.text()).split('\n');

    expect(response.headers.get('content-type')).toBe('text/plain; version=0.0.4');
    expect(lines).toContain('sentinel_component_counter_total{component="http",counter="requests"} 1');
  });
});
