import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import { collectHealthChecks, type SentinelRuntime } from '../../app.js';
import { isRecord } from '../../config/index.js';
import { SentinelError, toErrorPayload, type ErrorCode } from '../../errors.js';
import logger, { type Logger } from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { TrainingHyperparameters } from '../../types.js';

const MAX_BODY_BYTES = 1024 * 1024;

type RouteParams = string[];

type Route = {
  method: string;
  pattern: RegExp;
  handler: (req: IncomingMessage, res: ServerResponse, params: RouteParams, url: URL) => Promise<void>;
};

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  InvalidEvent: 400,
  InvalidArgument: 400,
  InvalidSnapshot: 400,
  NotFound: 404,
  BlobNotFound: 404,
  AlreadyRunning: 409,
  InvalidTransition: 409,
  Cancelled: 409,
  InsufficientData: 422,
  ValidationFailed: 422,
  TrainingDiverged: 422
};

export interface ApiRouterOptions {
  runtime: SentinelRuntime;
  log?: Logger;
  metrics?: MetricsRegistry;
  startedAt?: number;
}

export class ApiRouter {
  private readonly runtime: SentinelRuntime;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly startedAt: number;
  private readonly routes: Route[];

  constructor(options: ApiRouterOptions) {
    this.runtime = options.runtime;
    this.log = (options.log ?? logger).child({ component: 'http' });
    this.metrics = options.metrics ?? metricsModule;
    this.startedAt = options.startedAt ?? Date.now();
    this.routes = [
      { method: 'GET', pattern: /^\/api\/health$/, handler: (req, res) => this.handleHealth(res) },
      { method: 'GET', pattern: /^\/api\/cameras$/, handler: (req, res) => this.handleCameras(res) },
      {
        method: 'GET',
        pattern: /^\/api\/cameras\/([^/]+)\/models$/,
        handler: (req, res, params) => this.handleModels(res, params[0])
      },
      {
        method: 'POST',
        pattern: /^\/api\/cameras\/([^/]+)\/rollback$/,
        handler: (req, res, params) => this.handleRollback(res, params[0])
      },
      {
        method: 'GET',
        pattern: /^\/api\/cameras\/([^/]+)\/events$/,
        handler: (req, res, params, url) => this.handleEventList(res, params[0], url)
      },
      { method: 'POST', pattern: /^\/api\/events$/, handler: (req, res) => this.handleSubmitEvent(req, res) },
      { method: 'GET', pattern: /^\/api\/events\/([^/]+)$/, handler: (req, res, params) => this.handleEvent(res, params[0]) },
      {
        method: 'POST',
        pattern: /^\/api\/events\/([^/]+)\/reanalyze$/,
        handler: (req, res, params) => this.handleReanalyze(res, params[0])
      },
      { method: 'POST', pattern: /^\/api\/jobs$/, handler: (req, res) => this.handleSubmitJob(req, res) },
      { method: 'GET', pattern: /^\/api\/jobs\/([^/]+)$/, handler: (req, res, params) => this.handleJob(res, params[0]) },
      {
        method: 'DELETE',
        pattern: /^\/api\/jobs\/([^/]+)$/,
        handler: (req, res, params) => this.handleCancelJob(res, params[0])
      },
      {
        method: 'POST',
        pattern: /^\/api\/models\/([^/]+)\/deploy$/,
        handler: (req, res, params) => this.handleDeploy(req, res, params[0])
      },
      {
        method: 'POST',
        pattern: /^\/api\/verdicts\/([^/]+)\/feedback$/,
        handler: (req, res, params) => this.handleFeedback(req, res, params[0])
      },
      { method: 'GET', pattern: /^\/metrics$/, handler: (req, res) => this.handleMetrics(res) }
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse): boolean {
    if (!req.url) {
      return false;
    }
    const url = new URL(req.url, 'http://localhost');
    for (const route of this.routes) {
      if (route.method !== req.method) {
        continue;
      }
      const match = route.pattern.exec(url.pathname);
      if (!match) {
        continue;
      }
      const params = match.slice(1).map(value => decodeURIComponent(value));
      this.metrics.incrementCounter('http', 'requests');
      route.handler(req, res, params, url).catch(error => {
        this.sendError(res, error);
      });
      return true;
    }
    return false;
  }

  private async handleHealth(res: ServerResponse) {
    const checks = await collectHealthChecks({ service: { status: 'ok', startedAt: this.startedAt } });
    const degraded = checks.some(check => check.status !== 'ok');
    sendJson(res, 200, {
      status: degraded ? 'degraded' : 'ok',
      checks,
      cameras: this.runtime.cameraHealth()
    });
  }

  private async handleCameras(res: ServerResponse) {
    const health = new Map(this.runtime.cameraHealth().map(report => [report.cameraId, report]));
    const cameras = this.runtime.store.listCameras().map(camera => ({
      ...camera,
      health: health.get(camera.id)?.health ?? 'no_model'
    }));
    sendJson(res, 200, { cameras });
  }

  private async handleModels(res: ServerResponse, cameraId: string) {
    this.requireCamera(cameraId);
    sendJson(res, 200, { models: this.runtime.catalog.listModels(cameraId) });
  }

  private async handleEventList(res: ServerResponse, cameraId: string, url: URL) {
    this.requireCamera(cameraId);
    const limit = Number(url.searchParams.get('limit') ?? '');
    const events = this.runtime.store.listEvents({
      cameraId,
      limit: Number.isFinite(limit) && limit > 0 ? limit : undefined
    });
    sendJson(res, 200, { events });
  }

  private async handleRollback(res: ServerResponse, cameraId: string) {
    this.requireCamera(cameraId);
    const result = await this.runtime.distributor.rollback(cameraId);
    sendJson(res, 200, { deployment: result });
  }

  private handleSubmitEvent(req: IncomingMessage, res: ServerResponse) {
    return this.withBody(req, async body => {
      const result = await this.runtime.intake.submit(body);
      sendJson(res, result.duplicate ? 200 : 202, { ...result });
    });
  }

  private async handleEvent(res: ServerResponse, eventId: string) {
    const event = this.runtime.store.getEvent(eventId);
    if (!event) {
      throw new SentinelError('NotFound', `Event ${eventId} not found`);
    }
    sendJson(res, 200, { event, verdicts: this.runtime.store.listVerdictsForEvent(eventId) });
  }

  private async handleReanalyze(res: ServerResponse, eventId: string) {
    const verdict = await this.runtime.pipeline.reanalyze(eventId);
    sendJson(res, 200, { verdict });
  }

  private handleSubmitJob(req: IncomingMessage, res: ServerResponse) {
    return this.withBody(req, async body => {
      const cameraId = requireString(body, 'cameraId');
      const datasetId = requireString(body, 'datasetId');
      const hyperparameters = body.hyperparameters === undefined ? {} : parseHyperparameters(body.hyperparameters);
      const jobId = this.runtime.orchestrator.submitTrainingJob(cameraId, datasetId, hyperparameters);
      sendJson(res, 202, { jobId });
    });
  }

  private async handleJob(res: ServerResponse, jobId: string) {
    sendJson(res, 200, { job: this.runtime.orchestrator.getJobStatus(jobId) });
  }

  private async handleCancelJob(res: ServerResponse, jobId: string) {
    sendJson(res, 200, { job: this.runtime.orchestrator.cancelJob(jobId) });
  }

  private async handleDeploy(req: IncomingMessage, res: ServerResponse, modelId: string) {
    await this.withBody(req, async body => {
      const model = this.runtime.catalog.getModel(modelId);
      const cameraId = typeof body.cameraId === 'string' ? body.cameraId : model.cameraId;
      const result = await this.runtime.distributor.deploy(modelId, cameraId);
      sendJson(res, 200, { deployment: result });
    });
  }

  private async handleFeedback(req: IncomingMessage, res: ServerResponse, verdictId: string) {
    await this.withBody(req, async body => {
      const kind = body.kind;
      if (kind === 'false_positive') {
        sendJson(res, 201, { signal: this.runtime.feedback.markFalsePositive(verdictId) });
      } else if (kind === 'confirmed_threat') {
        sendJson(res, 201, { signal: this.runtime.feedback.confirmThreat(verdictId) });
      } else {
        throw new SentinelError('InvalidArgument', 'kind must be false_positive or confirmed_threat');
      }
    });
  }

  private async handleMetrics(res: ServerResponse) {
    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
    res.end(this.metrics.exportPrometheus());
  }

  private async withBody(req: IncomingMessage, handler: (body: Record<string, unknown>) => Promise<void>) {
    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      throw new SentinelError('InvalidArgument', 'Request body must be valid JSON', { cause: error });
    }
    if (!isRecord(body)) {
      throw new SentinelError('InvalidArgument', 'Request body must be a JSON object');
    }
    await handler(body);
  }

  private requireCamera(cameraId: string) {
    if (!this.runtime.store.getCamera(cameraId)) {
      throw new SentinelError('NotFound', `Camera ${cameraId} not found`);
    }
  }

  private sendError(res: ServerResponse, error: unknown) {
    const payload = toErrorPayload(error);
    const status = payload.error === 'Internal' ? 500 : STATUS_BY_CODE[payload.error] ?? 500;
    if (status >= 500) {
      this.metrics.recordError('http', payload.reason);
      this.log.error({ err: error }, 'HTTP request failed');
    } else {
      this.log.warn({ error: payload.error, reason: payload.reason }, 'HTTP request rejected');
    }
    sendJson(res, status, payload);
  }
}

export function createApiRouter(options: ApiRouterOptions) {
  return new ApiRouter(options);
}

function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error('Request body too large'));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(error);
      }
    });

    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || !value.trim()) {
    throw new SentinelError('InvalidArgument', `${field} is required`);
  }
  return value.trim();
}

function parseHyperparameters(value: unknown): Partial<TrainingHyperparameters> {
  if (!isRecord(value)) {
    throw new SentinelError('InvalidArgument', 'hyperparameters must be an object');
  }
  const result: Partial<TrainingHyperparameters> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw !== 'number') {
      throw new SentinelError('InvalidArgument', `hyperparameters.${key} must be a number`);
    }
    switch (key) {
      case 'channels':
        if (raw !== 1 && raw !== 3) {
          throw new SentinelError('InvalidArgument', 'hyperparameters.channels must be 1 or 3');
        }
        result.channels = raw;
        break;
      case 'inputWidth':
      case 'inputHeight':
      case 'latentDim':
      case 'learningRate':
      case 'batchSize':
      case 'maxEpochs':
      case 'patience':
      case 'holdoutFraction':
      case 'thresholdPercentile':
      case 'seed':
        result[key] = raw;
        break;
      default:
        throw new SentinelError('InvalidArgument', `Unknown hyperparameter ${key}`);
    }
  }
  return result;
}
