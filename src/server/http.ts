import http from 'node:http';
import type { SentinelRuntime } from '../app.js';
import type { Logger } from '../logger.js';
import { createApiRouter } from './routes/api.js';

export interface HttpServerOptions {
  runtime: SentinelRuntime;
  port?: number;
  host?: string;
  log?: Logger;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 3000;
  const host = options.host ?? '0.0.0.0';
  const log = (options.log ?? options.runtime.log).child({ component: 'http' });
  const router = createApiRouter({
    runtime: options.runtime,
    log: options.log ?? options.runtime.log,
    metrics: options.runtime.metrics
  });

  const server = http.createServer((req, res) => {
    try {
      if (router.handle(req, res)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'NotFound', reason: `No route for ${req.method ?? 'GET'} ${req.url ?? '/'}` }));
    } catch (error) {
      log.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal', reason: 'Internal server error' }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.listen(port, host, () => resolve());
    server.on('error', reject);
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  log.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

export default startHttpServer;
