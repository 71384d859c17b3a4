import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { register, type Registry } from 'prom-client';
import { createLogger } from '@vibingway/logger';
import { errorMessage } from '../../errors.js';

const log = createLogger('metrics-server');

/**
 * Serves the prom-client registry in Prometheus text format on /metrics.
 */
export class MetricsServer {
  private server: Server | null = null;

  constructor(private readonly registry: Registry = register) {}

  /** Resolves with the bound port once listening. */
  start(port: number, host?: string): Promise<number> {
    const server = createServer((req, res) => {
      void this.handle(req, res);
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        const bound = address !== null && typeof address === 'object' ? address.port : port;
        log.info({ port: bound }, 'Metrics server listening');
        resolve(bound);
      });
    });
  }

  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== 'GET' || req.url !== '/metrics') {
      res.writeHead(404, { 'content-type': 'text/plain' });
      res.end('Not found');
      return;
    }

    try {
      const body = await this.registry.metrics();
      res.writeHead(200, { 'content-type': this.registry.contentType });
      res.end(body);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Failed to collect metrics');
      res.writeHead(500, { 'content-type': 'text/plain' });
      res.end('Failed to collect metrics');
    }
  }
}
