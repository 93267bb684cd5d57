import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import type { SelfMetrics } from '../../metrics/index.js';
import type { Router } from '../http.js';

export class SelfMetricsRouter implements Router {
  constructor(
    private readonly metrics: SelfMetrics,
    private readonly path = '/metrics'
  ) {}

  async handle(req: IncomingMessage, res: ServerResponse): Promise<boolean> {
    if (!req.url) {
      return false;
    }

    const url = new URL(req.url, 'http://localhost');
    if (url.pathname !== this.path) {
      return false;
    }

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.writeHead(405, { Allow: 'GET, HEAD', 'Content-Type': 'text/plain; charset=utf-8' });
      res.end('method not allowed\n');
      return true;
    }

    const body = await this.metrics.metrics();
    res.writeHead(200, { 'Content-Type': this.metrics.contentType });
    res.end(req.method === 'HEAD' ? undefined : body);
    return true;
  }
}

export function createSelfMetricsRouter(metrics: SelfMetrics): SelfMetricsRouter {
  return new SelfMetricsRouter(metrics);
}
