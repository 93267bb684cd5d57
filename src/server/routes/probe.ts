import type { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import type { MatchMode } from '../../config/index.js';
import logger from '../../logger.js';
import {
  EXPOSITION_CONTENT_TYPE,
  serializeSnapshot,
  type FilteringGatherer
} from '../../metrics/gatherer.js';
import { parseSelector, SelectorParseError, type Selector } from '../../metrics/selector.js';
import type { Router } from '../http.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

interface ProbeRouterOptions {
  gatherer: FilteringGatherer;
  timeoutMs?: number;
  path?: string;
}

class ProbeTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`scrape deadline of ${timeoutMs}ms exceeded`);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * Serves the exported metrics. `match` narrows the response to the series
 * a PromQL selector accepts; how several `match` values combine follows the
 * gatherer's match mode.
 */
export class ProbeRouter implements Router {
  private readonly gatherer: FilteringGatherer;
  private readonly timeoutMs: number;
  private readonly path: string;

  constructor(options: ProbeRouterOptions) {
    this.gatherer = options.gatherer;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.path = options.path ?? '/probe';
  }

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

    let selectors: Selector[];
    try {
      selectors = parseMatchParameters(url.searchParams.getAll('match'), this.gatherer.matchMode);
    } catch (error) {
      if (error instanceof SelectorParseError) {
        sendText(res, 400, `invalid match selector: ${error.message}\n`);
        return true;
      }
      throw error;
    }

    let body: string;
    try {
      body = await withDeadline(this.timeoutMs, async () => {
        const families = await this.gatherer.gather(selectors);
        return serializeSnapshot(families);
      });
    } catch (error) {
      if (error instanceof ProbeTimeoutError) {
        logger.warn({ timeoutMs: this.timeoutMs }, 'Probe request exceeded its deadline');
        sendText(res, 503, 'scrape deadline exceeded\n');
        return true;
      }
      throw error;
    }

    res.writeHead(200, { 'Content-Type': EXPOSITION_CONTENT_TYPE });
    res.end(req.method === 'HEAD' ? undefined : body);
    return true;
  }
}

export function parseMatchParameters(values: string[], matchMode: MatchMode): Selector[] {
  const honoured = matchMode === 'first' ? values.slice(0, 1) : values;
  return honoured.map(value => parseSelector(value));
}

async function withDeadline<T>(timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProbeTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([task(), deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

function sendText(res: ServerResponse, status: number, body: string) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  }
  res.end(body);
}

export function createProbeRouter(options: ProbeRouterOptions): ProbeRouter {
  return new ProbeRouter(options);
}
