import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import logger from '../logger.js';

export interface Router {
  handle(req: IncomingMessage, res: ServerResponse): boolean | Promise<boolean>;
}

export interface HttpServerOptions {
  name: string;
  port?: number;
  host?: string;
  routers: Router[];
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: (graceMs?: number) => Promise<void>;
}

export class ShutdownTimeoutError extends Error {
  readonly server: string;
  readonly graceMs: number;

  constructor(server: string, graceMs: number) {
    super(`${server} server did not shut down within ${graceMs}ms`);
    this.name = 'ShutdownTimeoutError';
    this.server = server;
    this.graceMs = graceMs;
  }
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 0;
  const host = options.host ?? '0.0.0.0';

  const server = http.createServer((req, res) => {
    dispatch(options.routers, req, res).catch(error => {
      logger.error({ err: error, server: options.name }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  server.on('error', error => {
    logger.error({ err: error, server: options.name }, 'HTTP server error');
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host, server: options.name }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: graceMs => closeServer(server, options.name, graceMs)
  };
}

async function dispatch(routers: Router[], req: IncomingMessage, res: ServerResponse) {
  for (const router of routers) {
    if (await router.handle(req, res)) {
      return;
    }
  }

  res.statusCode = 404;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify({ error: 'Not found' }));
}

function closeServer(server: http.Server, name: string, graceMs?: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let timer: NodeJS.Timeout | null = null;
    if (typeof graceMs === 'number') {
      timer = setTimeout(() => {
        server.closeAllConnections();
        reject(new ShutdownTimeoutError(name, graceMs));
      }, graceMs);
      timer.unref();
    }

    server.close(error => {
      if (timer) {
        clearTimeout(timer);
      }
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
    server.closeIdleConnections();
  });
}
