/**
 * HTTP Server
 *
 * Adapts node's http server to the Request → Response route handlers and
 * exposes the health endpoints.
 */

import http from 'http';
import { logger } from './logger';

export interface HealthStatus {
  healthy: boolean;
  [key: string]: unknown;
}

export interface ServerRoutes {
  webhook: {
    POST: (request: Request) => Promise<Response>;
    GET: () => Promise<Response>;
  };
  popups: {
    stats: (request: Request) => Promise<Response>;
    health: () => Promise<Response>;
  };
  calls: {
    originate: (request: Request) => Promise<Response>;
    hangup: (callId: string) => Promise<Response>;
    status: (callId: string) => Promise<Response>;
    extensions: () => Promise<Response>;
  };
  health: () => Promise<HealthStatus>;
  ready: () => Promise<boolean>;
}

const CALL_ACTION_PATH = /^\/api\/calls\/([^/]+)\/(hangup|status)$/;

function notFound(): Response {
  return Response.json({ error: 'Not found' }, { status: 404 });
}

function methodNotAllowed(): Response {
  return Response.json({ error: 'Method not allowed' }, { status: 405 });
}

/** Dispatch one request to its route. */
export function createRequestHandler(routes: ServerRoutes): (request: Request) => Promise<Response> {
  return async (request) => {
    const { pathname } = new URL(request.url);
    const method = request.method.toUpperCase();

    if (pathname === '/health' || pathname === '/') {
      try {
        const status = await routes.health();
        return Response.json(
          { status: status.healthy ? 'healthy' : 'unhealthy', timestamp: new Date().toISOString(), uptime: process.uptime(), ...status },
          { status: status.healthy ? 200 : 503 }
        );
      } catch (err) {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Health check error');
        return Response.json({ status: 'error', error: String(err) }, { status: 503 });
      }
    }

    if (pathname === '/live') {
      return new Response('alive');
    }

    if (pathname === '/ready') {
      const ready = await routes.ready();
      return new Response(ready ? 'ready' : 'not ready', { status: ready ? 200 : 503 });
    }

    if (pathname === '/api/vitalpbx/webhook') {
      if (method === 'POST') return routes.webhook.POST(request);
      if (method === 'GET') return routes.webhook.GET();
      return methodNotAllowed();
    }

    if (pathname === '/api/popups/stats') {
      return method === 'GET' ? routes.popups.stats(request) : methodNotAllowed();
    }

    if (pathname === '/api/popups/health') {
      return method === 'GET' ? routes.popups.health() : methodNotAllowed();
    }

    if (pathname === '/api/calls/originate') {
      return method === 'POST' ? routes.calls.originate(request) : methodNotAllowed();
    }

    if (pathname === '/api/pbx/extensions') {
      return method === 'GET' ? routes.calls.extensions() : methodNotAllowed();
    }

    const action = CALL_ACTION_PATH.exec(pathname);
    if (action) {
      const callId = decodeURIComponent(action[1] ?? '');
      if (action[2] === 'hangup') {
        return method === 'POST' ? routes.calls.hangup(callId) : methodNotAllowed();
      }
      return method === 'GET' ? routes.calls.status(callId) : methodNotAllowed();
    }

    return notFound();
  };
}

async function toRequest(req: http.IncomingMessage): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach((v) => headers.append(name, v));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const method = req.method ?? 'GET';
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  const hasBody = method !== 'GET' && method !== 'HEAD' && chunks.length > 0;

  return new Request(url, { method, headers, body: hasBody ? Buffer.concat(chunks).toString('utf8') : undefined });
}

async function writeResponse(res: http.ServerResponse, response: Response): Promise<void> {
  const body = Buffer.from(await response.arrayBuffer());
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  res.end(body);
}

/**
 * Start the HTTP server
 */
export function startServer(routes: ServerRoutes, port: number): Promise<http.Server> {
  const handle = createRequestHandler(routes);

  const server = http.createServer((req, res) => {
    toRequest(req)
      .then(handle)
      .then((response) => writeResponse(res, response))
      .catch((err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err), url: req.url }, 'Request failed');
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'application/json' });
        }
        res.end(JSON.stringify({ error: 'Internal server error' }));
      });
  });

  return new Promise((resolve) => {
    server.listen(port, () => {
      logger.info(`HTTP server listening on port ${port}`);
      resolve(server);
    });
  });
}
