import http from 'http';
import { SERVICE } from './config.js';
import { QueueFullError, errorMessage } from './errors.js';
import type { RelayPipeline } from './pipeline.js';
import type { DurableQueue } from './queue.js';

export interface HttpServerConfig {
  pipeline: RelayPipeline;
  queue: DurableQueue;
  host?: string;
  port: number;
}

const REQUEUE_PATH = /^\/deadletters\/(\d+)\/requeue$/;

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

function parseLimit(value: string | null, fallback: number): number {
  const n = Number(value);
  return value !== null && Number.isInteger(n) && n > 0 ? Math.min(n, 1000) : fallback;
}

/** Small status and dead-letter API for operators. */
export function startHttpServer({ pipeline, queue, host = '0.0.0.0', port }: HttpServerConfig): http.Server {
  const server = http.createServer((req, res) => {
    try {
      if (!req.url) {
        res.statusCode = 400;
        res.end('bad request');
        return;
      }
      const url = new URL(req.url, 'http://localhost');
      const path = url.pathname;

      const requeue = REQUEUE_PATH.exec(path);
      if (requeue) {
        if (req.method !== 'POST') {
          res.statusCode = 405;
          res.setHeader('Allow', 'POST');
          res.end('method not allowed');
          return;
        }
        try {
          const sequence = queue.requeueDeadLetter(Number(requeue[1]));
          if (sequence === null) sendJson(res, 404, { error: 'no such dead letter' });
          else sendJson(res, 200, { sequence });
        } catch (e) {
          if (!(e instanceof QueueFullError)) throw e;
          sendJson(res, 503, { error: e.message });
        }
        return;
      }

      const known = path === '/health' || path === '/stats' || path === '/deadletters' || path === '/attempts';
      if (!known) {
        res.statusCode = 404;
        res.end('not found');
        return;
      }
      // Everything else is read-only
      if (req.method !== 'GET') {
        res.statusCode = 405;
        res.setHeader('Allow', 'GET');
        res.end('method not allowed');
        return;
      }

      if (path === '/health') {
        sendJson(res, 200, { status: 'ok', state: pipeline.state, broker: pipeline.connected ? 'connected' : 'disconnected' });
      } else if (path === '/stats') {
        sendJson(res, 200, { queue: queue.stats(), pipeline: pipeline.snapshot() });
      } else if (path === '/deadletters') {
        sendJson(res, 200, queue.deadLetters(parseLimit(url.searchParams.get('limit'), 50)));
      } else {
        sendJson(res, 200, queue.attempts(parseLimit(url.searchParams.get('limit'), 50)));
      }
    } catch (e) {
      res.statusCode = 500;
      res.end(`server error: ${errorMessage(e)}`);
    }
  });

  server.listen(port, host, () => {
    console.log(`[${SERVICE}] http listening on http://${host}:${port}`);
  });

  server.on('error', (err) => {
    console.error(`[${SERVICE}] http error`, err);
  });

  return server;
}
