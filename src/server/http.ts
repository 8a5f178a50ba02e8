import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createLogger } from '../lib/log.js';
import { errorMessage } from '../utils/errors.js';
import type { HttpRequest, HttpResponse } from './router.js';

const log = createLogger('http');

export const MAX_BODY_BYTES = 1024 * 1024;

class PayloadTooLargeError extends Error {
  constructor() { super('Request body too large'); this.name = 'PayloadTooLargeError'; }
}

// Past the limit the rest of the upload is drained and discarded, so the client
// finishes sending and can read the 413.
function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer | string) => {
      size += Buffer.byteLength(chunk);
      if (size > limit) chunks.length = 0;
      else chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    });
    req.on('end', () => {
      if (size > limit) reject(new PayloadTooLargeError());
      else resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

function normalizeHeaders(req: IncomingMessage): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }
  return headers;
}

function send(res: ServerResponse, response: HttpResponse): void {
  const payload = response.body === undefined ? '' : JSON.stringify(response.body);
  res.writeHead(response.status, response.headers);
  res.end(payload);
}

/** Adapts the framework-free router onto node:http. */
export function createHttpServer(route: (req: HttpRequest) => Promise<HttpResponse>): Server {
  return createServer((req, res) => {
    const started = Date.now();
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const method = req.method ?? 'GET';

    readBody(req, MAX_BODY_BYTES)
      .then(rawBody => route({ method, path, headers: normalizeHeaders(req), rawBody }))
      .then(response => {
        send(res, response);
        log.debug('request', { method, path, status: response.status, ms: Date.now() - started });
      })
      .catch((e: unknown) => {
        if (e instanceof PayloadTooLargeError) {
          send(res, { status: 413, headers: { 'Content-Type': 'application/json' }, body: { success: false, error: e.message } });
          return;
        }
        log.error(`Unhandled error on ${method} ${path}: ${errorMessage(e)}`);
        if (!res.headersSent) {
          send(res, { status: 500, headers: { 'Content-Type': 'application/json' }, body: { success: false, error: 'Internal server error' } });
        } else {
          res.end();
        }
      });
  });
}
