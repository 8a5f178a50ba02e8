import { timingSafeEqual } from 'node:crypto';
import type { ServiceConfig } from '../config/env.js';
import type { DocumentPipeline } from '../features/pipeline/create-document.js';
import { healthStatus } from '../features/pipeline/health.js';
import { ProvisionError } from '../utils/errors.js';
import { createLogger } from '../lib/log.js';

const log = createLogger('http');

export interface HttpRequest {
  method: string;
  path: string;
  /** Lower-cased header names. */
  headers: Record<string, string | undefined>;
  rawBody?: string;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body?: unknown;
}

export interface RouterDeps {
  pipeline: DocumentPipeline;
  config: Pick<ServiceConfig, 'apiKey' | 'corsOrigins'>;
  now?: () => Date;
}

type Route = { method: 'GET' | 'POST'; handle: (req: HttpRequest) => Promise<HttpResponse> | HttpResponse };

export function corsHeaders(origin: string | undefined, allowed: readonly string[]): Record<string, string> {
  let allowOrigin: string;
  if (allowed.includes('*')) allowOrigin = '*';
  else if (origin && allowed.includes(origin)) allowOrigin = origin;
  else allowOrigin = allowed[0] ?? '*';
  return {
    'Access-Control-Allow-Origin': allowOrigin,
    'Vary': 'Origin',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-API-Key',
  };
}

function apiKeyMatches(provided: string | undefined, expected: string | undefined): boolean {
  if (!expected || !provided) return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function json(status: number, body: unknown): HttpResponse {
  return { status, headers: { 'Content-Type': 'application/json' }, body };
}

function parseJsonBody(raw: string | undefined): { ok: true; value: unknown } | { ok: false } {
  if (!raw || raw.trim() === '') return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

export function createRouter(deps: RouterDeps): (req: HttpRequest) => Promise<HttpResponse> {
  const now = deps.now ?? (() => new Date());
  if (!deps.config.apiKey) log.warn('BUBBLE_API_KEY is not set; every create-google-doc request will be refused');

  const routes: Record<string, Route> = {
    '/health': {
      method: 'GET',
      handle: () => json(200, healthStatus(deps.pipeline.credentials, deps.pipeline.errorStats(), now())),
    },
    '/create-google-doc': {
      method: 'POST',
      handle: async req => {
        if (!apiKeyMatches(req.headers['x-api-key'], deps.config.apiKey)) {
          return json(401, { success: false, error: 'Invalid API key' });
        }
        const body = parseJsonBody(req.rawBody);
        if (!body.ok) return json(400, { success: false, error: 'Request body must be valid JSON' });

        const outcome = await deps.pipeline.createDocument(body.value);
        if (outcome.ok) return json(200, { success: true, ...outcome.result });

        const { error } = outcome;
        return json(error.status, {
          success: false,
          error: error.message,
          ...(error instanceof ProvisionError && error.documentId ? { document_id: error.documentId } : {}),
        });
      },
    },
  };

  return async req => {
    const cors = corsHeaders(req.headers.origin, deps.config.corsOrigins);
    const withCors = (res: HttpResponse): HttpResponse => ({ ...res, headers: { ...cors, ...res.headers } });

    if (req.method === 'OPTIONS') return withCors({ status: 204, headers: {} });

    const route = Object.hasOwn(routes, req.path) ? routes[req.path] : undefined;
    if (!route) return withCors(json(404, { success: false, error: 'Not found' }));
    if (route.method !== req.method) {
      return withCors({ ...json(405, { success: false, error: 'Method not allowed' }), headers: { 'Content-Type': 'application/json', 'Allow': `${route.method}, OPTIONS` } });
    }
    return withCors(await route.handle(req));
  };
}
