import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import { MAX_BODY_BYTES, createHttpServer } from '../http.js';
import { buildServer } from '../main.js';
import { createRouter } from '../router.js';
import { loadConfig } from '../../config/env.js';
import { DocumentPipeline } from '../../features/pipeline/create-document.js';
import { ErrorReporter } from '../../utils/error-reporter.js';
import { FakeWorkspaceClient, TEST_CREDENTIAL, TEST_KEY } from '../../../tests/helpers/fake-workspace-client.js';

async function listen(server: Server): Promise<string> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  return `http://127.0.0.1:${address.port}`;
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

const planBody = JSON.stringify({ content_plan: { topic: 'AI trends' }, user_email: 'user@example.com' });

describe('createHttpServer', () => {
  let server: Server;
  let base: string;
  let client: FakeWorkspaceClient;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    client = new FakeWorkspaceClient();
    const pipeline = new DocumentPipeline({
      credentials: { status: 'configured', credential: TEST_CREDENTIAL },
      clientFactory: () => client,
      reporter: new ErrorReporter({ enableConsoleLogging: false }),
    });
    server = createHttpServer(createRouter({ pipeline, config: { apiKey: 'test-secret', corsOrigins: ['*'] } }));
    base = await listen(server);
  });

  afterEach(() => close(server));

  it('answers 413 to a body over the limit', async () => {
    const res = await fetch(`${base}/create-google-doc`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-API-Key': 'test-secret' },
      body: 'x'.repeat(MAX_BODY_BYTES + 1),
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ success: false, error: 'Request body too large' });
    expect(client.callCount).toBe(0);
  });

  it('accepts the API key header in any case', async () => {
    const res = await fetch(`${base}/create-google-doc`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-API-key': 'test-secret' },
      body: planBody,
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      document_id: 'doc-123',
      share_link: 'https://docs.google.com/document/d/doc-123/edit',
      permission_granted: true,
    });
  });

  it('routes on the path without its query string', async () => {
    const res = await fetch(`${base}/health?x=1`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toMatchObject({ status: 'healthy', initialized: true, credential_source: 'json' });
  });
});

describe('createHttpServer error handling', () => {
  it('turns an exception in the router into a 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const server = createHttpServer(async () => {
      throw new Error('router exploded');
    });
    const base = await listen(server);
    try {
      const res = await fetch(`${base}/health`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ success: false, error: 'Internal server error' });
      expect(console.error).toHaveBeenCalledWith('[http] Unhandled error on GET /health: router exploded');
    } finally {
      await close(server);
    }
  });
});

describe('buildServer', () => {
  it('resolves credentials from the environment and serves health', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const config = loadConfig({
      BUBBLE_API_KEY: 'test-secret',
      GOOGLE_CREDENTIALS_FILE: '/nonexistent/google-credentials.json',
      GOOGLE_CREDENTIALS_JSON: JSON.stringify(TEST_KEY),
    });
    const { server, pipeline } = buildServer(config);
    expect(pipeline.initialized).toBe(true);
    const base = await listen(server);
    try {
      const res = await fetch(`${base}/health`);
      expect(await res.json()).toMatchObject({ initialized: true, credential_source: 'json' });
    } finally {
      await close(server);
    }
  });
});
