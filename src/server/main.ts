import { pathToFileURL } from 'node:url';
import type { Server } from 'node:http';
import { loadConfig, type ServiceConfig } from '../config/env.js';
import { resolveCredential } from '../features/credentials/resolver.js';
import { defaultCredentialSources } from '../features/credentials/sources.js';
import { DocumentPipeline } from '../features/pipeline/create-document.js';
import { createLogger } from '../lib/log.js';
import { errorMessage } from '../utils/errors.js';
import { createHttpServer } from './http.js';
import { createRouter } from './router.js';

const log = createLogger('server');

/** Resolves credentials once and wires the pipeline, router and HTTP server. */
export function buildServer(config: ServiceConfig): { server: Server; pipeline: DocumentPipeline } {
  const credentials = resolveCredential(defaultCredentialSources(config));
  const pipeline = new DocumentPipeline({ credentials });
  const server = createHttpServer(createRouter({ pipeline, config }));
  return { server, pipeline };
}

async function main() {
  const config = loadConfig();
  const { server, pipeline } = buildServer(config);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => resolve());
  });
  log.info(`Listening on http://${config.host}:${config.port}`, { googleServicesInitialized: pipeline.initialized });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    server.close(err => {
      if (err) {
        log.error(`Shutdown failed: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((e: unknown) => {
    log.error(`Failed to start: ${errorMessage(e)}`);
    process.exit(1);
  });
}
