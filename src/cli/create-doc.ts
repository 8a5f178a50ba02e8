#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { loadConfig } from '../config/env.js';
import { resolveCredential } from '../features/credentials/resolver.js';
import { defaultCredentialSources } from '../features/credentials/sources.js';
import { documentTitle, formatContentPlan } from '../features/docs/formatter.js';
import type { WorkspaceClientFactory } from '../features/docs/workspace-client.js';
import { DocumentPipeline } from '../features/pipeline/create-document.js';
import { ContentPlanSchema } from '../features/plan/schema.js';
import { errorMessage } from '../utils/errors.js';
import { DataValidator } from '../utils/validation.js';

const USAGE = 'Usage: create-doc <plan.json> <recipient-email> [--dry-run]';

export interface CreateDocIO {
  readText?: (path: string) => Promise<string>;
  env?: NodeJS.ProcessEnv;
  clientFactory?: WorkspaceClientFactory;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

/**
 * Renders a plan file into a shared document, or with --dry-run prints the title
 * and edit operations without touching Google. Returns the process exit code.
 */
export async function runCreateDoc(argv: string[], io: CreateDocIO = {}): Promise<number> {
  const out = io.out ?? ((line: string) => console.log(line));
  const err = io.err ?? ((line: string) => console.error(line));
  const readText = io.readText ?? ((path: string) => readFile(path, 'utf-8'));

  const dryRun = argv.includes('--dry-run');
  const [planPath, recipient] = argv.filter(a => !a.startsWith('--'));
  if (!planPath || (!dryRun && !recipient)) {
    err(USAGE);
    return 2;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readText(planPath));
  } catch (e) {
    err(`Could not read plan from ${planPath}: ${errorMessage(e)}`);
    return 1;
  }

  if (dryRun) {
    const result = DataValidator.validate(ContentPlanSchema, raw, { operation: 'cli-dry-run', dataType: 'content plan' });
    if (!result.success) {
      err(`Invalid content plan: ${result.issues.join('; ')}`);
      return 1;
    }
    out(JSON.stringify({ title: documentTitle(result.data), operations: formatContentPlan(result.data) }, null, 2));
    return 0;
  }

  const config = loadConfig(io.env ?? process.env);
  const pipeline = new DocumentPipeline({
    credentials: resolveCredential(defaultCredentialSources(config)),
    clientFactory: io.clientFactory,
  });
  const outcome = await pipeline.createDocument({ content_plan: raw, user_email: recipient });
  if (!outcome.ok) {
    err(`Failed (${outcome.error.status}): ${outcome.error.message}`);
    return 1;
  }
  out(JSON.stringify(outcome.result, null, 2));
  if (!outcome.result.permission_granted) err(`Document created but sharing with ${recipient} failed`);
  return 0;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  runCreateDoc(process.argv.slice(2))
    .then(code => process.exit(code))
    .catch((e: unknown) => {
      console.error(e);
      process.exit(1);
    });
}
