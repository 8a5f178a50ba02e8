import { existsSync, readFileSync } from 'node:fs';
import { describeIssues } from '../../utils/validation.js';
import { errorMessage } from '../../utils/errors.js';
import type { ServiceConfig } from '../../config/env.js';
import { ServiceAccountKeySchema, type CredentialSource, type CredentialSourceName, type SourceAttempt } from './types.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

export function parseServiceAccountKey(raw: string): SourceAttempt {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    return { kind: 'invalid', reason: `not valid JSON (${errorMessage(e)})` };
  }
  const parsed = ServiceAccountKeySchema.safeParse(json);
  if (!parsed.success) {
    return { kind: 'invalid', reason: `not a service account key (${describeIssues(parsed.error).join('; ')})` };
  }
  return { kind: 'hit', key: parsed.data };
}

export class FileCredentialSource implements CredentialSource {
  readonly name: CredentialSourceName = 'file';
  constructor(private readonly path: string) {}

  get location(): string { return this.path; }

  attempt(): SourceAttempt {
    if (!existsSync(this.path)) return { kind: 'absent' };
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch (e) {
      return { kind: 'invalid', reason: `unreadable (${errorMessage(e)})` };
    }
    return parseServiceAccountKey(raw);
  }
}

export class Base64CredentialSource implements CredentialSource {
  readonly name: CredentialSourceName = 'base64';
  readonly location = 'GOOGLE_CREDENTIALS_JSON_BASE64';
  constructor(private readonly value: string | undefined) {}

  attempt(): SourceAttempt {
    if (!this.value) return { kind: 'absent' };
    const compact = this.value.replace(/\s+/g, '');
    if (!BASE64_PATTERN.test(compact)) return { kind: 'invalid', reason: 'not valid base64' };
    return parseServiceAccountKey(Buffer.from(compact, 'base64').toString('utf-8'));
  }
}

export class JsonCredentialSource implements CredentialSource {
  readonly name: CredentialSourceName = 'json';
  readonly location = 'GOOGLE_CREDENTIALS_JSON';
  constructor(private readonly value: string | undefined) {}

  attempt(): SourceAttempt {
    if (!this.value) return { kind: 'absent' };
    return parseServiceAccountKey(this.value);
  }
}

/** Priority order: file, then base64 blob, then raw JSON blob. */
export function defaultCredentialSources(
  config: Pick<ServiceConfig, 'credentialsFile' | 'credentialsBase64' | 'credentialsJson'>
): CredentialSource[] {
  return [
    new FileCredentialSource(config.credentialsFile),
    new Base64CredentialSource(config.credentialsBase64),
    new JsonCredentialSource(config.credentialsJson),
  ];
}
