import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { describeIssues } from '../utils/validation.js';

// Unset and blank variables are treated the same.
const optionalVar = z
  .string()
  .optional()
  .transform(v => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  PORT: optionalVar.pipe(z.coerce.number().int().min(1).max(65535).default(5000)),
  HOST: optionalVar.transform(v => v ?? '0.0.0.0'),
  BUBBLE_API_KEY: optionalVar,
  GOOGLE_CREDENTIALS_FILE: optionalVar.transform(v => v ?? 'google-credentials.json'),
  GOOGLE_CREDENTIALS_JSON_BASE64: optionalVar,
  GOOGLE_CREDENTIALS_JSON: optionalVar,
  CORS_ORIGINS: optionalVar.transform(v =>
    (v ?? '*').split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
  ),
});

export interface ServiceConfig {
  readonly port: number;
  readonly host: string;
  /** Shared secret expected in the X-API-Key header. Unset means every create request is refused. */
  readonly apiKey?: string;
  readonly credentialsFile: string;
  readonly credentialsBase64?: string;
  readonly credentialsJson?: string;
  readonly corsOrigins: readonly string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error).join('; ')}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    apiKey: e.BUBBLE_API_KEY,
    credentialsFile: e.GOOGLE_CREDENTIALS_FILE,
    credentialsBase64: e.GOOGLE_CREDENTIALS_JSON_BASE64,
    credentialsJson: e.GOOGLE_CREDENTIALS_JSON,
    corsOrigins: Object.freeze(e.CORS_ORIGINS.length > 0 ? e.CORS_ORIGINS : ['*']),
  });
}
