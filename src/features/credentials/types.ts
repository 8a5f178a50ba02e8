import { z } from 'zod';

/** Docs for document creation/formatting, Drive for sharing. */
export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/documents',
  'https://www.googleapis.com/auth/drive',
] as const;

export const ServiceAccountKeySchema = z.object({
  type: z.string().optional(),
  project_id: z.string().optional(),
  private_key_id: z.string().optional(),
  client_email: z.string().min(1, 'client_email is required'),
  private_key: z.string().min(1, 'private_key is required'),
});

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

export type CredentialSourceName = 'file' | 'base64' | 'json';

export interface Credential {
  readonly source: CredentialSourceName;
  readonly key: Readonly<ServiceAccountKey>;
  readonly scopes: readonly string[];
}

export interface CredentialMiss {
  source: CredentialSourceName;
  /** `absent` when the source held nothing, otherwise why its content was rejected. */
  reason: string;
}

export type CredentialState =
  | { readonly status: 'configured'; readonly credential: Credential }
  | { readonly status: 'unconfigured'; readonly misses: readonly CredentialMiss[] };

export type SourceAttempt =
  | { kind: 'hit'; key: ServiceAccountKey }
  | { kind: 'absent' }
  | { kind: 'invalid'; reason: string };

export interface CredentialSource {
  readonly name: CredentialSourceName;
  /** Where the source reads from, for log lines. Never the secret itself. */
  readonly location: string;
  attempt(): SourceAttempt;
}
