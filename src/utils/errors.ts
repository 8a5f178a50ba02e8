// Error taxonomy for the create-document pipeline. `status` is the HTTP status the
// server answers with when the error aborts a request.

export class PipelineError extends Error {
  status: number;
  code: string;
  constructor(msg: string, status: number, code: string, options?: { cause?: unknown }) {
    super(msg, options);
    this.name = 'PipelineError';
    this.status = status;
    this.code = code;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(msg = 'Google services not configured') { super(msg, 503, 'not_configured'); this.name = 'ConfigurationError'; }
}

export class ValidationError extends PipelineError {
  issues: string[];
  constructor(msg: string, issues: string[] = []) { super(msg, 400, 'invalid_request'); this.name = 'ValidationError'; this.issues = issues; }
}

/** Document creation or batch formatting failed at the provider. */
export class ProvisionError extends PipelineError {
  documentId?: string;
  providerStatus?: number;
  constructor(msg: string, opts: { documentId?: string; providerStatus?: number; cause?: unknown } = {}) {
    super(msg, 502, 'provision_failed', { cause: opts.cause });
    this.name = 'ProvisionError';
    this.documentId = opts.documentId;
    this.providerStatus = opts.providerStatus;
  }
}

/** Sharing failed after the document was created. Never aborts a request. */
export class PermissionError extends PipelineError {
  documentId: string;
  providerStatus?: number;
  constructor(msg: string, documentId: string, opts: { providerStatus?: number; cause?: unknown } = {}) {
    super(msg, 502, 'permission_failed', { cause: opts.cause });
    this.name = 'PermissionError';
    this.documentId = documentId;
    this.providerStatus = opts.providerStatus;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}

/**
 * Pulls the HTTP status out of a provider failure. googleapis rejects with a
 * GaxiosError that carries `status` (and `response.status` on older releases).
 */
export function providerStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err && typeof err.response === 'object' && err.response !== null) {
    const res = err.response;
    if ('status' in res && typeof res.status === 'number') return res.status;
  }
  return undefined;
}
