import { createLogger } from '../../lib/log.js';
import { globalErrorReporter, type ErrorReporter, type ErrorStats } from '../../utils/error-reporter.js';
import { ConfigurationError, PipelineError, ProvisionError, ValidationError, errorMessage } from '../../utils/errors.js';
import { DataValidator } from '../../utils/validation.js';
import type { Credential, CredentialState } from '../credentials/types.js';
import { documentTitle, formatContentPlan } from '../docs/formatter.js';
import { grantEditorAccess } from '../docs/permissions.js';
import { provisionDocument, shareLinkFor } from '../docs/provisioner.js';
import { createGoogleWorkspaceClient, type WorkspaceClient, type WorkspaceClientFactory } from '../docs/workspace-client.js';
import { CreateDocumentRequestSchema } from '../plan/schema.js';

const log = createLogger('pipeline');

export interface ProvisionResult {
  document_id: string;
  share_link: string;
  permission_granted: boolean;
}

export type CreateDocumentOutcome =
  | { ok: true; result: ProvisionResult }
  | { ok: false; error: PipelineError };

export interface PipelineDeps {
  credentials: CredentialState;
  clientFactory?: WorkspaceClientFactory;
  reporter?: ErrorReporter;
}

/**
 * Content plan in, shared document out. Holds only the resolved credential and the
 * client built from it, so concurrent calls share nothing mutable.
 */
export class DocumentPipeline {
  readonly credentials: CredentialState;
  private readonly clientFactory: WorkspaceClientFactory;
  private readonly reporter: ErrorReporter;
  private client?: WorkspaceClient;

  constructor(deps: PipelineDeps) {
    this.credentials = deps.credentials;
    this.clientFactory = deps.clientFactory ?? createGoogleWorkspaceClient;
    this.reporter = deps.reporter ?? globalErrorReporter;
  }

  get initialized(): boolean {
    return this.credentials.status === 'configured';
  }

  errorStats(): ErrorStats {
    return this.reporter.getStats();
  }

  async createDocument(body: unknown): Promise<CreateDocumentOutcome> {
    try {
      return { ok: true, result: await this.run(body) };
    } catch (e) {
      if (e instanceof ValidationError) {
        return { ok: false, error: e };
      }
      const error = e instanceof PipelineError
        ? e
        : new PipelineError(errorMessage(e), 500, 'internal_error', { cause: e });
      const documentId = error instanceof ProvisionError ? error.documentId : undefined;
      this.reporter.report(error, { context: { operation: 'create-document', documentId } });
      return { ok: false, error };
    }
  }

  private async run(body: unknown): Promise<ProvisionResult> {
    if (this.credentials.status !== 'configured') throw new ConfigurationError();
    const client = this.clientFor(this.credentials.credential);

    const request = DataValidator.parse(
      CreateDocumentRequestSchema,
      body,
      { operation: 'create-document', dataType: 'create-document request' },
      this.reporter
    );
    const plan = request.content_plan;
    const operations = formatContentPlan(plan);
    const title = documentTitle(plan);

    const documentId = await provisionDocument(title, operations, client);
    const granted = await grantEditorAccess(documentId, request.user_email, client, this.reporter);
    log.info(`Created document ${documentId}`, { scenes: plan.scenes.length, permissionGranted: granted });

    return { document_id: documentId, share_link: shareLinkFor(documentId), permission_granted: granted };
  }

  private clientFor(credential: Credential): WorkspaceClient {
    if (!this.client) this.client = this.clientFactory(credential);
    return this.client;
  }
}
