import { google, type docs_v1, type drive_v3 } from 'googleapis';
import { JWT } from 'google-auth-library';
import type { Credential } from '../credentials/types.js';

export interface EditorPermission {
  emailAddress: string;
  role: 'writer';
  type: 'user';
}

/**
 * The three provider calls the pipeline makes. Docs and Drive are separate APIs
 * behind one service account.
 */
export interface WorkspaceClient {
  /** Returns the provider-assigned id, or undefined when the response has none. */
  createDocument(title: string): Promise<string | undefined>;
  /** One atomic batchUpdate: the provider applies all requests or none. */
  batchUpdate(documentId: string, requests: docs_v1.Schema$Request[]): Promise<void>;
  createPermission(fileId: string, permission: EditorPermission, opts: { sendNotificationEmail: boolean }): Promise<string | undefined>;
}

export type WorkspaceClientFactory = (credential: Credential) => WorkspaceClient;

export class GoogleWorkspaceClient implements WorkspaceClient {
  private readonly docs: docs_v1.Docs;
  private readonly drive: drive_v3.Drive;

  constructor(credential: Credential) {
    const auth = new JWT({
      email: credential.key.client_email,
      key: credential.key.private_key,
      keyId: credential.key.private_key_id,
      scopes: [...credential.scopes],
    });
    this.docs = google.docs({ version: 'v1', auth });
    this.drive = google.drive({ version: 'v3', auth });
  }

  async createDocument(title: string): Promise<string | undefined> {
    const res = await this.docs.documents.create({ requestBody: { title } });
    return res.data.documentId ?? undefined;
  }

  async batchUpdate(documentId: string, requests: docs_v1.Schema$Request[]): Promise<void> {
    await this.docs.documents.batchUpdate({ documentId, requestBody: { requests } });
  }

  async createPermission(fileId: string, permission: EditorPermission, opts: { sendNotificationEmail: boolean }): Promise<string | undefined> {
    const res = await this.drive.permissions.create({
      fileId,
      sendNotificationEmail: opts.sendNotificationEmail,
      fields: 'id',
      requestBody: { ...permission },
    });
    return res.data.id ?? undefined;
  }
}

export const createGoogleWorkspaceClient: WorkspaceClientFactory = credential => new GoogleWorkspaceClient(credential);
