import { describe, it, expect, vi, beforeEach } from 'vitest';
import { google } from 'googleapis';
import { JWT } from 'google-auth-library';
import { GoogleWorkspaceClient } from '../workspace-client.js';
import { grantEditorAccess } from '../permissions.js';
import { formatContentPlan } from '../formatter.js';
import { toDocsRequests } from '../edit-operations.js';
import { ErrorReporter } from '../../../utils/error-reporter.js';
import { TEST_CREDENTIAL, TEST_KEY, providerError } from '../../../../tests/helpers/fake-workspace-client.js';

const api = vi.hoisted(() => ({
  documents: { create: vi.fn(), batchUpdate: vi.fn() },
  permissions: { create: vi.fn() },
}));

vi.mock('googleapis', () => ({
  google: {
    docs: vi.fn(() => ({ documents: api.documents })),
    drive: vi.fn(() => ({ permissions: api.permissions })),
  },
}));

vi.mock('google-auth-library', () => ({
  JWT: vi.fn(),
}));

describe('GoogleWorkspaceClient', () => {
  let client: GoogleWorkspaceClient;

  beforeEach(() => {
    vi.mocked(JWT).mockClear();
    api.documents.create.mockResolvedValue({ data: { documentId: 'doc-9' } });
    api.documents.batchUpdate.mockResolvedValue({ data: {} });
    api.permissions.create.mockResolvedValue({ data: { id: 'perm-1' } });
    client = new GoogleWorkspaceClient(TEST_CREDENTIAL);
  });

  it('authenticates as the service account with the Docs and Drive scopes', () => {
    expect(JWT).toHaveBeenCalledTimes(1);
    expect(JWT).toHaveBeenCalledWith({
      email: TEST_KEY.client_email,
      key: TEST_KEY.private_key,
      keyId: undefined,
      scopes: ['https://www.googleapis.com/auth/documents', 'https://www.googleapis.com/auth/drive'],
    });
    expect(google.docs).toHaveBeenCalledWith({ version: 'v1', auth: expect.anything() });
    expect(google.drive).toHaveBeenCalledWith({ version: 'v3', auth: expect.anything() });
  });

  it('creates a document with the given title', async () => {
    await expect(client.createDocument('Short-form Content Plan: Untitled')).resolves.toBe('doc-9');
    expect(api.documents.create).toHaveBeenCalledWith({ requestBody: { title: 'Short-form Content Plan: Untitled' } });
  });

  it('returns undefined when the response has no document id', async () => {
    api.documents.create.mockResolvedValueOnce({ data: {} });
    await expect(client.createDocument('T')).resolves.toBeUndefined();
    api.documents.create.mockResolvedValueOnce({ data: { documentId: null } });
    await expect(client.createDocument('T')).resolves.toBeUndefined();
  });

  it('sends every request in a single batchUpdate', async () => {
    const requests = toDocsRequests(formatContentPlan({ topic: 'AI trends', scenes: [] }));
    await client.batchUpdate('doc-9', requests);
    expect(api.documents.batchUpdate).toHaveBeenCalledTimes(1);
    expect(api.documents.batchUpdate).toHaveBeenCalledWith({
      documentId: 'doc-9',
      requestBody: {
        requests: [
          { insertText: { location: { index: 1 }, text: 'Topic: AI trends\n' } },
          {
            updateParagraphStyle: {
              range: { startIndex: 1, endIndex: 18 },
              paragraphStyle: { namedStyleType: 'NORMAL_TEXT' },
              fields: 'namedStyleType',
            },
          },
          {
            updateTextStyle: {
              range: { startIndex: 1, endIndex: 7 },
              textStyle: { bold: true },
              fields: 'bold',
            },
          },
        ],
      },
    });
  });

  it('shares as a writer without a notification email', async () => {
    const reporter = new ErrorReporter({ enableConsoleLogging: false });
    await expect(grantEditorAccess('doc-9', 'user@example.com', client, reporter)).resolves.toBe(true);
    expect(api.permissions.create).toHaveBeenCalledWith({
      fileId: 'doc-9',
      sendNotificationEmail: false,
      fields: 'id',
      requestBody: { type: 'user', role: 'writer', emailAddress: 'user@example.com' },
    });
  });

  it('passes provider failures through to the caller', async () => {
    api.documents.batchUpdate.mockRejectedValueOnce(providerError('Invalid requests[0].insertText', 400));
    await expect(client.batchUpdate('doc-9', [])).rejects.toThrow('Invalid requests[0].insertText');
  });
});
