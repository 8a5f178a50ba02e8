import { createLogger } from '../../lib/log.js';
import { ProvisionError, errorMessage, providerStatusOf } from '../../utils/errors.js';
import { toDocsRequests, type EditOperation } from './edit-operations.js';
import type { WorkspaceClient } from './workspace-client.js';

const log = createLogger('docs');

export function shareLinkFor(documentId: string): string {
  return `https://docs.google.com/document/d/${encodeURIComponent(documentId)}/edit`;
}

/**
 * Creates an empty document and applies all operations in one batchUpdate.
 * When the batch fails the created document is left in place (unformatted) and
 * its id travels on the ProvisionError.
 */
export async function provisionDocument(
  title: string,
  operations: readonly EditOperation[],
  client: WorkspaceClient
): Promise<string> {
  let documentId: string | undefined;
  try {
    documentId = await client.createDocument(title);
  } catch (e) {
    throw new ProvisionError(`Document creation failed: ${errorMessage(e)}`, { providerStatus: providerStatusOf(e), cause: e });
  }
  if (!documentId) {
    throw new ProvisionError('Document creation failed: response carried no document id');
  }
  log.debug('document:created', { documentId, title });

  if (operations.length === 0) return documentId;

  try {
    await client.batchUpdate(documentId, toDocsRequests(operations));
  } catch (e) {
    throw new ProvisionError(`Document formatting failed: ${errorMessage(e)}`, {
      documentId,
      providerStatus: providerStatusOf(e),
      cause: e,
    });
  }
  log.debug('document:formatted', { documentId, operations: operations.length });
  return documentId;
}
