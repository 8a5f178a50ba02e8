import { createLogger } from '../../lib/log.js';
import { PermissionError, errorMessage, providerStatusOf } from '../../utils/errors.js';
import { globalErrorReporter, type ErrorReporter } from '../../utils/error-reporter.js';
import type { WorkspaceClient } from './workspace-client.js';

const log = createLogger('docs');

/**
 * Gives the recipient editor access without Google's notification email; the
 * caller hands out the share link itself. A failure is reported and turned into
 * `false`, since the document already exists and stays usable by its owner.
 */
export async function grantEditorAccess(
  documentId: string,
  recipientEmail: string,
  client: WorkspaceClient,
  reporter: ErrorReporter = globalErrorReporter
): Promise<boolean> {
  try {
    await client.createPermission(
      documentId,
      { type: 'user', role: 'writer', emailAddress: recipientEmail },
      { sendNotificationEmail: false }
    );
    log.debug('permission:granted', { documentId });
    return true;
  } catch (e) {
    const err = new PermissionError(`Sharing with ${recipientEmail} failed: ${errorMessage(e)}`, documentId, {
      providerStatus: providerStatusOf(e),
      cause: e,
    });
    reporter.report(err, { context: { documentId, providerStatus: err.providerStatus } });
    return false;
  }
}
