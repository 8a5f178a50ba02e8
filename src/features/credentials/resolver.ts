import { createLogger, type Logger } from '../../lib/log.js';
import { GOOGLE_SCOPES, type Credential, type CredentialMiss, type CredentialSource, type CredentialState } from './types.js';

const defaultLog = createLogger('credentials');

/**
 * Tries each source in order and keeps the first usable key. A source with
 * malformed content is logged and skipped. Reads configuration only; no network.
 */
export function resolveCredential(sources: readonly CredentialSource[], log: Logger = defaultLog): CredentialState {
  const misses: CredentialMiss[] = [];
  for (const source of sources) {
    const attempt = source.attempt();
    if (attempt.kind === 'hit') {
      log.info(`Loaded Google service account from ${source.name} (${source.location})`, {
        clientEmail: attempt.key.client_email,
      });
      const credential: Credential = Object.freeze({
        source: source.name,
        key: Object.freeze({ ...attempt.key }),
        scopes: Object.freeze([...GOOGLE_SCOPES]),
      });
      const state: CredentialState = { status: 'configured', credential };
      return Object.freeze(state);
    }
    if (attempt.kind === 'invalid') {
      log.warn(`Ignoring ${source.name} credentials from ${source.location}: ${attempt.reason}`);
      misses.push({ source: source.name, reason: attempt.reason });
    } else {
      misses.push({ source: source.name, reason: 'absent' });
    }
  }
  log.warn('No Google credentials found; document creation is disabled');
  const state: CredentialState = { status: 'unconfigured', misses: Object.freeze(misses) };
  return Object.freeze(state);
}
