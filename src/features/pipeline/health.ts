import type { ErrorCategory, ErrorSeverity, ErrorStats } from '../../utils/error-reporter.js';
import type { CredentialSourceName, CredentialState } from '../credentials/types.js';

export interface HealthStatus {
  status: 'healthy';
  initialized: boolean;
  timestamp: string;
  credential_source: CredentialSourceName | null;
  /** Failures still inside the reporter's history window. Messages are left out: they can carry recipient addresses. */
  errors: {
    total: number;
    by_category: Record<ErrorCategory, number>;
    last_error: { category: ErrorCategory; severity: ErrorSeverity; timestamp: string } | null;
  };
}

/** Reads the cached credential outcome and the in-memory error history only; never touches the network. */
export function healthStatus(state: CredentialState, stats: ErrorStats, now: Date = new Date()): HealthStatus {
  const last = stats.recentErrors[stats.recentErrors.length - 1];
  return {
    status: 'healthy',
    initialized: state.status === 'configured',
    timestamp: now.toISOString(),
    credential_source: state.status === 'configured' ? state.credential.source : null,
    errors: {
      total: stats.totalErrors,
      by_category: stats.errorsByCategory,
      last_error: last
        ? { category: last.category, severity: last.severity, timestamp: last.timestamp.toISOString() }
        : null,
    },
  };
}
