import { createLogger, type Logger } from '../lib/log.js';
import {
  ConfigurationError,
  PermissionError,
  PipelineError,
  ProvisionError,
  ValidationError,
} from './errors.js';

// Error categories for grouping failures in logs and stats
export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  AUTHENTICATION = 'authentication',
  PROVIDER = 'provider',
  PERMISSION = 'permission',
  NETWORK = 'network',
  UNKNOWN = 'unknown'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

const ERROR_TITLES: Record<ErrorCategory, string> = {
  [ErrorCategory.CONFIGURATION]: 'Configuration Error',
  [ErrorCategory.VALIDATION]: 'Request Validation Error',
  [ErrorCategory.AUTHENTICATION]: 'Authentication Error',
  [ErrorCategory.PROVIDER]: 'Google API Error',
  [ErrorCategory.PERMISSION]: 'Sharing Error',
  [ErrorCategory.NETWORK]: 'Connection Error',
  [ErrorCategory.UNKNOWN]: 'Unexpected Error',
};

export interface ErrorReport {
  id: string;
  timestamp: Date;
  category: ErrorCategory;
  severity: ErrorSeverity;
  title: string;
  originalError: Error;
  context?: Record<string, unknown>;
}

export interface ErrorReporterConfig {
  enableConsoleLogging?: boolean;
  maxStoredReports?: number;
  /** Reports older than this are dropped on the next report. */
  maxReportAgeMs?: number;
}

export interface ErrorStats {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
  /** Oldest first, at most ten. */
  recentErrors: ErrorReport[];
}

/**
 * Centralized error reporting: categorises each failure, logs it once and keeps a
 * bounded history whose counts the health endpoint publishes.
 */
export class ErrorReporter {
  private reports: ErrorReport[] = [];
  private config: Required<ErrorReporterConfig>;
  private log: Logger;

  constructor(config: ErrorReporterConfig = {}, log: Logger = createLogger('errors')) {
    this.config = {
      enableConsoleLogging: true,
      maxStoredReports: 100,
      maxReportAgeMs: 60 * 60 * 1000,
      ...config
    };
    this.log = log;
  }

  report(
    error: Error,
    options: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
    } = {}
  ): ErrorReport {
    const category = options.category || this.categorizeError(error);
    const severity = options.severity || this.determineSeverity(error, category);

    const report: ErrorReport = {
      id: this.generateErrorId(),
      timestamp: new Date(),
      category,
      severity,
      title: ERROR_TITLES[category],
      originalError: error,
      context: options.context,
    };

    this.cleanupOldReports();
    this.reports.push(report);
    if (this.reports.length > this.config.maxStoredReports) {
      this.reports = this.reports.slice(-this.config.maxStoredReports);
    }

    if (this.config.enableConsoleLogging) {
      this.logToConsole(report);
    }

    return report;
  }

  private categorizeError(error: Error): ErrorCategory {
    if (error instanceof ConfigurationError) return ErrorCategory.CONFIGURATION;
    if (error instanceof ValidationError) return ErrorCategory.VALIDATION;
    if (error instanceof PermissionError) return ErrorCategory.PERMISSION;
    if (error instanceof ProvisionError) return ErrorCategory.PROVIDER;

    const message = error.message.toLowerCase();
    if (message.includes('unauthorized') || message.includes('invalid_grant') || message.includes('401')) {
      return ErrorCategory.AUTHENTICATION;
    }
    if (message.includes('network') || message.includes('econnreset') || message.includes('enotfound') || message.includes('socket')) {
      return ErrorCategory.NETWORK;
    }
    return ErrorCategory.UNKNOWN;
  }

  private determineSeverity(error: Error, category: ErrorCategory): ErrorSeverity {
    if (category === ErrorCategory.CONFIGURATION || category === ErrorCategory.AUTHENTICATION) {
      return ErrorSeverity.CRITICAL;
    }
    if (category === ErrorCategory.PROVIDER || category === ErrorCategory.UNKNOWN) {
      return ErrorSeverity.HIGH;
    }
    if (category === ErrorCategory.PERMISSION || category === ErrorCategory.NETWORK) {
      return ErrorSeverity.MEDIUM;
    }
    if (error instanceof PipelineError && error.status >= 500) return ErrorSeverity.HIGH;
    return ErrorSeverity.LOW;
  }

  private generateErrorId(): string {
    return `error-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
  }

  private logToConsole(report: ErrorReport): void {
    const data: Record<string, unknown> = { id: report.id, category: report.category, ...report.context };
    const line = `${report.title}: ${report.originalError.message}`;
    if (report.severity === ErrorSeverity.CRITICAL || report.severity === ErrorSeverity.HIGH) this.log.error(line, data);
    else if (report.severity === ErrorSeverity.MEDIUM) this.log.warn(line, data);
    else this.log.info(line, data);
  }

  private cleanupOldReports(): void {
    const cutoff = Date.now() - this.config.maxReportAgeMs;
    this.reports = this.reports.filter(report => report.timestamp.getTime() > cutoff);
  }

  getStats(): ErrorStats {
    this.cleanupOldReports();
    const errorsByCategory: Record<ErrorCategory, number> = {
      [ErrorCategory.CONFIGURATION]: 0,
      [ErrorCategory.VALIDATION]: 0,
      [ErrorCategory.AUTHENTICATION]: 0,
      [ErrorCategory.PROVIDER]: 0,
      [ErrorCategory.PERMISSION]: 0,
      [ErrorCategory.NETWORK]: 0,
      [ErrorCategory.UNKNOWN]: 0,
    };
    const errorsBySeverity: Record<ErrorSeverity, number> = {
      [ErrorSeverity.LOW]: 0,
      [ErrorSeverity.MEDIUM]: 0,
      [ErrorSeverity.HIGH]: 0,
      [ErrorSeverity.CRITICAL]: 0,
    };
    this.reports.forEach(report => {
      errorsByCategory[report.category] += 1;
      errorsBySeverity[report.severity] += 1;
    });

    return {
      totalErrors: this.reports.length,
      errorsByCategory,
      errorsBySeverity,
      recentErrors: this.reports.slice(-10),
    };
  }

  clearReports(): void {
    this.reports = [];
  }
}

export const globalErrorReporter = new ErrorReporter({
  enableConsoleLogging: process.env.NODE_ENV !== 'test',
});
