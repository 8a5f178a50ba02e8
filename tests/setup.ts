import { afterEach, vi } from 'vitest';
import { globalErrorReporter } from '../src/utils/error-reporter.js';

// Reports from one test must not show up in another's stats.
afterEach(() => {
  vi.restoreAllMocks();
  globalErrorReporter.clearReports();
});
