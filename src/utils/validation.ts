import { z } from 'zod';
import { globalErrorReporter, ErrorCategory, ErrorSeverity, type ErrorReporter } from './error-reporter.js';
import { ValidationError } from './errors.js';

export type ValidationResult<T> = {
  success: true;
  data: T;
} | {
  success: false;
  errors: z.ZodError;
  issues: string[];
};

/** `path.to.field: message` lines, one per zod issue. */
export function describeIssues(error: z.ZodError): string[] {
  return error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

export class DataValidator {
  /**
   * Validate data against a schema, reporting failures to the error reporter
   */
  static validate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    context?: { operation?: string; dataType?: string },
    reporter: ErrorReporter = globalErrorReporter
  ): ValidationResult<T> {
    const result = schema.safeParse(data);
    if (result.success) {
      return { success: true, data: result.data };
    }

    const issues = describeIssues(result.error);
    reporter.report(new Error(`Data validation failed: ${issues.join('; ')}`), {
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      context: {
        operation: context?.operation || 'data-validation',
        dataType: context?.dataType || 'unknown',
        validationErrors: result.error.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
          code: e.code
        })),
      },
    });

    return { success: false, errors: result.error, issues };
  }

  /**
   * Like `validate`, but throws a ValidationError carrying the issue list
   */
  static parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    context?: { operation?: string; dataType?: string },
    reporter: ErrorReporter = globalErrorReporter
  ): T {
    const result = DataValidator.validate(schema, data, context, reporter);
    if (result.success) return result.data;
    const subject = context?.dataType || 'data';
    throw new ValidationError(`Invalid ${subject}: ${result.issues.join('; ')}`, result.issues);
  }
}
