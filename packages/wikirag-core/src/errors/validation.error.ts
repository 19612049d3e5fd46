import type { ZodError } from 'zod';
import { BaseError } from './base.error';

/**
 * Validation error - for schema validation failures
 */
export class ValidationError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }

  /**
   * Flatten zod issues into "path: message" lines
   */
  static fromZod(prefix: string, error: ZodError): ValidationError {
    const issues = error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });

    return new ValidationError(`${prefix}: ${issues.join('; ')}`, { issues });
  }
}
