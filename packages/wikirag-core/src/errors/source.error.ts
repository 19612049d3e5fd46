import { BaseError } from './base.error';

/**
 * Source error - document lookup failed
 */
export class SourceError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', 502, context);
  }
}
