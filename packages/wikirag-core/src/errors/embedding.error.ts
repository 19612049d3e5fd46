import { BaseError } from './base.error';

/**
 * Embedding error - the embedding service failed or answered malformed
 */
export class EmbeddingError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EMBEDDING_ERROR', 502, context);
  }
}
