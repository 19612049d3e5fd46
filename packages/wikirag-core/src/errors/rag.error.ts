import { BaseError } from './base.error';

/**
 * RAG error - for retrieval-stage failures (index build/query)
 */
export class RAGError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RAG_ERROR', 500, context);
  }
}

/**
 * Query vector and embedding matrix disagree on width.
 * A programming error, never recovered from.
 */
export class DimensionMismatchError extends BaseError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context?: Record<string, unknown>) {
    super(
      `Expected ${expected} dimensions, got ${actual}`,
      'DIMENSION_MISMATCH',
      500,
      { expected, actual, ...context }
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Embedding matrix rows and chunk sequence are not positionally aligned
 */
export class ShapeMismatchError extends BaseError {
  readonly chunkCount: number;
  readonly rowCount: number;

  constructor(chunkCount: number, rowCount: number) {
    super(
      `Embedding matrix has ${rowCount} rows for ${chunkCount} chunks`,
      'SHAPE_MISMATCH',
      500,
      { chunkCount, rowCount }
    );
    this.chunkCount = chunkCount;
    this.rowCount = rowCount;
  }
}
