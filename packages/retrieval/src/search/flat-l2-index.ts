import type { ZodError } from 'zod';
import {
  DimensionMismatchError,
  embeddingMatrixSchema,
  ValidationError,
  type EmbeddingMatrix,
  type Neighbor,
  type VectorIndex
} from '@wikirag/core';

/**
 * Exact k-NN over an in-memory vector set, by squared Euclidean distance.
 * Brute force: O(N·D) per query.
 */
export class FlatL2Index implements VectorIndex {
  readonly dimensions: number;
  private readonly rows: ReadonlyArray<readonly number[]>;

  constructor(matrix: EmbeddingMatrix) {
    const parsed = embeddingMatrixSchema.safeParse(matrix);
    if (!parsed.success) {
      throw matrixError(matrix, parsed.error);
    }

    this.dimensions = parsed.data.dimensions;
    this.rows = parsed.data.rows;
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * k nearest rows, closest first; equal distances keep row order
   */
  search(query: readonly number[], k: number): Neighbor[] {
    if (query.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, query.length, { operand: 'query' });
    }

    const limit = Math.min(Math.max(0, Math.floor(k)), this.rows.length);
    if (limit === 0) {
      return [];
    }

    const neighbors = this.rows.map((row, position) => ({
      position,
      distance: squaredL2(row, query)
    }));

    neighbors.sort((a, b) => a.distance - b.distance || a.position - b.position);

    return neighbors.slice(0, limit);
  }
}

export function squaredL2(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

/**
 * A row of the wrong width is a dimension mismatch; anything else is a malformed matrix
 */
function matrixError(matrix: EmbeddingMatrix, error: ZodError): Error {
  for (const issue of error.issues) {
    const [field, position] = issue.path;
    if (field === 'rows' && typeof position === 'number' && issue.path.length === 2) {
      return new DimensionMismatchError(matrix.dimensions, matrix.rows[position].length, { position });
    }
  }
  return ValidationError.fromZod('Invalid embedding matrix', error);
}

export function createFlatIndex(matrix: EmbeddingMatrix): VectorIndex {
  return new FlatL2Index(matrix);
}
