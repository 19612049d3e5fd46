/**
 * Retrieval pipeline seams
 */

import type { DocumentLookup, EmbeddingMatrix, EmbedOutcome, Neighbor } from '../schemas';

/**
 * Anything that turns one text into one vector. May reject.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

/**
 * Single-item embedding path used for the question
 */
export interface QueryEmbedder {
  embedQuery(text: string): Promise<EmbedOutcome>;
}

/**
 * k-nearest-neighbour search over a fixed vector set
 */
export interface VectorIndex {
  readonly size: number;
  readonly dimensions: number;
  search(query: readonly number[], k: number): Neighbor[];
}

export type VectorIndexFactory = (matrix: EmbeddingMatrix) => VectorIndex;

/**
 * Supplies plain-text document content for a topic
 */
export interface DocumentSource {
  lookup(topic: string): Promise<DocumentLookup>;
}
