import {
  createLogger,
  DimensionMismatchError,
  RAG_DEFAULT_TOP_K,
  RAGError,
  ragQuerySchema,
  ShapeMismatchError,
  ValidationError,
  type EmbeddingMatrix,
  type QueryEmbedder,
  type RAGQuery,
  type RAGResult,
  type RankedMatch,
  type VectorIndexFactory
} from '@wikirag/core';
import { createFlatIndex } from '../search/flat-l2-index';

const logger = createLogger('retriever');

export interface RetrieverOptions {
  embedder: QueryEmbedder;
  createIndex?: VectorIndexFactory;
  defaultTopK?: number;
}

/**
 * Picks the chunks closest to a question. Falls back to document order
 * when similarity search cannot complete.
 */
export class Retriever {
  private embedder: QueryEmbedder;
  private createIndex: VectorIndexFactory;
  private readonly defaultTopK: number;

  constructor(options: RetrieverOptions) {
    this.embedder = options.embedder;
    this.createIndex = options.createIndex ?? createFlatIndex;
    this.defaultTopK = options.defaultTopK ?? RAG_DEFAULT_TOP_K;
  }

  /**
   * Top-k chunk texts, most relevant first
   */
  async retrieve(
    question: string,
    chunks: readonly string[],
    embeddings: EmbeddingMatrix,
    topK?: number
  ): Promise<string[]> {
    const result = await this.retrieveWithDetails(question, chunks, embeddings, topK);
    return result.chunks;
  }

  /**
   * Top-k chunks with distances and the selection mode.
   * Throws on an invalid k or on chunks and rows that are not aligned.
   */
  async retrieveWithDetails(
    question: string,
    chunks: readonly string[],
    embeddings: EmbeddingMatrix,
    topK: number = this.defaultTopK
  ): Promise<RAGResult> {
    const query = this.parseQuery(question, topK);

    if (chunks.length === 0 || embeddings.rows.length === 0) {
      return { mode: 'empty', chunks: [], matches: [] };
    }

    if (embeddings.rows.length !== chunks.length) {
      throw new ShapeMismatchError(chunks.length, embeddings.rows.length);
    }

    const k = query.topK;

    try {
      const outcome = await this.embedder.embedQuery(query.question);
      if (outcome.status === 'failed') {
        return this.fallback(chunks, k, new RAGError(`Query embedding failed: ${outcome.error}`));
      }

      const index = this.createIndex(embeddings);
      const neighbors = index.search(outcome.vector, k);

      const matches: RankedMatch[] = [];
      for (const { position, distance } of neighbors) {
        if (position >= 0 && position < chunks.length) {
          matches.push({ chunk: chunks[position], position, distance });
        }
      }

      logger.info({
        questionLength: query.question.length,
        candidates: embeddings.rows.length,
        returned: matches.length
      }, 'Retrieval complete');

      return {
        mode: 'similarity',
        chunks: matches.map(m => m.chunk),
        matches
      };
    } catch (error) {
      if (error instanceof DimensionMismatchError) {
        throw error;
      }
      return this.fallback(chunks, k, toRAGError(error));
    }
  }

  private parseQuery(question: string, topK: number): RAGQuery {
    const parsed = ragQuerySchema.safeParse({ question, topK });
    if (!parsed.success) {
      throw ValidationError.fromZod('Invalid retrieval query', parsed.error);
    }
    return parsed.data;
  }

  private fallback(chunks: readonly string[], k: number, failure: RAGError): RAGResult {
    logger.warn({
      code: failure.code,
      reason: failure.message,
      returned: Math.min(k, chunks.length)
    }, 'Similarity search failed, using document order');

    return {
      mode: 'fallback',
      chunks: chunks.slice(0, k),
      matches: [],
      reason: failure.message
    };
  }
}

function toRAGError(error: unknown): RAGError {
  if (error instanceof RAGError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RAGError(`Similarity search failed: ${message}`, { cause: message });
}
