import {
  createLogger,
  EMBEDDING_DIMENSIONS,
  type EmbeddingMatrix,
  type EmbeddingProvider,
  type EmbedOutcome,
  type QueryEmbedder
} from '@wikirag/core';

const logger = createLogger('embedding-service');

export interface EmbeddingServiceOptions {
  dimensions?: number;
}

/**
 * Embeds texts one at a time, in order. A failed item becomes a zero
 * vector so row i always belongs to text i.
 */
export class EmbeddingService implements QueryEmbedder {
  private provider: EmbeddingProvider;
  readonly dimensions: number;

  constructor(provider: EmbeddingProvider, options: EmbeddingServiceOptions = {}) {
    this.provider = provider;
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;
  }

  /**
   * Embed a single text. Never rejects.
   */
  async embedOne(text: string): Promise<EmbedOutcome> {
    try {
      const vector = await this.provider.embed(text);
      const problem = this.checkVector(vector);

      if (problem) {
        return this.failed(problem);
      }

      return { status: 'embedded', vector };
    } catch (error) {
      return this.failed(error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Embed texts sequentially, one outcome per text
   */
  async embedBatch(texts: readonly string[]): Promise<EmbedOutcome[]> {
    const outcomes: EmbedOutcome[] = [];

    for (let i = 0; i < texts.length; i++) {
      const outcome = await this.embedOne(texts[i]);

      if (outcome.status === 'failed') {
        logger.warn({ position: i, error: outcome.error }, 'Failed to embed chunk');
      }

      outcomes.push(outcome);
    }

    return outcomes;
  }

  /**
   * Embed texts into a matrix with one row per text
   */
  async embedMany(texts: readonly string[]): Promise<EmbeddingMatrix> {
    if (texts.length === 0) {
      return { dimensions: this.dimensions, rows: [] };
    }

    logger.info({ count: texts.length }, 'Generating embeddings');

    const outcomes = await this.embedBatch(texts);
    const failed = outcomes.filter(o => o.status === 'failed').length;

    logger.info({
      total: outcomes.length,
      embedded: outcomes.length - failed,
      failed
    }, 'Embeddings complete');

    return {
      dimensions: this.dimensions,
      rows: outcomes.map(o => o.vector)
    };
  }

  /**
   * Embed the question (batch of one)
   */
  async embedQuery(text: string): Promise<EmbedOutcome> {
    return this.embedOne(text);
  }

  private checkVector(vector: readonly number[]): string | null {
    if (vector.length !== this.dimensions) {
      return `Expected ${this.dimensions} dimensions, got ${vector.length}`;
    }
    if (!vector.every(Number.isFinite)) {
      return 'Embedding contains non-finite values';
    }
    return null;
  }

  private failed(error: string): EmbedOutcome {
    return {
      status: 'failed',
      vector: new Array<number>(this.dimensions).fill(0),
      error
    };
  }
}
