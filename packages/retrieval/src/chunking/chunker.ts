import {
  chunkConfigSchema,
  createLogger,
  ValidationError,
  type ChunkConfig,
  type ChunkConfigInput
} from '@wikirag/core';
import { TextNormalizer } from './text-normalizer';

const logger = createLogger('chunker');

/**
 * Text chunking service
 * Splits a document into bounded, non-overlapping windows for retrieval
 */
export class Chunker {
  private normalizer: TextNormalizer;
  private config: ChunkConfig;

  constructor(config?: ChunkConfigInput) {
    const parsed = chunkConfigSchema.safeParse(config ?? {});
    if (!parsed.success) {
      throw ValidationError.fromZod('Invalid chunk config', parsed.error);
    }

    this.normalizer = new TextNormalizer();
    this.config = parsed.data;
  }

  /**
   * Normalize raw document text, then chunk it
   */
  chunkDocument(raw: string): string[] {
    return this.chunk(this.normalizer.normalize(raw));
  }

  /**
   * Chunk normalized text into at most maxChunks pieces
   */
  chunk(text: string): string[] {
    const { maxLength, maxChunks } = this.config;
    const chunks: string[] = [];

    for (let start = 0; start < text.length; start += maxLength) {
      let window = text.slice(start, start + maxLength);

      // Every window but the last may end early on a sentence boundary
      if (start + maxLength < text.length) {
        window = this.trimToSentence(window);
      }

      const trimmed = window.trim();
      if (trimmed.length > 0) {
        chunks.push(trimmed);
      }

      if (chunks.length >= maxChunks) {
        break;
      }
    }

    logger.debug({
      textLength: text.length,
      chunkCount: chunks.length
    }, 'Text chunked');

    return chunks;
  }

  /**
   * Cut the window just after its last period, if that period falls in
   * the trailing part of the window
   */
  private trimToSentence(window: string): string {
    const lastPeriod = window.lastIndexOf('.');
    if (lastPeriod >= this.minBoundary()) {
      return window.slice(0, lastPeriod + 1);
    }
    return window;
  }

  private minBoundary(): number {
    return Math.ceil((this.config.maxLength * this.config.sentenceBoundaryPercent) / 100);
  }
}
