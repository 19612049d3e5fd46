import { createLogger, type DocumentLookup, type DocumentSource } from '@wikirag/core';
import type { Chunker } from '../chunking/chunker';

const logger = createLogger('document-loader');

/**
 * Fetches one document for a topic and chunks it.
 * Any lookup problem yields no chunks.
 */
export class DocumentLoader {
  private source: DocumentSource;
  private chunker: Chunker;

  constructor(source: DocumentSource, chunker: Chunker) {
    this.source = source;
    this.chunker = chunker;
  }

  async loadChunks(topic: string): Promise<string[]> {
    try {
      let lookup = await this.source.lookup(topic);

      // One retry with the first candidate title
      if (lookup.status === 'ambiguous' && lookup.options.length > 0) {
        const [firstOption] = lookup.options;
        logger.info({ topic, title: lookup.title, resolvedTo: firstOption }, 'Ambiguous topic, using first option');
        lookup = await this.source.lookup(firstOption);
      }

      return this.toChunks(topic, lookup);
    } catch (error) {
      logger.warn({
        topic,
        error: error instanceof Error ? error.message : String(error)
      }, 'Document lookup failed');
      return [];
    }
  }

  private toChunks(topic: string, lookup: DocumentLookup): string[] {
    if (lookup.status !== 'found') {
      logger.info({ topic, status: lookup.status }, 'No document for topic');
      return [];
    }

    const chunks = this.chunker.chunkDocument(lookup.content);

    logger.info({
      topic,
      title: lookup.title,
      chunkCount: chunks.length
    }, 'Document chunked');

    return chunks;
  }
}
