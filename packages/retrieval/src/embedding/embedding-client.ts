import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import {
  createLogger,
  EMBEDDING_MODEL,
  EMBEDDING_TIMEOUT_MS,
  EmbeddingError,
  embeddingResponseSchema,
  type EmbeddingProvider,
  type EmbeddingRequest
} from '@wikirag/core';

const logger = createLogger('embedding-client');

export interface EmbeddingClientOptions {
  apiKey: string;
  baseURL: string;
  model?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

/**
 * Client for an OpenAI-compatible /embeddings endpoint behind an API gateway
 */
export class EmbeddingClient implements EmbeddingProvider {
  private client: AxiosInstance;
  private readonly model: string;

  constructor(options: EmbeddingClientOptions) {
    if (!options.apiKey) {
      throw new EmbeddingError('Embedding API key is required');
    }

    this.model = options.model ?? EMBEDDING_MODEL;
    this.client = axios.create({
      baseURL: options.baseURL,
      headers: {
        'Authorization': `Bearer ${options.apiKey}`,
        'apikey': options.apiKey,
        'Content-Type': 'application/json'
      },
      timeout: options.timeout ?? EMBEDDING_TIMEOUT_MS,
      adapter: options.adapter
    });
  }

  /**
   * Embed one text, resolving to its raw vector
   */
  async embed(text: string): Promise<number[]> {
    const request: EmbeddingRequest = { model: this.model, input: text };

    try {
      const response = await this.client.post('/embeddings', request);

      const parsed = embeddingResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new EmbeddingError('Malformed embedding response', {
          issues: parsed.error.issues.length
        });
      }

      return parsed.data.data[0].embedding;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        logger.error({ status, error: error.message }, 'Embedding API error');

        if (status === 429) {
          throw new EmbeddingError('Rate limit exceeded', { status });
        }

        if (status !== undefined && status >= 500) {
          throw new EmbeddingError('Embedding service unavailable', { status });
        }

        throw new EmbeddingError(`Embedding request failed: ${error.message}`, { status });
      }

      throw error;
    }
  }
}
