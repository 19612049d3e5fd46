import { z } from 'zod';
import {
  CHAT_MODEL,
  CHUNK_MAX_COUNT,
  CHUNK_MAX_LENGTH,
  EMBEDDING_DIMENSIONS,
  EMBEDDING_MODEL,
  RAG_DEFAULT_TOP_K,
  ValidationError
} from '@wikirag/core';

export const DEFAULT_WIKIPEDIA_API_URL = 'https://en.wikipedia.org/w/api.php';

/**
 * Environment schema - everything the chatbot reads from process.env
 */
export const appConfigSchema = z.object({
  GATEWAY_API_TOKEN: z.string().min(1, 'Required'),
  GATEWAY_BASE_URL: z.string().url(),
  EMBEDDING_MODEL: z.string().min(1).default(EMBEDDING_MODEL),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(EMBEDDING_DIMENSIONS),
  CHAT_MODEL: z.string().min(1).default(CHAT_MODEL),
  WIKIPEDIA_API_URL: z.string().url().default(DEFAULT_WIKIPEDIA_API_URL),
  CHUNK_MAX_LENGTH: z.coerce.number().int().positive().default(CHUNK_MAX_LENGTH),
  MAX_CHUNKS: z.coerce.number().int().positive().default(CHUNK_MAX_COUNT),
  TOP_K: z.coerce.number().int().positive().default(RAG_DEFAULT_TOP_K)
}).transform(env => ({
  gateway: {
    apiToken: env.GATEWAY_API_TOKEN,
    baseURL: env.GATEWAY_BASE_URL
  },
  embedding: {
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS
  },
  chat: {
    model: env.CHAT_MODEL
  },
  wikipedia: {
    apiUrl: env.WIKIPEDIA_API_URL
  },
  retrieval: {
    chunkMaxLength: env.CHUNK_MAX_LENGTH,
    maxChunks: env.MAX_CHUNKS,
    topK: env.TOP_K
  }
}));

export type AppConfig = z.output<typeof appConfigSchema>;

/**
 * Validate configuration; lists every offending variable at once
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appConfigSchema.safeParse(env);

  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid configuration', parsed.error);
  }

  return parsed.data;
}
