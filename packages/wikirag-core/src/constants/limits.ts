/**
 * Pipeline limits and defaults
 */

// Chunking
export const CHUNK_MAX_LENGTH = 800;
export const CHUNK_MAX_COUNT = 10;
export const SENTENCE_BOUNDARY_PERCENT = 70;

// Embedding
export const EMBEDDING_DIMENSIONS = 1536;
export const EMBEDDING_MODEL = 'text-embedding-ada-002';
export const EMBEDDING_TIMEOUT_MS = 30000;

// Retrieval
export const RAG_DEFAULT_TOP_K = 3;

// Chat
export const CHAT_MODEL = 'gpt-3.5-turbo';
export const CHAT_TEMPERATURE = 0.3;
export const CHAT_TIMEOUT_MS = 60000;

// Display
export const CONTEXT_PREVIEW_LENGTH = 150;
