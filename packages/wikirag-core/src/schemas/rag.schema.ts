import { z } from 'zod';
import { RAG_DEFAULT_TOP_K } from '../constants/limits';

/**
 * RAG query schema - input for retrieval.
 * k is floored and clamped at 0; NaN and infinities are rejected.
 */
export const ragQuerySchema = z.object({
  question: z.string().describe('User question'),
  topK: z.number().finite().default(RAG_DEFAULT_TOP_K)
    .describe('Number of chunks to return')
    .transform(k => Math.max(0, Math.floor(k)))
});

export type RAGQuery = z.output<typeof ragQuerySchema>;
export type RAGQueryInput = z.input<typeof ragQuerySchema>;

/**
 * Nearest-neighbour hit from a vector index
 */
export const neighborSchema = z.object({
  position: z.number().int().nonnegative().describe('Row position in the matrix'),
  distance: z.number().nonnegative().describe('Squared Euclidean distance to the query')
});

export type Neighbor = z.infer<typeof neighborSchema>;

/**
 * Ranked chunk - a neighbour mapped back to its text
 */
export const rankedMatchSchema = neighborSchema.extend({
  chunk: z.string().describe('Chunk text content')
});

export type RankedMatch = z.infer<typeof rankedMatchSchema>;

export const retrievalModeSchema = z.enum(['similarity', 'fallback', 'empty']);

export type RetrievalMode = z.infer<typeof retrievalModeSchema>;

/**
 * RAG result schema - output from retrieval
 */
export const ragResultSchema = z.object({
  mode: retrievalModeSchema.describe('How the chunks were selected'),
  chunks: z.array(z.string()).describe('Chunk texts, most relevant first'),
  matches: z.array(rankedMatchSchema).describe('Distances, only in similarity mode'),
  reason: z.string().optional().describe('Why similarity search was abandoned, in fallback mode')
});

export type RAGResult = z.infer<typeof ragResultSchema>;
