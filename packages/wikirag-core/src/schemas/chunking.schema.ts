import { z } from 'zod';
import { CHUNK_MAX_COUNT, CHUNK_MAX_LENGTH, SENTENCE_BOUNDARY_PERCENT } from '../constants/limits';

/**
 * Chunker configuration schema
 */
export const chunkConfigSchema = z.object({
  maxLength: z.number().int().positive().default(CHUNK_MAX_LENGTH)
    .describe('Maximum characters per chunk'),
  maxChunks: z.number().int().positive().default(CHUNK_MAX_COUNT)
    .describe('Maximum chunks taken from one document'),
  sentenceBoundaryPercent: z.number().int().min(0).max(100).default(SENTENCE_BOUNDARY_PERCENT)
    .describe('Earliest point of the window, in percent, where a period may end the chunk')
});

export type ChunkConfig = z.infer<typeof chunkConfigSchema>;
export type ChunkConfigInput = z.input<typeof chunkConfigSchema>;
