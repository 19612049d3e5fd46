import { z } from 'zod';

/**
 * Embedding matrix - one row per chunk, positionally aligned.
 * Width is explicit so an empty matrix still knows its dimensions.
 */
export const embeddingMatrixSchema = z.object({
  dimensions: z.number().int().positive().describe('Vector width (D)'),
  rows: z.array(z.array(z.number())).describe('One vector per chunk, in chunk order')
}).superRefine((matrix, ctx) => {
  matrix.rows.forEach((row, i) => {
    if (row.length !== matrix.dimensions) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rows', i],
        message: `Expected ${matrix.dimensions} dimensions, got ${row.length}`
      });
    }
  });
});

export type EmbeddingMatrix = z.infer<typeof embeddingMatrixSchema>;

/**
 * Per-item embedding outcome. A failed item still carries a zero vector
 * so that batch output stays aligned with its input.
 */
export const embedOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('embedded'),
    vector: z.array(z.number())
  }),
  z.object({
    status: z.literal('failed'),
    vector: z.array(z.number()),
    error: z.string().describe('Why the item fell back to a zero vector')
  })
]);

export type EmbedOutcome = z.infer<typeof embedOutcomeSchema>;

/**
 * Embedding API request - OpenAI-compatible /embeddings
 */
export const embeddingRequestSchema = z.object({
  model: z.string().min(1),
  input: z.string()
});

export type EmbeddingRequest = z.infer<typeof embeddingRequestSchema>;

/**
 * Embedding API response - OpenAI-compatible /embeddings
 */
export const embeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number().int().nonnegative().optional()
  })).min(1),
  model: z.string().optional(),
  usage: z.object({
    prompt_tokens: z.number().int().nonnegative(),
    total_tokens: z.number().int().nonnegative()
  }).optional()
});

export type EmbeddingResponse = z.infer<typeof embeddingResponseSchema>;
