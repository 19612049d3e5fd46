import { z } from 'zod';

/**
 * Result of looking a topic up in a document source
 */
export const documentLookupSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('found'),
    title: z.string(),
    content: z.string()
  }),
  z.object({
    status: z.literal('not_found'),
    topic: z.string()
  }),
  z.object({
    status: z.literal('ambiguous'),
    title: z.string(),
    options: z.array(z.string()).describe('Candidate page titles')
  })
]);

export type DocumentLookup = z.infer<typeof documentLookupSchema>;
