import { z } from 'zod';

/**
 * MediaWiki action API, formatversion=2
 */

export const wikiSearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({
      title: z.string()
    }))
  })
});

export type WikiSearchResponse = z.infer<typeof wikiSearchResponseSchema>;

export const wikiPageSchema = z.object({
  title: z.string(),
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
  extract: z.string().optional(),
  pageprops: z.record(z.unknown()).optional(),
  links: z.array(z.object({
    ns: z.number().int(),
    title: z.string()
  })).optional()
});

export type WikiPage = z.infer<typeof wikiPageSchema>;

export const wikiPageResponseSchema = z.object({
  query: z.object({
    pages: z.array(wikiPageSchema)
  })
});

export type WikiPageResponse = z.infer<typeof wikiPageResponseSchema>;
