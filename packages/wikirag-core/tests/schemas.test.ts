import { describe, it, expect } from 'vitest';
import {
  chatCompletionResponseSchema,
  chunkConfigSchema,
  documentLookupSchema,
  embeddingMatrixSchema,
  embeddingResponseSchema,
  embedOutcomeSchema,
  ragQuerySchema,
  ragResultSchema,
  responseStyleSchema,
  wikiPageResponseSchema
} from '../src/schemas';
import { DimensionMismatchError, ShapeMismatchError, ValidationError } from '../src/errors';

describe('Chunk Config Schema', () => {
  it('should fill in defaults', () => {
    expect(chunkConfigSchema.parse({})).toEqual({
      maxLength: 800,
      maxChunks: 10,
      sentenceBoundaryPercent: 70
    });
  });

  it('should reject non-positive lengths', () => {
    expect(() => chunkConfigSchema.parse({ maxLength: 0 })).toThrow();
    expect(() => chunkConfigSchema.parse({ maxChunks: -1 })).toThrow();
  });
});

describe('Embedding Matrix Schema', () => {
  it('should accept rows of the declared width', () => {
    expect(() => embeddingMatrixSchema.parse({ dimensions: 2, rows: [[1, 0], [0, 1]] })).not.toThrow();
  });

  it('should accept an empty matrix', () => {
    expect(embeddingMatrixSchema.parse({ dimensions: 1536, rows: [] }).rows).toEqual([]);
  });

  it('should reject a row of the wrong width', () => {
    const result = embeddingMatrixSchema.safeParse({ dimensions: 2, rows: [[1, 0], [1]] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['rows', 1]);
      expect(result.error.issues[0].message).toBe('Expected 2 dimensions, got 1');
    }
  });
});

describe('Embed Outcome Schema', () => {
  it('should require an error on failed outcomes', () => {
    expect(() => embedOutcomeSchema.parse({ status: 'failed', vector: [0] })).toThrow();
    expect(() => embedOutcomeSchema.parse({ status: 'failed', vector: [0], error: 'boom' })).not.toThrow();
  });
});

describe('Embedding Response Schema', () => {
  it('should require at least one embedding', () => {
    expect(() => embeddingResponseSchema.parse({ data: [] })).toThrow();
    expect(embeddingResponseSchema.parse({ data: [{ embedding: [0.5] }] }).data[0].embedding).toEqual([0.5]);
  });
});

describe('RAG Query Schema', () => {
  it('should default topK to 3', () => {
    expect(ragQuerySchema.parse({ question: 'What is a fjord?' })).toEqual({
      question: 'What is a fjord?',
      topK: 3
    });
  });

  it('should floor topK and clamp it at zero', () => {
    expect(ragQuerySchema.parse({ question: 'q', topK: 2.7 }).topK).toBe(2);
    expect(ragQuerySchema.parse({ question: 'q', topK: -4 }).topK).toBe(0);
  });

  it('should reject non-finite topK', () => {
    expect(ragQuerySchema.safeParse({ question: 'q', topK: Number.NaN }).success).toBe(false);
    expect(ragQuerySchema.safeParse({ question: 'q', topK: Number.POSITIVE_INFINITY }).success).toBe(false);
  });
});

describe('RAG Result Schema', () => {
  it('should accept a similarity result with distances', () => {
    const result = ragResultSchema.parse({
      mode: 'similarity',
      chunks: ['Fjords are deep.'],
      matches: [{ chunk: 'Fjords are deep.', position: 2, distance: 0.25 }]
    });

    expect(result.matches[0].position).toBe(2);
  });

  it('should carry the fallback reason', () => {
    const result = ragResultSchema.parse({
      mode: 'fallback',
      chunks: ['x'],
      matches: [],
      reason: 'Query embedding failed: timeout'
    });

    expect(result.reason).toBe('Query embedding failed: timeout');
  });

  it('should reject negative distances', () => {
    expect(() => ragResultSchema.parse({
      mode: 'similarity',
      chunks: ['x'],
      matches: [{ chunk: 'x', position: 0, distance: -1 }]
    })).toThrow();
  });
});

describe('Response Style Schema', () => {
  it('should only accept known styles', () => {
    expect(responseStyleSchema.options).toEqual(['default', 'pirate', 'kid', 'bullets']);
    expect(responseStyleSchema.safeParse('shakespeare').success).toBe(false);
  });
});

describe('Document Lookup Schema', () => {
  it('should accept each lookup status', () => {
    expect(documentLookupSchema.parse({ status: 'found', title: 'T', content: 'C' }).status).toBe('found');
    expect(documentLookupSchema.parse({ status: 'not_found', topic: 'x' }).status).toBe('not_found');
    expect(documentLookupSchema.parse({ status: 'ambiguous', title: 'T', options: ['A'] }).status).toBe('ambiguous');
  });

  it('should reject unknown statuses', () => {
    expect(() => documentLookupSchema.parse({ status: 'maybe' })).toThrow();
  });
});

describe('Wikipedia Page Response Schema', () => {
  it('should parse a page with extract and links', () => {
    const response = wikiPageResponseSchema.parse({
      batchcomplete: true,
      query: {
        pages: [{
          pageid: 1,
          ns: 0,
          title: 'Fjord',
          extract: 'A fjord is a long, narrow inlet.',
          pageprops: { wikibase_item: 'Q1' },
          links: [{ ns: 0, title: 'Norway' }]
        }]
      }
    });

    expect(response.query.pages[0].title).toBe('Fjord');
    expect(response.query.pages[0].links).toEqual([{ ns: 0, title: 'Norway' }]);
  });
});

describe('Chat Completion Response Schema', () => {
  it('should allow a null content', () => {
    const parsed = chatCompletionResponseSchema.parse({
      choices: [{ message: { role: 'assistant', content: null }, finish_reason: 'stop' }]
    });

    expect(parsed.choices[0].message.content).toBeNull();
  });
});

describe('Errors', () => {
  it('should flatten zod issues into a validation error', () => {
    const result = chunkConfigSchema.safeParse({ maxLength: 'long' });

    expect(result.success).toBe(false);
    if (!result.success) {
      const error = ValidationError.fromZod('Invalid chunk config', result.error);
      expect(error.message).toBe('Invalid chunk config: maxLength: Expected number, received string');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.name).toBe('ValidationError');
    }
  });

  it('should describe misaligned chunks and rows', () => {
    const error = new ShapeMismatchError(1, 3);

    expect(error.message).toBe('Embedding matrix has 3 rows for 1 chunks');
    expect(error.code).toBe('SHAPE_MISMATCH');
  });

  it('should describe dimension mismatches', () => {
    const error = new DimensionMismatchError(1536, 3);

    expect(error.message).toBe('Expected 1536 dimensions, got 3');
    expect(error.toJSON()).toMatchObject({ code: 'DIMENSION_MISMATCH', context: { expected: 1536, actual: 3 } });
  });
});
