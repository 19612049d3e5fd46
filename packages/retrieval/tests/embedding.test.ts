import { describe, it, expect } from 'vitest';
import {
  createFailingProvider,
  createTableProvider,
  FakeEmbeddingProvider,
  filledVector
} from '@wikirag/test-utils';
import { EmbeddingService } from '../src/embedding/embedding-service';

describe('EmbeddingService', () => {
  it('should embed texts in order, one row per text', async () => {
    const provider = createTableProvider({
      alpha: [1, 0, 0],
      beta: [0, 1, 0],
      gamma: [0, 0, 1]
    });
    const service = new EmbeddingService(provider, { dimensions: 3 });

    const matrix = await service.embedMany(['alpha', 'beta', 'gamma']);

    expect(matrix).toEqual({
      dimensions: 3,
      rows: [[1, 0, 0], [0, 1, 0], [0, 0, 1]]
    });
    expect(provider.calls).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('should zero-fill failed items without shifting positions', async () => {
    const provider = new FakeEmbeddingProvider((text, call) => {
      if (call === 1 || call === 3) {
        throw new Error('quota exceeded');
      }
      return filledVector(3, call + 1);
    });
    const service = new EmbeddingService(provider, { dimensions: 3 });

    const matrix = await service.embedMany(['c0', 'c1', 'c2', 'c3']);

    expect(matrix.rows).toEqual([
      [1, 1, 1],
      [0, 0, 0],
      [3, 3, 3],
      [0, 0, 0]
    ]);
    expect(provider.calls).toHaveLength(4);
  });

  it('should return a zero-row matrix for no texts without calling the provider', async () => {
    const provider = createFailingProvider();
    const service = new EmbeddingService(provider);

    const matrix = await service.embedMany([]);

    expect(matrix).toEqual({ dimensions: 1536, rows: [] });
    expect(provider.calls).toEqual([]);
  });

  it('should produce all-zero rows of full width when every call fails', async () => {
    const service = new EmbeddingService(createFailingProvider());

    const matrix = await service.embedMany(['a', 'b']);

    expect(matrix.rows).toHaveLength(2);
    for (const row of matrix.rows) {
      expect(row).toHaveLength(1536);
      expect(row.every(v => v === 0)).toBe(true);
    }
  });

  it('should treat a wrong-width vector as a failure', async () => {
    const service = new EmbeddingService(createTableProvider({ short: [1, 2] }), { dimensions: 3 });

    const outcome = await service.embedOne('short');

    expect(outcome).toEqual({
      status: 'failed',
      vector: [0, 0, 0],
      error: 'Expected 3 dimensions, got 2'
    });
  });

  it('should treat non-finite values as a failure', async () => {
    const service = new EmbeddingService(createTableProvider({ bad: [1, Number.NaN] }), { dimensions: 2 });

    const outcome = await service.embedOne('bad');

    expect(outcome.status).toBe('failed');
    expect(outcome.vector).toEqual([0, 0]);
  });

  it('should report the provider error on a failed outcome', async () => {
    const service = new EmbeddingService(createFailingProvider('Rate limit exceeded'), { dimensions: 2 });

    const outcome = await service.embedQuery('question');

    expect(outcome).toEqual({ status: 'failed', vector: [0, 0], error: 'Rate limit exceeded' });
  });

  it('should embed the query through the single-item path', async () => {
    const provider = createTableProvider({ 'What is a fjord?': [0.5, 0.5] });
    const service = new EmbeddingService(provider, { dimensions: 2 });

    const outcome = await service.embedQuery('What is a fjord?');

    expect(outcome).toEqual({ status: 'embedded', vector: [0.5, 0.5] });
    expect(provider.calls).toEqual(['What is a fjord?']);
  });

  it('should never have more than one request in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const provider = new FakeEmbeddingProvider(async (_text, call) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return [call, call];
    });
    const service = new EmbeddingService(provider, { dimensions: 2 });

    const matrix = await service.embedMany(['a', 'b', 'c']);

    expect(maxInFlight).toBe(1);
    expect(matrix.rows).toEqual([[0, 0], [1, 1], [2, 2]]);
  });
});
