import type { EmbeddingProvider } from '@wikirag/core';

type Respond = (text: string, call: number) => number[] | Promise<number[]>;

/**
 * Embedding provider driven by a callback; records every text it is asked for
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];
  private respond: Respond;

  constructor(respond: Respond) {
    this.respond = respond;
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.respond(text, this.calls.length - 1);
  }
}

/**
 * Provider answering from a fixed text -> vector table; unknown text rejects
 */
export function createTableProvider(table: Record<string, number[]>): FakeEmbeddingProvider {
  return new FakeEmbeddingProvider(text => {
    const vector = table[text];
    if (!vector) {
      throw new Error(`No embedding for "${text}"`);
    }
    return vector;
  });
}

/**
 * Provider that always rejects
 */
export function createFailingProvider(message = 'Service unavailable'): FakeEmbeddingProvider {
  return new FakeEmbeddingProvider(() => {
    throw new Error(message);
  });
}

export function filledVector(dimensions: number, value: number): number[] {
  return new Array<number>(dimensions).fill(value);
}
