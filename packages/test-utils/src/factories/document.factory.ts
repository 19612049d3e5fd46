import { faker } from '@faker-js/faker';
import type { DocumentLookup } from '@wikirag/core';

export interface ArticleTextOptions {
  sentences?: number;
  seed?: number;
}

/**
 * Seeded lorem prose, already whitespace-normalized
 */
export function createArticleText(options: ArticleTextOptions = {}): string {
  faker.seed(options.seed ?? 42);
  return faker.lorem.sentences(options.sentences ?? 40);
}

export function createFoundLookup(
  overrides: Partial<Extract<DocumentLookup, { status: 'found' }>> = {}
): DocumentLookup {
  return {
    status: 'found',
    title: overrides.title ?? 'Test Article',
    content: overrides.content ?? createArticleText()
  };
}

export function createAmbiguousLookup(title: string, options: string[]): DocumentLookup {
  return { status: 'ambiguous', title, options };
}

export function createNotFoundLookup(topic: string): DocumentLookup {
  return { status: 'not_found', topic };
}
