import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { z } from 'zod';
import {
  createLogger,
  SourceError,
  wikiPageResponseSchema,
  wikiSearchResponseSchema,
  type DocumentLookup,
  type DocumentSource,
  type WikiPage
} from '@wikirag/core';
import { TextNormalizer } from '@wikirag/retrieval';
import { DEFAULT_WIKIPEDIA_API_URL } from '../config';

const logger = createLogger('wikipedia-client');

const ARTICLE_NAMESPACE = 0;

export interface WikipediaClientOptions {
  apiUrl?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

/**
 * Document source backed by the MediaWiki action API
 */
export class WikipediaClient implements DocumentSource {
  private client: AxiosInstance;
  private normalizer: TextNormalizer;

  constructor(options: WikipediaClientOptions = {}) {
    this.client = axios.create({
      baseURL: options.apiUrl ?? DEFAULT_WIKIPEDIA_API_URL,
      headers: {
        'User-Agent': 'wiki-rag/0.1 (command-line question answering)'
      },
      timeout: options.timeout ?? 10000,
      adapter: options.adapter
    });
    this.normalizer = new TextNormalizer();
  }

  /**
   * Best-matching article for a topic
   */
  async lookup(topic: string): Promise<DocumentLookup> {
    const title = await this.searchTitle(topic);
    if (!title) {
      logger.info({ topic }, 'No search results');
      return { status: 'not_found', topic };
    }

    const page = await this.fetchPage(title);
    if (!page || page.missing || page.invalid) {
      return { status: 'not_found', topic };
    }

    if (page.pageprops && 'disambiguation' in page.pageprops) {
      const options = (page.links ?? [])
        .filter(link => link.ns === ARTICLE_NAMESPACE)
        .map(link => link.title);

      logger.info({ topic, title: page.title, options: options.length }, 'Disambiguation page');
      return { status: 'ambiguous', title: page.title, options };
    }

    return {
      status: 'found',
      title: page.title,
      content: this.normalizer.stripSectionHeadings(page.extract ?? '')
    };
  }

  private async searchTitle(topic: string): Promise<string | null> {
    const data = await this.query({
      list: 'search',
      srsearch: topic,
      srlimit: 1
    }, wikiSearchResponseSchema);

    return data.query.search[0]?.title ?? null;
  }

  private async fetchPage(title: string): Promise<WikiPage | null> {
    const data = await this.query({
      prop: 'extracts|pageprops|links',
      titles: title,
      explaintext: 1,
      redirects: 1,
      ppprop: 'disambiguation',
      plnamespace: ARTICLE_NAMESPACE,
      pllimit: 'max'
    }, wikiPageResponseSchema);

    return data.query.pages[0] ?? null;
  }

  private async query<S extends z.ZodTypeAny>(
    params: Record<string, string | number>,
    schema: S
  ): Promise<z.infer<S>> {
    let body: unknown;

    try {
      const response = await this.client.get('', {
        params: { action: 'query', format: 'json', formatversion: 2, ...params }
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.error({ status: error.response?.status, error: error.message }, 'Wikipedia API error');
        throw new SourceError(`Wikipedia request failed: ${error.message}`, {
          status: error.response?.status
        });
      }
      throw error;
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceError('Malformed Wikipedia response', {
        issues: parsed.error.issues.length
      });
    }

    return parsed.data;
  }
}
