import {
  buildAnswerMessages,
  CONTEXT_PREVIEW_LENGTH,
  createLogger,
  formatContextPreview,
  RAG_DEFAULT_TOP_K,
  type GenerateRequest,
  type GenerateResponse,
  type ResponseStyle,
  type RetrievalMode
} from '@wikirag/core';
import type { DocumentLoader, EmbeddingService, Retriever } from '@wikirag/retrieval';

const logger = createLogger('answer-service');

export interface ChatGenerator {
  generate(request: GenerateRequest): Promise<GenerateResponse>;
}

export type AnswerProgress =
  | { stage: 'searching'; question: string }
  | { stage: 'chunked'; chunkCount: number }
  | { stage: 'embedding' }
  | { stage: 'retrieving' }
  | { stage: 'generating'; style: ResponseStyle; contextPreview: string };

export type AnswerOutcome =
  | { status: 'no_content' }
  | { status: 'no_relevant_chunks'; chunkCount: number }
  | {
      status: 'answered';
      answer: string;
      style: ResponseStyle;
      chunkCount: number;
      contextPreview: string;
      retrievalMode: RetrievalMode;
    };

export interface AnswerServiceDeps {
  loader: DocumentLoader;
  embedder: EmbeddingService;
  retriever: Retriever;
  chat: ChatGenerator;
  topK?: number;
  previewLength?: number;
}

/**
 * One question through the whole pipeline:
 * fetch → chunk → embed → retrieve → prompt → chat
 */
export class AnswerService {
  private deps: AnswerServiceDeps;
  private readonly topK: number;
  private readonly previewLength: number;

  constructor(deps: AnswerServiceDeps) {
    this.deps = deps;
    this.topK = deps.topK ?? RAG_DEFAULT_TOP_K;
    this.previewLength = deps.previewLength ?? CONTEXT_PREVIEW_LENGTH;
  }

  async answer(
    question: string,
    style: ResponseStyle,
    onProgress: (progress: AnswerProgress) => void = () => {}
  ): Promise<AnswerOutcome> {
    const { loader, embedder, retriever, chat } = this.deps;

    onProgress({ stage: 'searching', question });
    const chunks = await loader.loadChunks(question);
    if (chunks.length === 0) {
      return { status: 'no_content' };
    }
    onProgress({ stage: 'chunked', chunkCount: chunks.length });

    onProgress({ stage: 'embedding' });
    const embeddings = await embedder.embedMany(chunks);

    onProgress({ stage: 'retrieving' });
    const retrieval = await retriever.retrieveWithDetails(question, chunks, embeddings, this.topK);
    if (retrieval.chunks.length === 0) {
      return { status: 'no_relevant_chunks', chunkCount: chunks.length };
    }

    const contextPreview = formatContextPreview(retrieval.chunks, this.previewLength);
    onProgress({ stage: 'generating', style, contextPreview });

    const messages = buildAnswerMessages(retrieval.chunks, question, style);
    const response = await chat.generate({ messages });

    logger.info({
      style,
      chunkCount: chunks.length,
      contextChunks: retrieval.chunks.length,
      retrievalMode: retrieval.mode
    }, 'Question answered');

    return {
      status: 'answered',
      answer: response.text,
      style,
      chunkCount: chunks.length,
      contextPreview,
      retrievalMode: retrieval.mode
    };
  }
}
