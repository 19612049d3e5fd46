#!/usr/bin/env tsx
import './env';
import { createLogger } from '@wikirag/core';
import {
  Chunker,
  DocumentLoader,
  EmbeddingClient,
  EmbeddingService,
  Retriever
} from '@wikirag/retrieval';
import { loadConfig, type AppConfig } from './config';
import { WikipediaClient } from './wikipedia/wikipedia-client';
import { ChatClient } from './llm/chat-client';
import { AnswerService } from './chat/answer-service';
import { ChatCli } from './cli/chat-cli';
import { createTerminalIO } from './cli/terminal-io';

const logger = createLogger('chatbot-main');

function createAnswerService(config: AppConfig): AnswerService {
  const chunker = new Chunker({
    maxLength: config.retrieval.chunkMaxLength,
    maxChunks: config.retrieval.maxChunks
  });

  const embedder = new EmbeddingService(
    new EmbeddingClient({
      apiKey: config.gateway.apiToken,
      baseURL: config.gateway.baseURL,
      model: config.embedding.model
    }),
    { dimensions: config.embedding.dimensions }
  );

  return new AnswerService({
    loader: new DocumentLoader(new WikipediaClient({ apiUrl: config.wikipedia.apiUrl }), chunker),
    embedder,
    retriever: new Retriever({ embedder, defaultTopK: config.retrieval.topK }),
    chat: new ChatClient({
      apiKey: config.gateway.apiToken,
      baseURL: config.gateway.baseURL,
      model: config.chat.model
    }),
    topK: config.retrieval.topK
  });
}

// Main entry point
async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.stderr.write('Create a .env file with GATEWAY_API_TOKEN and GATEWAY_BASE_URL (see .env.example).\n');
    process.exit(1);
  }

  const io = createTerminalIO();
  const cli = new ChatCli(io, createAnswerService(config));

  try {
    await cli.run();
  } finally {
    io.close();
  }
}

main().catch(error => {
  logger.error({ error }, 'Chatbot crashed');
  process.exit(1);
});
