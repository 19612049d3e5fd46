import {
  getAvailableStyles,
  RESPONSE_STYLE_DESCRIPTIONS,
  type ResponseStyle
} from '@wikirag/core';
import type { AnswerOutcome, AnswerProgress } from '../chat/answer-service';

const EXIT_COMMANDS = new Set(['exit', 'quit', 'bye']);
const RULE = '-'.repeat(50);
const BANNER = '='.repeat(60);

/**
 * Line-oriented terminal. ask() resolves null once input has ended.
 */
export interface CliIO {
  ask(prompt: string): Promise<string | null>;
  print(line?: string): void;
}

export interface QuestionAnswerer {
  answer(
    question: string,
    style: ResponseStyle,
    onProgress?: (progress: AnswerProgress) => void
  ): Promise<AnswerOutcome>;
}

export type StyleChoice =
  | { ok: true; style: ResponseStyle }
  | { ok: false; message: string };

/**
 * Menu input → style. Empty picks the default; otherwise a 1-based number.
 */
export function parseStyleChoice(input: string, styles: readonly ResponseStyle[]): StyleChoice {
  const choice = input.trim();

  if (choice === '') {
    return { ok: true, style: 'default' };
  }

  if (!/^\d+$/.test(choice)) {
    return { ok: false, message: 'Please enter a valid number or press Enter for default' };
  }

  const index = Number(choice) - 1;
  if (index < 0 || index >= styles.length) {
    return { ok: false, message: `Please enter a number between 1 and ${styles.length}` };
  }

  return { ok: true, style: styles[index] };
}

/**
 * Interactive question loop
 */
export class ChatCli {
  private io: CliIO;
  private answerer: QuestionAnswerer;
  private styles: ResponseStyle[];

  constructor(io: CliIO, answerer: QuestionAnswerer) {
    this.io = io;
    this.answerer = answerer;
    this.styles = getAvailableStyles();
  }

  async run(): Promise<void> {
    const { io } = this;

    io.print(BANNER);
    io.print('         Wikipedia-Powered RAG Chatbot');
    io.print(BANNER);

    let style = await this.selectStyle();
    if (style === null) {
      io.print('\nGoodbye!');
      return;
    }

    io.print(`\nChatbot ready! Using '${style}' response style.`);
    io.print("Ask about any topic and the answer will be grounded in a Wikipedia article.");
    io.print("Type 'exit' to quit or 'style' to change response style.\n");

    for (;;) {
      const input = await io.ask("Ask a question (or 'exit'): ");
      if (input === null) {
        io.print('\nGoodbye!');
        return;
      }

      const question = input.trim();
      const command = question.toLowerCase();

      if (question === '') {
        io.print("Please enter a question or 'exit' to quit.");
        continue;
      }

      if (EXIT_COMMANDS.has(command)) {
        io.print('Thanks for using the Wikipedia RAG Chatbot!');
        return;
      }

      if (command === 'style') {
        const next = await this.selectStyle();
        if (next === null) {
          io.print('\nGoodbye!');
          return;
        }
        style = next;
        continue;
      }

      await this.handleQuestion(question, style);
    }
  }

  /**
   * Show the style menu until a valid choice; null when input ends
   */
  async selectStyle(): Promise<ResponseStyle | null> {
    const { io, styles } = this;

    io.print('\nChoose a response style:');
    styles.forEach((style, i) => {
      io.print(`${i + 1}. ${style} - ${RESPONSE_STYLE_DESCRIPTIONS[style]}`);
    });

    for (;;) {
      const input = await io.ask(`\nEnter your choice (1-${styles.length}) or press Enter for default: `);
      if (input === null) {
        return null;
      }

      const choice = parseStyleChoice(input, styles);
      if (!choice.ok) {
        io.print(choice.message);
        continue;
      }

      if (input.trim() !== '') {
        io.print(`Selected style: ${choice.style}`);
      }
      return choice.style;
    }
  }

  async handleQuestion(question: string, style: ResponseStyle): Promise<void> {
    const { io } = this;

    try {
      const outcome = await this.answerer.answer(question, style, progress => this.reportProgress(progress));

      switch (outcome.status) {
        case 'no_content':
          io.print('No relevant Wikipedia content found for your question.');
          break;
        case 'no_relevant_chunks':
          io.print('Could not find relevant chunks for your question.');
          break;
        case 'answered':
          io.print(`\nBot (${outcome.style} style):`);
          io.print(RULE);
          io.print(outcome.answer);
          io.print(RULE);
          break;
      }
    } catch (error) {
      io.print(`Error processing question: ${error instanceof Error ? error.message : String(error)}`);
      io.print('Please try again with a different question.');
    }
  }

  private reportProgress(progress: AnswerProgress): void {
    const { io } = this;

    switch (progress.stage) {
      case 'searching':
        io.print(`\nSearching Wikipedia for: '${progress.question}'...`);
        break;
      case 'chunked':
        io.print(`Found ${progress.chunkCount} Wikipedia chunks`);
        break;
      case 'embedding':
        io.print('Generating embeddings for Wikipedia content...');
        break;
      case 'retrieving':
        io.print('Finding most relevant content...');
        break;
      case 'generating':
        io.print(`\nUsing context: ${progress.contextPreview}`);
        io.print(`\nGenerating ${progress.style} response...`);
        break;
    }
  }
}
