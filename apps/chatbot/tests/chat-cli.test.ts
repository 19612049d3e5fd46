import { describe, it, expect } from 'vitest';
import type { ResponseStyle } from '@wikirag/core';
import type { AnswerOutcome, AnswerProgress } from '../src/chat/answer-service';
import { ChatCli, parseStyleChoice, type CliIO, type QuestionAnswerer } from '../src/cli/chat-cli';

const STYLES: ResponseStyle[] = ['default', 'pirate', 'kid', 'bullets'];

class ScriptedIO implements CliIO {
  readonly prompts: string[] = [];
  readonly lines: string[] = [];
  private inputs: string[];

  constructor(inputs: string[]) {
    this.inputs = [...inputs];
  }

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.inputs.shift() ?? null;
  }

  print(line = ''): void {
    this.lines.push(line);
  }
}

class StubAnswerer implements QuestionAnswerer {
  readonly calls: Array<{ question: string; style: ResponseStyle }> = [];

  constructor(
    private readonly outcome: AnswerOutcome | Error,
    private readonly progress: AnswerProgress[] = []
  ) {}

  async answer(
    question: string,
    style: ResponseStyle,
    onProgress?: (progress: AnswerProgress) => void
  ): Promise<AnswerOutcome> {
    this.calls.push({ question, style });
    this.progress.forEach(p => onProgress?.(p));
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

function answered(style: ResponseStyle, answer = 'A narrow inlet.'): AnswerOutcome {
  return {
    status: 'answered',
    answer,
    style,
    chunkCount: 3,
    contextPreview: 'A fjord is...',
    retrievalMode: 'similarity'
  };
}

describe('parseStyleChoice', () => {
  it('should pick the default on empty input', () => {
    expect(parseStyleChoice('', STYLES)).toEqual({ ok: true, style: 'default' });
    expect(parseStyleChoice('   ', STYLES)).toEqual({ ok: true, style: 'default' });
  });

  it('should map 1-based numbers to styles', () => {
    expect(parseStyleChoice('2', STYLES)).toEqual({ ok: true, style: 'pirate' });
    expect(parseStyleChoice(' 4 ', STYLES)).toEqual({ ok: true, style: 'bullets' });
  });

  it('should reject numbers out of range', () => {
    const expected = { ok: false, message: 'Please enter a number between 1 and 4' };
    expect(parseStyleChoice('0', STYLES)).toEqual(expected);
    expect(parseStyleChoice('5', STYLES)).toEqual(expected);
  });

  it('should reject non-numeric input', () => {
    expect(parseStyleChoice('pirate', STYLES)).toEqual({
      ok: false,
      message: 'Please enter a valid number or press Enter for default'
    });
  });
});

describe('ChatCli', () => {
  it('should print the style menu', async () => {
    const io = new ScriptedIO(['', 'exit']);

    await new ChatCli(io, new StubAnswerer(answered('default'))).run();

    expect(io.lines).toContain('\nChoose a response style:');
    expect(io.lines).toContain('1. default - Normal factual responses');
    expect(io.lines).toContain('4. bullets - Organized bullet-point format');
    expect(io.prompts[0]).toBe('\nEnter your choice (1-4) or press Enter for default: ');
  });

  it('should answer a question and exit', async () => {
    const io = new ScriptedIO(['', 'What is a fjord?', 'exit']);
    const answerer = new StubAnswerer(answered('default'));

    await new ChatCli(io, answerer).run();

    expect(answerer.calls).toEqual([{ question: 'What is a fjord?', style: 'default' }]);
    const start = io.lines.indexOf('\nBot (default style):');
    expect(io.lines.slice(start, start + 4)).toEqual([
      '\nBot (default style):',
      '-'.repeat(50),
      'A narrow inlet.',
      '-'.repeat(50)
    ]);
    expect(io.lines[io.lines.length - 1]).toBe('Thanks for using the Wikipedia RAG Chatbot!');
  });

  it('should re-prompt until a valid style is chosen', async () => {
    const io = new ScriptedIO(['9', 'x', '3', 'Why is the sky blue?', 'bye']);
    const answerer = new StubAnswerer(answered('kid'));

    await new ChatCli(io, answerer).run();

    expect(io.lines).toContain('Please enter a number between 1 and 4');
    expect(io.lines).toContain('Please enter a valid number or press Enter for default');
    expect(io.lines).toContain('Selected style: kid');
    expect(answerer.calls).toEqual([{ question: 'Why is the sky blue?', style: 'kid' }]);
  });

  it('should switch styles on the style command', async () => {
    const io = new ScriptedIO(['', 'style', '4', 'What is a fjord?', 'quit']);
    const answerer = new StubAnswerer(answered('bullets'));

    await new ChatCli(io, answerer).run();

    expect(answerer.calls).toEqual([{ question: 'What is a fjord?', style: 'bullets' }]);
  });

  it('should ignore blank questions', async () => {
    const io = new ScriptedIO(['', '   ', 'EXIT']);
    const answerer = new StubAnswerer(answered('default'));

    await new ChatCli(io, answerer).run();

    expect(io.lines).toContain("Please enter a question or 'exit' to quit.");
    expect(answerer.calls).toHaveLength(0);
  });

  it('should print the outcome when nothing was found', async () => {
    const io = new ScriptedIO(['', 'zzqx', 'exit']);

    await new ChatCli(io, new StubAnswerer({ status: 'no_content' })).run();

    expect(io.lines).toContain('No relevant Wikipedia content found for your question.');
  });

  it('should print the outcome when no chunk was relevant', async () => {
    const io = new ScriptedIO(['', 'zzqx', 'exit']);

    await new ChatCli(io, new StubAnswerer({ status: 'no_relevant_chunks', chunkCount: 2 })).run();

    expect(io.lines).toContain('Could not find relevant chunks for your question.');
  });

  it('should report errors and keep going', async () => {
    const io = new ScriptedIO(['', 'What is a fjord?', 'exit']);

    await new ChatCli(io, new StubAnswerer(new Error('Rate limit exceeded'))).run();

    expect(io.lines).toContain('Error processing question: Rate limit exceeded');
    expect(io.lines).toContain('Please try again with a different question.');
    expect(io.lines[io.lines.length - 1]).toBe('Thanks for using the Wikipedia RAG Chatbot!');
  });

  it('should print progress as the answer is built', async () => {
    const io = new ScriptedIO(['', 'What is a fjord?', 'exit']);
    const answerer = new StubAnswerer(answered('default'), [
      { stage: 'searching', question: 'What is a fjord?' },
      { stage: 'chunked', chunkCount: 3 },
      { stage: 'generating', style: 'default', contextPreview: 'A fjord is...' }
    ]);

    await new ChatCli(io, answerer).run();

    expect(io.lines).toContain("\nSearching Wikipedia for: 'What is a fjord?'...");
    expect(io.lines).toContain('Found 3 Wikipedia chunks');
    expect(io.lines).toContain('\nUsing context: A fjord is...');
  });

  it('should say goodbye when input ends', async () => {
    const io = new ScriptedIO([]);

    await new ChatCli(io, new StubAnswerer(answered('default'))).run();

    expect(io.lines[io.lines.length - 1]).toBe('\nGoodbye!');
  });
});
