import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import {
  CHAT_MODEL,
  CHAT_TEMPERATURE,
  CHAT_TIMEOUT_MS,
  ChatError,
  chatCompletionResponseSchema,
  createLogger,
  type GenerateRequest,
  type GenerateResponse
} from '@wikirag/core';

const logger = createLogger('chat-client');

export interface ChatClientOptions {
  apiKey: string;
  baseURL: string;
  model?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

/**
 * Client for an OpenAI-compatible /chat/completions endpoint behind an API gateway
 */
export class ChatClient {
  private client: AxiosInstance;
  private readonly defaultModel: string;

  constructor(options: ChatClientOptions) {
    if (!options.apiKey) {
      throw new ChatError('Chat API key is required');
    }

    this.defaultModel = options.model ?? CHAT_MODEL;
    this.client = axios.create({
      baseURL: options.baseURL,
      headers: {
        'Authorization': `Bearer ${options.apiKey}`,
        'apikey': options.apiKey,
        'Content-Type': 'application/json'
      },
      timeout: options.timeout ?? CHAT_TIMEOUT_MS,
      adapter: options.adapter
    });

    logger.info({ model: this.defaultModel }, 'Chat client initialized');
  }

  /**
   * Generate a chat completion
   */
  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const {
      messages,
      temperature = CHAT_TEMPERATURE,
      model = this.defaultModel
    } = request;

    logger.info({
      model,
      messageCount: messages.length,
      temperature
    }, 'Generating completion');

    const startTime = Date.now();
    let body: unknown;

    try {
      const response = await this.client.post('/chat/completions', {
        model,
        messages,
        temperature
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        logger.error({ status, error: error.message, duration: Date.now() - startTime }, 'Chat API error');

        if (status === 429) {
          throw new ChatError('Rate limit exceeded', { status });
        }

        throw new ChatError(`Chat completion failed: ${error.message}`, { status });
      }
      throw error;
    }

    const parsed = chatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ChatError('Malformed chat completion response', {
        issues: parsed.error.issues.length
      });
    }

    const [choice] = parsed.data.choices;
    if (choice.message.content === null) {
      throw new ChatError('Empty completion');
    }

    const usage = parsed.data.usage;

    logger.info({
      duration: Date.now() - startTime,
      inputTokens: usage?.prompt_tokens,
      outputTokens: usage?.completion_tokens,
      finishReason: choice.finish_reason
    }, 'Generation complete');

    return {
      text: choice.message.content,
      finishReason: choice.finish_reason ?? 'unknown',
      usage: {
        inputTokens: usage?.prompt_tokens ?? 0,
        outputTokens: usage?.completion_tokens ?? 0
      }
    };
  }
}
