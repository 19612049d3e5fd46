/**
 * LLM Service Types
 */

import type { ChatMessage } from '../schemas';

/**
 * Request for a chat completion
 */
export type GenerateRequest = {
  messages: ChatMessage[];
  temperature?: number;
  model?: string;
};

/**
 * Response from a chat completion
 */
export type GenerateResponse = {
  text: string;
  finishReason: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
};
