import { BaseError } from './base.error';

/**
 * Chat error - chat completion failed
 */
export class ChatError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CHAT_ERROR', 502, context);
  }
}
