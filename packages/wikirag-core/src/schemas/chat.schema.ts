import { z } from 'zod';

export const chatRoleSchema = z.enum(['system', 'user', 'assistant']);

export type ChatRole = z.infer<typeof chatRoleSchema>;

/**
 * Chat message - OpenAI-compatible
 */
export const chatMessageSchema = z.object({
  role: chatRoleSchema,
  content: z.string()
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;

/**
 * Answer styles offered to the user
 */
export const responseStyleSchema = z.enum(['default', 'pirate', 'kid', 'bullets']);

export type ResponseStyle = z.infer<typeof responseStyleSchema>;

/**
 * Chat completion response - OpenAI-compatible /chat/completions
 */
export const chatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    index: z.number().int().nonnegative().optional(),
    message: z.object({
      role: z.string(),
      content: z.string().nullable()
    }),
    finish_reason: z.string().nullable().optional()
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().int().nonnegative(),
    completion_tokens: z.number().int().nonnegative(),
    total_tokens: z.number().int().nonnegative()
  }).optional()
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;
